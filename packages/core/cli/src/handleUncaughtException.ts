import ThrowableDiagnostic from '@version-sync/diagnostic';
import logger from '@version-sync/logger';
import {prettyDiagnostic} from '@version-sync/utils';
import chalk from 'chalk';

export function logUncaughtError(e: unknown): void {
  if (e instanceof ThrowableDiagnostic) {
    for (let diagnostic of e.diagnostics) {
      let {message, location, stack, hints} = prettyDiagnostic(diagnostic);
      console.error(chalk.red(message));
      if (location) {
        console.error(location);
      }
      if (stack && logger.level === 'verbose') {
        console.error('');
        console.error(stack);
      }
      for (let h of hints) {
        console.error(h);
      }
    }
  } else {
    console.error(e);
  }
}

export function handleUncaughtException(exception: unknown): void {
  try {
    logUncaughtError(exception);
  } catch (err: unknown) {
    console.error(exception);
    console.error(err);
  }

  process.exit(1);
}
