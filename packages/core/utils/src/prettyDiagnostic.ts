import type {Diagnostic} from '@version-sync/diagnostic';
import _chalk from 'chalk';

export type AnsiDiagnosticResult = {
  message: string;
  /** `file:line`, or an empty string when the diagnostic has no location. */
  location: string;
  stack: string;
  hints: Array<string>;
};

export default function prettyDiagnostic(
  diagnostic: Diagnostic,
  chalk: _chalk.Chalk = _chalk,
): AnsiDiagnosticResult {
  let {origin, message, stack, filePath, line, hints} = diagnostic;

  let location = '';
  if (filePath != null) {
    location = line != null ? `${filePath}:${line}` : filePath;
  }

  return {
    message: chalk.bold(`${origin ?? 'unknown'}:`) + ' ' + message,
    location: location ? chalk.gray.underline(location) : '',
    stack: stack ?? '',
    hints: (hints ?? []).map((h) => chalk.blue(h)),
  };
}
