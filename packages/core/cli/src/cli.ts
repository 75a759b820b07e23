import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import {Command} from 'commander';
import type {MergeStrategy} from '@version-sync/core';
import {NodeFS} from '@version-sync/fs';
import logger from '@version-sync/logger';
import {GitVersionControl} from '@version-sync/vcs';
import {applyOptions, checkOptions, commonOptions} from './applyOptions';
import {
  runCheck,
  runExampleConfig,
  runMerge,
  runReadme,
  type CommandContext,
} from './commands';
import {handleUncaughtException} from './handleUncaughtException';
import {normalizeOptions, parseStrategy, type Flags} from './normalizeOptions';

function readVersion(): string {
  let pkg: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'),
  );
  return typeof pkg === 'object' &&
    pkg != null &&
    'version' in pkg &&
    typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

function write(output: string): void {
  process.stdout.write(output + '\n');
}

function createContext(): CommandContext {
  let nodeFS = new NodeFS();
  return {
    vcs: GitVersionControl.open(nodeFS.cwd()),
    fs: nodeFS,
    chalk,
    write,
  };
}

function finish(ok: boolean): void {
  process.exitCode = ok ? 0 : 1;
}

export function createProgram(): Command {
  let program = new Command();

  program
    .name('version-sync')
    .description(
      'Checks that hardcoded versions are bumped together and resolves version merge conflicts',
    )
    .version(readVersion());

  // Git hooks pass their own positional arguments, they are accepted and
  // ignored.
  let check = program
    .command('check', {isDefault: true})
    .description('compare the versions at the baseline and the current revision')
    .argument('[hookArgs...]')
    .action(async (_hookArgs: Array<string>, flags: Flags) => {
      let options = normalizeOptions(flags, process.env);
      logger.setLogLevel(options.logLevel);
      finish(await runCheck(options, createContext()));
    });
  applyOptions(check, commonOptions);
  applyOptions(check, checkOptions);

  let merge = program
    .command('merge')
    .description('resolve version conflicts in the configured files')
    .addHelpText(
      'after',
      '\nA line of exactly seven "=" outside a conflict is reported as a stray marker,\nso a heading underlined with seven "=" makes the file malformed.',
    )
    .argument(
      '[strategy]',
      'higher, lower, ours or theirs',
      parseStrategy,
      'higher',
    )
    .argument('[hookArgs...]')
    .action(
      async (
        strategy: MergeStrategy,
        _hookArgs: Array<string>,
        flags: Flags,
      ) => {
        let options = normalizeOptions(flags, process.env);
        logger.setLogLevel(options.logLevel);
        finish(await runMerge(strategy, options, createContext()));
      },
    );
  applyOptions(merge, commonOptions);

  program
    .command('example-config')
    .description('print an example .bumpversion.cfg')
    .action(() => {
      runExampleConfig({write});
    });

  program
    .command('readme')
    .description('print the readme')
    .action(() => {
      runReadme({write});
    });

  return program;
}

export function run(argv: Array<string>): void {
  process.on('unhandledRejection', handleUncaughtException);
  void createProgram().parseAsync(argv).catch(handleUncaughtException);
}
