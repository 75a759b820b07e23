import {Option, type Command} from 'commander';
import {parseConcurrency, parseLogLevel, parsePolicy} from './normalizeOptions';

export interface OptionsDefinition {
  [flags: string]: string | Option;
}

export function applyOptions(cmd: Command, options: OptionsDefinition): Command {
  for (let flags in options) {
    let option = options[flags];
    if (option instanceof Option) {
      cmd.addOption(option);
    } else {
      cmd.option(flags, option);
    }
  }
  return cmd;
}

/** Options every command reading the config takes. */
export const commonOptions: OptionsDefinition = {
  '--current <ref>': 'revision being checked (env VERSION_CURRENT, default HEAD)',
  '--config <path>':
    'config file (env VERSION_CONFIG_FILE, default .bumpversion.cfg)',
  '-v, --version-file <path>':
    'file every other file must match, the config is optional with it (env VERSION_FILE)',
  '--version-regex <regex>':
    'pattern versions must match (env VERSION_REGEX)',
  '-f, --files <paths...>': 'files to check instead of the config file sections',
  '--file-regexes <regexes...>':
    'patterns locating the version in each of --files, in the same order',
  '--log-level <level>': new Option(
    '--log-level <level>',
    'set the log level',
  )
    .choices(['none', 'error', 'warn', 'info', 'verbose'])
    .argParser(parseLogLevel),
};

export const checkOptions: OptionsDefinition = {
  '--base <ref>':
    'revision to compare against (env VERSION_BASE, default origin/main then origin/master)',
  '--policy <policy>': new Option(
    '--policy <policy>',
    'how files with an unchanged version are judged',
  )
    .choices(['content', 'repository'])
    .argParser(parsePolicy),
  '--concurrency <n>': new Option(
    '--concurrency <n>',
    'files checked in parallel',
  ).argParser(parseConcurrency),
  '--json': 'print the report as JSON',
};
