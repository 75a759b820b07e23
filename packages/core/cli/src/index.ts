export {createProgram, run} from './cli';
export {
  README_PATH,
  runCheck,
  runExampleConfig,
  runMerge,
  runReadme,
  toRepoPath,
} from './commands';
export type {CommandContext} from './commands';
export {
  normalizeOptions,
  parseConcurrency,
  parseLogLevel,
  parsePolicy,
  parseStrategy,
} from './normalizeOptions';
export type {Env, Flags, RunOptions} from './normalizeOptions';
export {formatMergeReport, formatReport, formatReportJson} from './report';
export {handleUncaughtException, logUncaughtError} from './handleUncaughtException';
