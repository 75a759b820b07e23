export {
  ConfigError,
  IOError,
  MalformedConflictError,
  NotFoundError,
  ParseError,
} from './errors';
export type {ParseErrorReason} from './errors';
export {
  DEFAULT_VERSION_PATTERN,
  GENERIC_VERSION_PATTERN,
  VersionParser,
  compareVersions,
  formatVersion,
  getDefaultParser,
  parseVersion,
  versionsEqual,
} from './Version';
export type {Span, VersionMatch, VersionSpec} from './Version';
export {
  buildSearchSpec,
  locateVersion,
  locateVersionRelaxed,
  relaxSearchSpec,
  substituteTemplate,
} from './SearchSpec';
export type {
  ContextSearchSpec,
  LiteralSearchSpec,
  PatternSearchSpec,
  SearchSpec,
  SearchSpecOptions,
  SubstitutedTemplate,
} from './SearchSpec';
export {RevisionReader} from './RevisionReader';
export {detectDrift} from './detectDrift';
export type {DriftOptions, DriftRefs} from './detectDrift';
export {
  ConflictResolver,
  MERGE_STRATEGIES,
  resolveConflicts,
} from './ConflictResolver';
export type {
  ConflictResolution,
  ConflictResolverOptions,
  ResolveConflictsOptions,
} from './ConflictResolver';
export {mergeConflicts} from './mergeConflicts';
export type {MergeFileResult, MergeOptions, MergeReport} from './mergeConflicts';
export {
  DEFAULT_CONFIG_FILE,
  EXAMPLE_CONFIG_PATH,
  parseBumpversionConfig,
  readConfigAt,
  readConfigIfPresent,
  readExampleConfig,
} from './config';
export type {ParseConfigOptions} from './config';
export {loadVersionConfig, pairFileRegexes} from './versionSources';
export type {VersionSources} from './versionSources';
export type {
  ConfigEntry,
  ConflictBlock,
  ConflictContext,
  DriftPolicy,
  DriftReport,
  DriftRow,
  DriftStatus,
  FileOccurrence,
  FilePath,
  MergeStrategy,
  ResolvedBlock,
  VersionConfig,
} from './types';
