import type ThrowableDiagnostic from '@version-sync/diagnostic';
import type {Ref} from '@version-sync/vcs';
import type {Span, VersionSpec} from './Version';

export type FilePath = string;

/**
 * One file declared in the config. `search` and `replace` are templates in
 * which `{current_version}` and the config's other top-level keys are
 * substituted. `pattern`, given on the command line, is a regular expression
 * whose matches hold the version and takes precedence over `search`.
 */
export type ConfigEntry = {
  targetFile: FilePath;
  search: string | null;
  replace: string | null;
  pattern?: string | null;
  currentVersion: VersionSpec;
};

export type VersionConfig = {
  /**
   * Repo-relative path of the config file, or of the version file when the
   * run has no config.
   */
  configPath: FilePath;
  currentVersion: VersionSpec;
  /** Top-level keys of the config, available to templates. */
  variables: Record<string, string>;
  entries: Array<ConfigEntry>;
};

/** A version found in a file at a revision. `span` is in bytes. */
export type FileOccurrence = {
  file: FilePath;
  revision: Ref;
  rawMatch: string;
  parsed: VersionSpec;
  span: Span;
};

export type DriftStatus =
  | 'bumped'
  | 'unchanged'
  | 'new-file'
  | 'not-bumped'
  | 'regressed'
  | 'mismatch'
  | 'error';

export type DriftRow = {
  file: FilePath;
  baselineVersion: VersionSpec | null;
  headVersion: VersionSpec | null;
  inSync: boolean;
  status: DriftStatus;
  /** Where the version was found, baseline first. */
  occurrences: Array<FileOccurrence>;
  error?: ThrowableDiagnostic;
};

export type DriftReport = {
  ok: boolean;
  rows: Array<DriftRow>;
};

/**
 * How equal versions at baseline and head are judged. `content` compares the
 * file's bytes; `repository` requires the whole repository to be unchanged
 * between the two refs.
 */
export type DriftPolicy = 'content' | 'repository';

export type MergeStrategy = 'higher' | 'lower' | 'ours' | 'theirs';

export type ConflictContext = {
  /** 1-based line of the `<<<<<<<` marker. */
  startLine: number;
  /** 1-based line of the `>>>>>>>` marker. */
  endLine: number;
  oursLabel: string;
  theirsLabel: string;
};

export type ConflictBlock = {
  file: FilePath | null;
  oursText: string;
  theirsText: string;
  /** Common ancestor section of a diff3 style conflict. */
  baseText: string | null;
  context: ConflictContext;
};

export type ResolvedBlock = {
  block: ConflictBlock;
  side: 'ours' | 'theirs';
  version: VersionSpec;
};
