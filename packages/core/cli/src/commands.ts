import {readFileSync} from 'fs';
import path from 'path';
import type {Chalk} from 'chalk';
import {
  RevisionReader,
  VersionParser,
  detectDrift,
  getDefaultParser,
  loadVersionConfig,
  mergeConflicts,
  readExampleConfig,
  type FilePath,
  type MergeStrategy,
  type VersionConfig,
} from '@version-sync/core';
import type {FileSystem} from '@version-sync/fs';
import {resolveBaseline, type VersionControl} from '@version-sync/vcs';
import type {RunOptions} from './normalizeOptions';
import {formatMergeReport, formatReport, formatReportJson} from './report';

export const README_PATH: FilePath = path.join(__dirname, '..', 'README.md');

export type CommandContext = {
  vcs: VersionControl;
  fs: FileSystem;
  chalk: Chalk;
  write: (output: string) => void;
};

/**
 * Resolves `filePath` against the working directory and makes it relative to
 * the repository root, with forward slashes.
 */
export function toRepoPath(
  rootDir: FilePath,
  cwd: FilePath,
  filePath: FilePath,
): FilePath {
  let relative = path.relative(rootDir, path.resolve(cwd, filePath));
  return relative.split(path.sep).join('/');
}

function createParser(options: RunOptions): VersionParser {
  return options.versionPattern != null
    ? new VersionParser(options.versionPattern)
    : getDefaultParser();
}

function loadConfig(
  options: RunOptions,
  {vcs, fs}: CommandContext,
  parser: VersionParser,
): Promise<VersionConfig> {
  let cwd = fs.cwd();
  let repoPath = (p: FilePath) => toRepoPath(vcs.rootDir, cwd, p);

  return loadVersionConfig(
    new RevisionReader(vcs),
    {
      configPath: repoPath(options.configPath),
      versionFile:
        options.versionFile != null ? repoPath(options.versionFile) : null,
      files: options.files.map(repoPath),
      fileRegexes: options.fileRegexes,
    },
    options.current,
    parser,
  );
}

/**
 * Checks every configured file for drift and prints the report. Resolves
 * with whether all files are in sync.
 */
export async function runCheck(
  options: RunOptions,
  ctx: CommandContext,
): Promise<boolean> {
  let {vcs, fs, chalk, write} = ctx;
  let parser = createParser(options);
  let baseline = await resolveBaseline(vcs, options.base);
  let config = await loadConfig(options, ctx, parser);

  let report = await detectDrift(
    config.entries,
    {baseline, head: options.current},
    {
      vcs,
      parser,
      variables: config.variables,
      policy: options.policy,
      scope: toRepoPath(vcs.rootDir, fs.cwd(), '.'),
      concurrency: options.concurrency,
    },
  );

  write(options.json ? formatReportJson(report) : formatReport(report, chalk));
  return report.ok;
}

/**
 * Resolves version conflicts in the configured files. The config is read at
 * `options.current`, since the working tree copy may be conflicted itself.
 */
export async function runMerge(
  strategy: MergeStrategy,
  options: RunOptions,
  ctx: CommandContext,
): Promise<boolean> {
  let {vcs, fs, chalk, write} = ctx;
  let parser = createParser(options);
  let config = await loadConfig(options, ctx, parser);
  let report = await mergeConflicts(config, {vcs, fs, parser, strategy});

  let output = formatMergeReport(report, chalk);
  if (output !== '') {
    write(output);
  }
  return report.ok;
}

export function runExampleConfig({write}: Pick<CommandContext, 'write'>): void {
  write(readExampleConfig());
}

export function runReadme({write}: Pick<CommandContext, 'write'>): void {
  write(readFileSync(README_PATH, 'utf8'));
}
