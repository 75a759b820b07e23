import path from 'path';
import ThrowableDiagnostic, {anyToDiagnostic} from '@version-sync/diagnostic';
import type {FileSystem} from '@version-sync/fs';
import logger from '@version-sync/logger';
import type {VersionControl} from '@version-sync/vcs';
import {ConflictResolver, type ConflictResolution} from './ConflictResolver';
import {buildSearchSpec} from './SearchSpec';
import {getDefaultParser, type VersionParser} from './Version';
import type {FilePath, MergeStrategy, VersionConfig} from './types';

export type MergeOptions = {
  vcs: VersionControl;
  fs: FileSystem;
  parser?: VersionParser;
  strategy?: MergeStrategy;
};

export type MergeFileResult = {
  file: FilePath;
  resolution: ConflictResolution | null;
  error?: ThrowableDiagnostic;
};

export type MergeReport = {
  ok: boolean;
  files: Array<MergeFileResult>;
};

/**
 * Resolves version conflicts in every configured file that has unmerged
 * entries. Files are handled one after another; a malformed file does not
 * stop the others.
 */
export async function mergeConflicts(
  config: VersionConfig,
  options: MergeOptions,
): Promise<MergeReport> {
  let {vcs} = options;
  let parser = options.parser ?? getDefaultParser();
  let resolver = new ConflictResolver({
    fs: options.fs,
    parser,
    strategy: options.strategy,
  });

  let conflicted = await vcs.conflictedFiles();
  let files: Array<MergeFileResult> = [];

  for (let entry of config.entries) {
    if (!conflicted.has(entry.targetFile)) {
      continue;
    }

    let search = buildSearchSpec(entry, entry.currentVersion, {
      parser,
      variables: config.variables,
    });

    try {
      let resolution = await resolver.resolveFile(
        path.join(vcs.rootDir, entry.targetFile),
        search,
      );
      files.push({file: entry.targetFile, resolution});
    } catch (err: unknown) {
      let error =
        err instanceof ThrowableDiagnostic
          ? err
          : new ThrowableDiagnostic({diagnostic: anyToDiagnostic(err)});
      logger.error(error.diagnostics);
      files.push({file: entry.targetFile, resolution: null, error});
    }
  }

  if (files.length === 0) {
    logger.info({
      message: 'No configured file has merge conflicts',
      origin: '@version-sync/core',
    });
  }

  return {
    ok: files.every(
      ({resolution, error}) =>
        error == null &&
        resolution != null &&
        resolution.unresolved.length === 0,
    ),
    files,
  };
}
