import path from 'path';
import logger from '@version-sync/logger';
import type {Ref} from '@version-sync/vcs';
import {readConfigAt, readConfigIfPresent} from './config';
import {ParseError} from './errors';
import type {RevisionReader} from './RevisionReader';
import {getDefaultParser, type VersionParser, type VersionSpec} from './Version';
import type {ConfigEntry, FilePath, VersionConfig} from './types';

const ORIGIN = '@version-sync/core';

/**
 * Where a run takes its files from. All paths are repo-relative.
 */
export type VersionSources = {
  configPath: FilePath;
  /** File the version is read from. Null leaves it to the config. */
  versionFile: FilePath | null;
  /** Files checked instead of the config's file sections. */
  files: Array<FilePath>;
  /** Patterns for `files`, paired by position. */
  fileRegexes: Array<string>;
};

/**
 * Pairs each file with its pattern. Files without one get null, which means
 * the run's version pattern; extra patterns are dropped.
 */
export function pairFileRegexes(
  files: ReadonlyArray<FilePath>,
  fileRegexes: ReadonlyArray<string>,
): Array<string | null> {
  if (fileRegexes.length > 0 && fileRegexes.length !== files.length) {
    logger.warn({
      message:
        fileRegexes.length < files.length
          ? `Got ${fileRegexes.length} file patterns for ${files.length} files, the version pattern is used for the rest`
          : `Got ${fileRegexes.length} file patterns for ${files.length} files, ignoring the extra patterns`,
      origin: ORIGIN,
    });
  }
  return files.map((_, i) => fileRegexes[i] ?? null);
}

async function readVersionFile(
  reader: RevisionReader,
  versionFile: FilePath,
  revision: Ref,
  parser: VersionParser,
): Promise<VersionSpec> {
  let text = await reader.readAt(versionFile, revision);
  let found = parser.find(text);
  if (found == null) {
    throw new ParseError(
      'not-found',
      `No version found in ${versionFile} at ${revision}`,
      {
        filePath: versionFile,
        hints: [`Versions must match /${parser.source}/`],
      },
    );
  }
  return found.parsed;
}

function fileEntries(
  sources: VersionSources,
  currentVersion: VersionSpec,
): Array<ConfigEntry> {
  let patterns = pairFileRegexes(sources.files, sources.fileRegexes);
  return sources.files.map((file, i) => ({
    targetFile: path.posix.normalize(file),
    search: null,
    replace: null,
    pattern: patterns[i],
    currentVersion,
  }));
}

function dedupe(entries: Array<ConfigEntry>): Array<ConfigEntry> {
  let seen = new Set<FilePath>();
  return entries.filter((entry) => {
    if (seen.has(entry.targetFile)) {
      return false;
    }
    seen.add(entry.targetFile);
    return true;
  });
}

/**
 * Builds the entries of a run at `revision`. Without a version file this is
 * the config, its file sections replaced by `files` when any are given. With
 * one, the version file comes first and the config is optional: when it is
 * missing the version file's own version is the one every file must carry.
 */
export async function loadVersionConfig(
  reader: RevisionReader,
  sources: VersionSources,
  revision: Ref,
  parser: VersionParser = getDefaultParser(),
): Promise<VersionConfig> {
  let configPath = path.posix.normalize(sources.configPath);
  let versionFile =
    sources.versionFile != null
      ? path.posix.normalize(sources.versionFile)
      : null;

  if (versionFile == null || versionFile === configPath) {
    let config = await readConfigAt(reader, configPath, revision, parser);
    if (sources.files.length === 0) {
      return config;
    }
    return {
      ...config,
      entries: dedupe([
        ...config.entries.filter((e) => e.targetFile === config.configPath),
        ...fileEntries(sources, config.currentVersion),
      ]),
    };
  }

  let config = await readConfigIfPresent(reader, configPath, revision, parser);
  if (config == null) {
    logger.warn({
      message: `${configPath} not found at ${revision}, checking against ${versionFile}`,
      origin: ORIGIN,
      filePath: configPath,
    });
  }

  let currentVersion =
    config?.currentVersion ??
    (await readVersionFile(reader, versionFile, revision, parser));
  let versionEntry: ConfigEntry = {
    targetFile: versionFile,
    search: null,
    replace: null,
    currentVersion,
  };

  let others =
    sources.files.length > 0 || config == null
      ? fileEntries(sources, currentVersion)
      : config.entries;

  return {
    configPath: config?.configPath ?? versionFile,
    currentVersion,
    variables: config?.variables ?? {},
    entries: dedupe([versionEntry, ...others]),
  };
}
