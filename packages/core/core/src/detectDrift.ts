import path from 'path';
import ThrowableDiagnostic, {anyToDiagnostic} from '@version-sync/diagnostic';
import logger from '@version-sync/logger';
import {PromiseQueue} from '@version-sync/utils';
import type {Ref, VersionControl} from '@version-sync/vcs';
import {IOError, NotFoundError, ParseError} from './errors';
import {RevisionReader} from './RevisionReader';
import {buildSearchSpec, locateVersionRelaxed} from './SearchSpec';
import {
  compareVersions,
  formatVersion,
  getDefaultParser,
  versionsEqual,
  type VersionMatch,
  type VersionParser,
  type VersionSpec,
} from './Version';
import type {
  ConfigEntry,
  DriftPolicy,
  DriftReport,
  DriftRow,
  DriftStatus,
  FileOccurrence,
  FilePath,
} from './types';

const ORIGIN = '@version-sync/core';
const DEFAULT_CONCURRENCY = 4;

const IN_SYNC: Record<DriftStatus, boolean> = {
  bumped: true,
  unchanged: true,
  'new-file': true,
  'not-bumped': false,
  regressed: false,
  mismatch: false,
  error: false,
};

export type DriftRefs = {
  baseline: Ref;
  head: Ref;
};

export type DriftOptions = {
  vcs: VersionControl;
  parser?: VersionParser;
  variables?: Record<string, string>;
  policy?: DriftPolicy;
  /**
   * Repo-relative directory the `repository` policy looks for changes in.
   * Defaults to the whole repository.
   */
  scope?: FilePath;
  /** Entries checked in parallel. */
  concurrency?: number;
};

type DriftContext = {
  refs: DriftRefs;
  reader: RevisionReader;
  parser: VersionParser;
  variables: Record<string, string>;
  policy: DriftPolicy;
  changedFiles: () => Promise<Set<string>>;
};

function makeRow(
  file: string,
  status: DriftStatus,
  baseline: FileOccurrence | null,
  head: FileOccurrence | null,
): DriftRow {
  return {
    file,
    baselineVersion: baseline?.parsed ?? null,
    headVersion: head?.parsed ?? null,
    inSync: IN_SYNC[status],
    status,
    occurrences: [baseline, head].filter(
      (o): o is FileOccurrence => o != null,
    ),
  };
}

function toOccurrence(
  file: FilePath,
  revision: Ref,
  text: string,
  match: VersionMatch,
): FileOccurrence {
  let start = Buffer.byteLength(text.slice(0, match.span.start), 'utf8');
  let length = Buffer.byteLength(
    text.slice(match.span.start, match.span.end),
    'utf8',
  );
  return {
    file,
    revision,
    rawMatch: match.rawMatch,
    parsed: match.parsed,
    span: {start, end: start + length},
  };
}

function toThrowable(err: unknown): ThrowableDiagnostic {
  return err instanceof ThrowableDiagnostic
    ? err
    : new ThrowableDiagnostic({diagnostic: anyToDiagnostic(err)});
}

async function readOptional(
  reader: RevisionReader,
  file: string,
  revision: Ref,
): Promise<Buffer | null> {
  try {
    return await reader.readBytesAt(file, revision);
  } catch (err: unknown) {
    if (err instanceof NotFoundError) {
      return null;
    }
    throw err;
  }
}

async function checkEntry(
  entry: ConfigEntry,
  ctx: DriftContext,
): Promise<DriftRow> {
  let {refs, reader, parser} = ctx;
  let file = entry.targetFile;
  let spec = buildSearchSpec(entry, entry.currentVersion, {
    parser,
    variables: ctx.variables,
  });

  let headBytes = await reader.readBytesAt(file, refs.head);
  let headText = headBytes.toString('utf8');
  let headMatch = locateVersionRelaxed(headText, spec, parser);
  if (headMatch == null) {
    throw new ParseError(
      'not-found',
      `No version found in ${file} at ${refs.head}`,
      {filePath: file},
    );
  }
  let head = toOccurrence(file, refs.head, headText, headMatch);

  let baselineBytes = await readOptional(reader, file, refs.baseline);
  let baseline: FileOccurrence | null = null;
  if (baselineBytes != null) {
    let baselineText = baselineBytes.toString('utf8');
    let baselineMatch = locateVersionRelaxed(baselineText, spec, parser);
    if (baselineMatch == null) {
      throw new ParseError(
        'not-found',
        `No version found in ${file} at ${refs.baseline}`,
        {filePath: file},
      );
    }
    baseline = toOccurrence(file, refs.baseline, baselineText, baselineMatch);
  }

  if (!versionsEqual(head.parsed, entry.currentVersion)) {
    return makeRow(file, 'mismatch', baseline, head);
  }

  if (baselineBytes == null || baseline == null) {
    return makeRow(file, 'new-file', null, head);
  }

  let order = compareVersions(head.parsed, baseline.parsed);
  if (order !== 0) {
    return makeRow(file, order > 0 ? 'bumped' : 'regressed', baseline, head);
  }

  let unchanged =
    ctx.policy === 'content'
      ? headBytes.equals(baselineBytes)
      : (await ctx.changedFiles()).size === 0;

  return makeRow(file, unchanged ? 'unchanged' : 'not-bumped', baseline, head);
}

function withinScope(files: Set<string>, scope?: FilePath): Set<string> {
  let dir = scope != null ? path.posix.normalize(scope).replace(/\/$/, '') : '.';
  if (dir === '.' || dir === '') {
    return files;
  }
  return new Set([...files].filter((f) => f.startsWith(dir + '/')));
}

function describe(row: DriftRow): string {
  let baseline =
    row.baselineVersion != null ? formatVersion(row.baselineVersion) : '-';
  let head = row.headVersion != null ? formatVersion(row.headVersion) : '-';
  return `${row.file}: ${row.status} (${baseline} -> ${head})`;
}

function logRow(row: DriftRow): void {
  logger.verbose({message: describe(row), origin: ORIGIN, filePath: row.file});

  if (row.error != null) {
    logger.error(
      row.error.diagnostics.map((d) => ({
        ...d,
        filePath: d.filePath ?? row.file,
      })),
    );
  } else if (!row.inSync) {
    logger.warn({
      message: `${describe(row)}, version needs to be bumped`,
      origin: ORIGIN,
      filePath: row.file,
    });
  }
}

/**
 * Compares the version each entry's file carries at `baseline` and `head`.
 * Every entry gets a row, in entry order; an entry that fails to be read or
 * parsed gets an `error` row instead of stopping the others.
 */
export async function detectDrift(
  entries: ReadonlyArray<ConfigEntry>,
  refs: DriftRefs,
  options: DriftOptions,
): Promise<DriftReport> {
  let {vcs} = options;
  let changed: Promise<Set<string>> | null = null;
  let ctx: DriftContext = {
    refs,
    reader: new RevisionReader(vcs),
    parser: options.parser ?? getDefaultParser(),
    variables: options.variables ?? {},
    policy: options.policy ?? 'content',
    changedFiles: () => {
      if (changed == null) {
        changed = vcs
          .diffNameOnly(refs.baseline, refs.head)
          .then((files) => withinScope(files, options.scope))
          .catch((err: unknown) => {
            throw new IOError(
              `Unable to diff ${refs.baseline} and ${refs.head}: ${
                err instanceof Error ? err.message : String(err)
              }`,
              {cause: err},
            );
          });
      }
      return changed;
    },
  };

  let queue = new PromiseQueue<DriftRow>({
    maxConcurrent: options.concurrency ?? DEFAULT_CONCURRENCY,
  });

  for (let entry of entries) {
    queue.add(async () => {
      let row: DriftRow;
      try {
        row = await checkEntry(entry, ctx);
      } catch (err: unknown) {
        row = {
          ...makeRow(entry.targetFile, 'error', null, null),
          error: toThrowable(err),
        };
      }
      logRow(row);
      return row;
    });
  }

  let rows = await queue.run();
  return {ok: rows.every((row) => row.inSync), rows};
}
