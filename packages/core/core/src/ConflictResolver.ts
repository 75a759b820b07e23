import type {FileSystem} from '@version-sync/fs';
import logger from '@version-sync/logger';
import {MalformedConflictError} from './errors';
import {
  locateVersion,
  relaxSearchSpec,
  type SearchSpec,
} from './SearchSpec';
import {
  compareVersions,
  formatVersion,
  getDefaultParser,
  type VersionMatch,
  type VersionParser,
} from './Version';
import type {
  ConflictBlock,
  FilePath,
  MergeStrategy,
  ResolvedBlock,
} from './types';

const ORIGIN = '@version-sync/core';

const START_RE = /^<{7}(?:\s(.*))?$/;
const BASE_RE = /^\|{7}(?:\s.*)?$/;
const SEPARATOR_RE = /^={7}$/;
const END_RE = /^>{7}(?:\s(.*))?$/;

export const MERGE_STRATEGIES: ReadonlyArray<MergeStrategy> = [
  'higher',
  'lower',
  'ours',
  'theirs',
];

export type ConflictResolution = {
  text: string;
  resolved: Array<ResolvedBlock>;
  unresolved: Array<ConflictBlock>;
  errors: Array<MalformedConflictError>;
};

export type ResolveConflictsOptions = {
  /** How the version is found inside each side. Defaults to the parser. */
  search?: SearchSpec | null;
  parser?: VersionParser;
  strategy?: MergeStrategy;
  file?: FilePath;
};

type PendingBlock = {
  startLine: number;
  oursLabel: string;
  /** Every raw line of the block so far, markers included. */
  raw: Array<string>;
  ours: Array<string>;
  base: Array<string> | null;
  theirs: Array<string>;
};

type ScanState =
  | {kind: 'outside'}
  | {kind: 'ours'; block: PendingBlock}
  | {kind: 'base'; block: PendingBlock}
  | {kind: 'theirs'; block: PendingBlock}
  // A malformed block whose remaining lines are passed through up to its end
  // marker.
  | {kind: 'broken'};

type Marker = 'start' | 'base' | 'separator' | 'end';

function splitLines(text: string): Array<string> {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function stripEol(line: string): string {
  return line.replace(/\r?\n$/, '');
}

function markerOf(line: string): Marker | null {
  let content = stripEol(line);
  if (START_RE.test(content)) {
    return 'start';
  }
  if (BASE_RE.test(content)) {
    return 'base';
  }
  if (SEPARATOR_RE.test(content)) {
    return 'separator';
  }
  if (END_RE.test(content)) {
    return 'end';
  }
  return null;
}

function label(re: RegExp, line: string): string {
  return re.exec(stripEol(line))?.[1] ?? '';
}

function startBlock(line: string, lineNumber: number): PendingBlock {
  return {
    startLine: lineNumber,
    oursLabel: label(START_RE, line),
    raw: [line],
    ours: [],
    base: null,
    theirs: [],
  };
}

function findVersion(
  text: string,
  search: SearchSpec | null,
  parser: VersionParser,
): VersionMatch | null {
  if (search == null) {
    return parser.find(text);
  }
  return locateVersion(
    text,
    search.kind === 'literal' ? relaxSearchSpec(search, parser) : search,
  );
}

function pickSide(
  ours: VersionMatch | null,
  theirs: VersionMatch | null,
  strategy: MergeStrategy,
): 'ours' | 'theirs' | null {
  if (ours == null || theirs == null) {
    if (ours != null) {
      return 'ours';
    }
    return theirs != null ? 'theirs' : null;
  }

  let order = compareVersions(ours.parsed, theirs.parsed);
  switch (strategy) {
    case 'higher':
      return order >= 0 ? 'ours' : 'theirs';
    case 'lower':
      return order <= 0 ? 'ours' : 'theirs';
    case 'ours':
    case 'theirs':
      return strategy;
  }
}

/**
 * Replaces each `<<<<<<<` ... `>>>>>>>` block in `text` by the side carrying
 * the version chosen by `strategy`. Blocks where neither side has a version
 * are left as they are. Malformed blocks are left as they are and reported in
 * `errors`; scanning carries on after them.
 */
export function resolveConflicts(
  text: string,
  options: ResolveConflictsOptions = {},
): ConflictResolution {
  let parser = options.parser ?? getDefaultParser();
  let search = options.search ?? null;
  let strategy = options.strategy ?? 'higher';
  let file = options.file ?? null;

  let output: Array<string> = [];
  let resolution: ConflictResolution = {
    text: '',
    resolved: [],
    unresolved: [],
    errors: [],
  };

  let malformed = (message: string, lineNumber: number) => {
    resolution.errors.push(
      new MalformedConflictError(message, lineNumber, options.file),
    );
  };

  let complete = (block: PendingBlock, endLine: string, lineNumber: number) => {
    let conflict: ConflictBlock = {
      file,
      oursText: block.ours.join(''),
      theirsText: block.theirs.join(''),
      baseText: block.base != null ? block.base.join('') : null,
      context: {
        startLine: block.startLine,
        endLine: lineNumber,
        oursLabel: block.oursLabel,
        theirsLabel: label(END_RE, endLine),
      },
    };

    let ours = findVersion(conflict.oursText, search, parser);
    let theirs = findVersion(conflict.theirsText, search, parser);
    let side = pickSide(ours, theirs, strategy);
    let winner = side === 'ours' ? ours : side === 'theirs' ? theirs : null;

    if (side == null || winner == null) {
      output.push(...block.raw, endLine);
      resolution.unresolved.push(conflict);
      return;
    }

    output.push(conflict[side === 'ours' ? 'oursText' : 'theirsText']);
    resolution.resolved.push({block: conflict, side, version: winner.parsed});
  };

  let state: ScanState = {kind: 'outside'};
  let lines = splitLines(text);

  for (let i = 0; i < lines.length; i++) {
    let line = lines[i];
    let lineNumber = i + 1;
    let marker = markerOf(line);

    if (marker === 'start') {
      if (state.kind !== 'outside' && state.kind !== 'broken') {
        malformed(
          `Conflict started at line ${state.block.startLine} is not closed before the next one starts`,
          lineNumber,
        );
        output.push(...state.block.raw);
      }
      state = {kind: 'ours', block: startBlock(line, lineNumber)};
      continue;
    }

    switch (state.kind) {
      case 'outside':
        if (marker != null) {
          malformed(`Conflict ${marker} marker outside a conflict`, lineNumber);
        }
        output.push(line);
        break;

      case 'broken':
        output.push(line);
        if (marker === 'end') {
          state = {kind: 'outside'};
        }
        break;

      case 'ours':
      case 'base': {
        let {block}: {block: PendingBlock} = state;
        block.raw.push(line);
        if (marker === 'separator') {
          state = {kind: 'theirs', block};
        } else if (marker === 'base' && state.kind === 'ours') {
          block.base = [];
          state = {kind: 'base', block};
        } else if (marker != null) {
          malformed(
            `Unexpected ${marker} marker in conflict started at line ${block.startLine}`,
            lineNumber,
          );
          output.push(...block.raw);
          state = marker === 'end' ? {kind: 'outside'} : {kind: 'broken'};
        } else if (state.kind === 'ours') {
          block.ours.push(line);
        } else {
          block.base?.push(line);
        }
        break;
      }

      case 'theirs': {
        let {block} = state;
        if (marker === 'end') {
          complete(block, line, lineNumber);
          state = {kind: 'outside'};
        } else if (marker != null) {
          malformed(
            `Unexpected ${marker} marker in conflict started at line ${block.startLine}`,
            lineNumber,
          );
          output.push(...block.raw, line);
          state = {kind: 'broken'};
        } else {
          block.raw.push(line);
          block.theirs.push(line);
        }
        break;
      }
    }
  }

  if (state.kind !== 'outside' && state.kind !== 'broken') {
    malformed(
      `Conflict started at line ${state.block.startLine} is not closed before the end of the file`,
      lines.length,
    );
    output.push(...state.block.raw);
  }

  resolution.text = output.join('');
  return resolution;
}

export type ConflictResolverOptions = {
  fs: FileSystem;
  parser?: VersionParser;
  strategy?: MergeStrategy;
};

/**
 * Resolves version conflicts in working tree files.
 */
export class ConflictResolver {
  #fs: FileSystem;
  #parser: VersionParser;
  #strategy: MergeStrategy;

  constructor(options: ConflictResolverOptions) {
    this.#fs = options.fs;
    this.#parser = options.parser ?? getDefaultParser();
    this.#strategy = options.strategy ?? 'higher';
  }

  /**
   * Resolves the conflicts in `filePath` and writes the file back when at
   * least one block was resolved. Malformed blocks are thrown together after
   * the write.
   */
  async resolveFile(
    filePath: FilePath,
    search: SearchSpec | null = null,
  ): Promise<ConflictResolution> {
    let text = await this.#fs.readFile(filePath);
    let resolution = resolveConflicts(text, {
      search,
      parser: this.#parser,
      strategy: this.#strategy,
      file: filePath,
    });

    for (let {block, side, version} of resolution.resolved) {
      logger.info({
        message: `Kept ${side} (${formatVersion(version)}) for the conflict at line ${block.context.startLine}`,
        origin: ORIGIN,
        filePath,
        line: block.context.startLine,
      });
    }

    for (let block of resolution.unresolved) {
      logger.warn({
        message: 'No version found on either side of the conflict',
        origin: ORIGIN,
        filePath,
        line: block.context.startLine,
      });
    }

    if (resolution.resolved.length > 0) {
      await this.#fs.writeFile(filePath, resolution.text);
    }

    if (resolution.errors.length > 0) {
      throw MalformedConflictError.combine(resolution.errors);
    }

    return resolution;
  }
}
