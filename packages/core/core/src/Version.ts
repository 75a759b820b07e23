import {ConfigError, ParseError} from './errors';

/**
 * A parsed version. `components` hold the numeric values used for ordering,
 * `text` the same components as written (leading zeros kept) so that
 * formatting reproduces the input.
 */
export type VersionSpec = Readonly<{
  components: ReadonlyArray<number>;
  text: ReadonlyArray<string>;
  label: string | null;
}>;

export type Span = {start: number; end: number};

export type VersionMatch = {
  /** The full text matched by the pattern. */
  rawMatch: string;
  parsed: VersionSpec;
  /** Where the version text sits in the searched string. */
  span: Span;
};

/** `X.Y.Z` with an optional `-label` or `+build` suffix. */
export const DEFAULT_VERSION_PATTERN =
  '\\d+\\.\\d+\\.\\d+(?:[-+][0-9A-Za-z]+(?:[.+-][0-9A-Za-z]+)*)?';

/**
 * Dot separated digit groups followed by an optional label, with no fixed
 * arity. Used where the version slot of a template has to accept whatever a
 * previous revision held.
 */
export const GENERIC_VERSION_PATTERN =
  '\\d+(?:\\.\\d+)*(?:[-+][0-9A-Za-z]+(?:[.+-][0-9A-Za-z]+)*)?';

const VERSION_TEXT_RE = /^(\d+(?:\.\d+)*)(.*)$/s;
const NAMED_VERSION_GROUP = '(?<version>';

function compile(source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err: unknown) {
    throw new ConfigError(
      `Invalid version pattern /${source}/: ${
        err instanceof Error ? err.message : String(err)
      }`,
      {hints: ['Check the value passed to --version-regex or VERSION_REGEX']},
    );
  }
}

function parseVersionText(versionText: string, raw: string): VersionSpec {
  let match = VERSION_TEXT_RE.exec(versionText);
  if (match == null) {
    throw new ParseError(
      'malformed',
      `"${raw}" does not start with numeric version components`,
    );
  }

  let text = Object.freeze(match[1].split('.'));
  return Object.freeze({
    components: Object.freeze(text.map((part) => Number(part))),
    text,
    label: match[2] === '' ? null : match[2],
  });
}

function tryParseVersionText(versionText: string): VersionSpec | null {
  return VERSION_TEXT_RE.test(versionText)
    ? parseVersionText(versionText, versionText)
    : null;
}

/**
 * Parses and locates versions using a configurable pattern. When the pattern
 * declares a `version` named group, only that group is taken as the version;
 * the rest of the match is context.
 */
export class VersionParser {
  readonly source: string;
  readonly hasVersionGroup: boolean;
  #anchored: RegExp;
  #search: RegExp;

  constructor(pattern: RegExp | string = DEFAULT_VERSION_PATTERN) {
    let flags = '';
    if (typeof pattern === 'string') {
      this.source = pattern;
    } else {
      this.source = pattern.source;
      flags = pattern.flags.replace(/[dgy]/g, '');
    }

    this.hasVersionGroup = this.source.includes(NAMED_VERSION_GROUP);
    this.#anchored = compile(`^(?:${this.source})$`, flags);
    this.#search = compile(this.source, flags + 'dg');
  }

  /**
   * Parses `raw`, which must match the pattern in full.
   */
  parse(raw: string): VersionSpec {
    let match = this.#anchored.exec(raw);
    if (match == null) {
      throw new ParseError('malformed', `"${raw}" is not a valid version`, {
        hints: [`Versions must match /${this.source}/`],
      });
    }

    return parseVersionText(match.groups?.version ?? match[0], raw);
  }

  /**
   * Finds the first occurrence of the pattern at or after `from` whose
   * version text parses.
   */
  find(text: string, from: number = 0): VersionMatch | null {
    let re = new RegExp(this.#search);
    re.lastIndex = from;

    let match: RegExpExecArray | null;
    while ((match = re.exec(text)) != null) {
      if (match[0] === '') {
        re.lastIndex++;
        continue;
      }

      let versionText = match.groups?.version ?? match[0];
      let groupSpan = match.indices?.groups?.version;
      let start = groupSpan != null ? groupSpan[0] : match.index;

      let parsed = tryParseVersionText(versionText);
      if (parsed == null) {
        continue;
      }

      return {
        rawMatch: match[0],
        parsed,
        span: {start, end: start + versionText.length},
      };
    }

    return null;
  }

  format(version: VersionSpec): string {
    return formatVersion(version);
  }
}

let defaultParser: VersionParser | null = null;

export function getDefaultParser(): VersionParser {
  if (defaultParser == null) {
    defaultParser = new VersionParser();
  }
  return defaultParser;
}

export function parseVersion(
  raw: string,
  options: {pattern?: RegExp | string} = {},
): VersionSpec {
  let parser =
    options.pattern != null
      ? new VersionParser(options.pattern)
      : getDefaultParser();
  return parser.parse(raw);
}

export function formatVersion(version: VersionSpec): string {
  return version.text.join('.') + (version.label ?? '');
}

function compareDigits(a: string, b: string): number {
  let x = a.replace(/^0+(?=\d)/, '');
  let y = b.replace(/^0+(?=\d)/, '');
  if (x.length !== y.length) {
    return x.length < y.length ? -1 : 1;
  }
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Orders versions component by component, numerically. A version that is a
 * strict prefix of another orders first. On equal components a labelled
 * version (`1.0.0-rc.1`) orders before the unlabelled one, and two labels
 * compare by UTF-16 code unit.
 */
export function compareVersions(a: VersionSpec, b: VersionSpec): -1 | 0 | 1 {
  let length = Math.min(a.text.length, b.text.length);
  for (let i = 0; i < length; i++) {
    let result = compareDigits(a.text[i], b.text[i]);
    if (result !== 0) {
      return result < 0 ? -1 : 1;
    }
  }

  if (a.text.length !== b.text.length) {
    return a.text.length < b.text.length ? -1 : 1;
  }

  if (a.label === b.label) {
    return 0;
  }
  if (a.label == null) {
    return 1;
  }
  if (b.label == null) {
    return -1;
  }
  return a.label < b.label ? -1 : 1;
}

export function versionsEqual(a: VersionSpec, b: VersionSpec): boolean {
  return compareVersions(a, b) === 0;
}
