import {ConfigError} from './errors';
import type {ConfigEntry} from './types';
import {
  GENERIC_VERSION_PATTERN,
  VersionParser,
  formatVersion,
  getDefaultParser,
  type VersionMatch,
  type VersionSpec,
} from './Version';

/**
 * A literal substring to look for. The version sits at
 * `text.slice(versionStart, versionEnd)`; `repeatStarts` are the offsets of
 * later `{current_version}` slots carrying the same version.
 */
export type LiteralSearchSpec = {
  kind: 'literal';
  text: string;
  versionStart: number;
  versionEnd: number;
  repeatStarts: Array<number>;
  version: VersionSpec;
};

export type PatternSearchSpec = {
  kind: 'pattern';
  pattern: VersionParser;
};

/**
 * The version is the first one `pattern` finds inside a match of `context`.
 */
export type ContextSearchSpec = {
  kind: 'context';
  context: RegExp;
  pattern: VersionParser;
};

export type SearchSpec =
  | LiteralSearchSpec
  | PatternSearchSpec
  | ContextSearchSpec;

export type SubstitutedTemplate = {
  text: string;
  versionStart: number;
  versionEnd: number;
  repeatStarts: Array<number>;
};

export type SearchSpecOptions = {
  parser?: VersionParser;
  /** Values for `{key}` placeholders other than `current_version`. */
  variables?: Record<string, string>;
};

const VERSION_KEY = 'current_version';
const PLACEHOLDER_RE = /\{\{|\}\}|\{([A-Za-z_][\w-]*)\}/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Substitutes `{key}` placeholders in `template`. `{{` and `}}` stand for
 * literal braces, unknown keys are left as written. Returns null when the
 * template has no `{current_version}` slot.
 */
export function substituteTemplate(
  template: string,
  version: string,
  variables: Record<string, string> = {},
): SubstitutedTemplate | null {
  let text = '';
  let versionStart = -1;
  let repeatStarts: Array<number> = [];
  let lastIndex = 0;

  for (let match of template.matchAll(PLACEHOLDER_RE)) {
    let index = match.index ?? 0;
    text += template.slice(lastIndex, index);
    lastIndex = index + match[0].length;

    let key = match[1];
    if (key == null) {
      text += match[0][0];
    } else if (key === VERSION_KEY) {
      if (versionStart === -1) {
        versionStart = text.length;
      } else {
        repeatStarts.push(text.length);
      }
      text += version;
    } else if (Object.hasOwn(variables, key)) {
      text += variables[key];
    } else {
      text += match[0];
    }
  }
  text += template.slice(lastIndex);

  if (versionStart === -1) {
    return null;
  }

  return {
    text,
    versionStart,
    versionEnd: versionStart + version.length,
    repeatStarts,
  };
}

function compileContext(source: string): RegExp {
  try {
    return new RegExp(source, 'g');
  } catch (err: unknown) {
    throw new ConfigError(
      `Invalid file pattern /${source}/: ${
        err instanceof Error ? err.message : String(err)
      }`,
      {hints: ['Check the values passed to --file-regexes']},
    );
  }
}

/**
 * Builds the search used to find `version` in the entry's file. An entry
 * pattern scopes the version pattern to its matches. A search template with
 * a `{current_version}` slot becomes a literal search, anything else falls
 * back to the version pattern.
 */
export function buildSearchSpec(
  entry: ConfigEntry,
  version: VersionSpec,
  options: SearchSpecOptions = {},
): SearchSpec {
  let parser = options.parser ?? getDefaultParser();
  if (entry.pattern != null) {
    return {
      kind: 'context',
      context: compileContext(entry.pattern),
      pattern: parser,
    };
  }

  if (entry.search != null) {
    let substituted = substituteTemplate(
      entry.search,
      formatVersion(version),
      options.variables,
    );
    if (substituted != null) {
      return {kind: 'literal', ...substituted, version};
    }
  }

  return {kind: 'pattern', pattern: parser};
}

/**
 * Turns a literal search into a pattern matching the same text with any
 * version in the version slot. Later slots must repeat that version.
 */
export function relaxSearchSpec(
  spec: LiteralSearchSpec,
  parser: VersionParser = getDefaultParser(),
): PatternSearchSpec {
  let slot = parser.hasVersionGroup ? GENERIC_VERSION_PATTERN : parser.source;
  let length = spec.versionEnd - spec.versionStart;
  let source =
    escapeRegExp(spec.text.slice(0, spec.versionStart)) +
    `(?<version>${slot})`;

  let last = spec.versionEnd;
  for (let start of spec.repeatStarts) {
    source += escapeRegExp(spec.text.slice(last, start)) + '\\k<version>';
    last = start + length;
  }
  source += escapeRegExp(spec.text.slice(last));

  return {kind: 'pattern', pattern: new VersionParser(source)};
}

function locateInContext(
  text: string,
  spec: ContextSearchSpec,
): VersionMatch | null {
  let re = new RegExp(spec.context);
  let match: RegExpExecArray | null;
  while ((match = re.exec(text)) != null) {
    if (match[0] === '') {
      re.lastIndex++;
      continue;
    }

    let found = spec.pattern.find(match[0]);
    if (found != null) {
      return {
        rawMatch: match[0],
        parsed: found.parsed,
        span: {
          start: match.index + found.span.start,
          end: match.index + found.span.end,
        },
      };
    }
  }
  return null;
}

/**
 * Returns the first occurrence of the spec in `text`, or null.
 */
export function locateVersion(
  text: string,
  spec: SearchSpec,
): VersionMatch | null {
  if (spec.kind === 'pattern') {
    return spec.pattern.find(text);
  }
  if (spec.kind === 'context') {
    return locateInContext(text, spec);
  }

  let index = text.indexOf(spec.text);
  if (index === -1) {
    return null;
  }

  return {
    rawMatch: spec.text,
    parsed: spec.version,
    span: {start: index + spec.versionStart, end: index + spec.versionEnd},
  };
}

/**
 * Looks for the literal first, then for the same template carrying another
 * version.
 */
export function locateVersionRelaxed(
  text: string,
  spec: SearchSpec,
  parser?: VersionParser,
): VersionMatch | null {
  let found = locateVersion(text, spec);
  if (found == null && spec.kind === 'literal') {
    found = locateVersion(text, relaxSearchSpec(spec, parser));
  }
  return found;
}
