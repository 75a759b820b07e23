import fs from 'fs';
import path from 'path';
import type {Ref} from '@version-sync/vcs';
import {ConfigError, NotFoundError, ParseError} from './errors';
import type {RevisionReader} from './RevisionReader';
import {
  getDefaultParser,
  type VersionParser,
  type VersionSpec,
} from './Version';
import type {ConfigEntry, FilePath, VersionConfig} from './types';

export const DEFAULT_CONFIG_FILE = '.bumpversion.cfg';

const MAIN_SECTION = 'bumpversion';
const FILE_SECTION_RE = /^bumpversion:file(?:\([^)]*\))?:(.+)$/;
const SECTION_RE = /^\[(.+)\]\s*$/;
const OPTION_RE = /^([^=:\s][^=:]*?)\s*[=:]\s*(.*)$/;
const CURRENT_VERSION_PREFIX_RE = /^(\s*current_version\s*[=:]\s*)/i;

export const EXAMPLE_CONFIG_PATH: FilePath = path.join(
  __dirname,
  '..',
  'example.bumpversion.cfg',
);

type Section = {
  name: string;
  line: number;
  values: Map<string, string>;
};

export type ParseConfigOptions = {
  /** Repo-relative path of the config, used to resolve file sections. */
  configPath: FilePath;
  parser?: VersionParser;
};

function parseSections(text: string, configPath: FilePath): Array<Section> {
  let sections: Array<Section> = [];
  let seen = new Set<string>();
  let section: Section | null = null;
  let lastKey: string | null = null;

  let lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    let line = lines[i];
    let lineNumber = i + 1;

    if (line.trim() === '') {
      lastKey = null;
      continue;
    }

    if (/^\s*[#;]/.test(line)) {
      continue;
    }

    if (/^\s/.test(line) && section != null && lastKey != null) {
      let previous = section.values.get(lastKey) ?? '';
      let continued = line.trim();
      section.values.set(
        lastKey,
        previous === '' ? continued : `${previous}\n${continued}`,
      );
      continue;
    }

    let header = SECTION_RE.exec(line);
    if (header != null) {
      let name = header[1].trim();
      if (seen.has(name)) {
        throw new ConfigError(`Section [${name}] is declared twice`, {
          filePath: configPath,
          line: lineNumber,
        });
      }
      seen.add(name);
      section = {name, line: lineNumber, values: new Map()};
      sections.push(section);
      lastKey = null;
      continue;
    }

    let option = OPTION_RE.exec(line.trim());
    if (option == null || section == null) {
      throw new ConfigError(`Unable to parse line ${lineNumber}: ${line}`, {
        filePath: configPath,
        line: lineNumber,
      });
    }

    lastKey = option[1].toLowerCase();
    section.values.set(lastKey, option[2].trim());
  }

  return sections;
}

function resolveTarget(configPath: FilePath, target: string): FilePath {
  return path.posix.normalize(
    path.posix.join(
      path.posix.dirname(configPath),
      target.trim().replace(/\\/g, '/'),
    ),
  );
}

function parseCurrentVersion(
  rawVersion: string,
  configPath: FilePath,
  parser: VersionParser,
): VersionSpec {
  try {
    return parser.parse(rawVersion);
  } catch (err: unknown) {
    if (err instanceof ParseError) {
      throw new ConfigError(
        `current_version "${rawVersion}" in ${configPath} is not a valid version`,
        {filePath: configPath, hints: err.diagnostics[0]?.hints},
      );
    }
    throw err;
  }
}

/**
 * Parses a `.bumpversion.cfg` style config. The config file itself is the
 * first entry, followed by one entry per `[bumpversion:file:<path>]` section
 * in the order they are declared.
 */
export function parseBumpversionConfig(
  text: string,
  options: ParseConfigOptions,
): VersionConfig {
  let {configPath} = options;
  let parser = options.parser ?? getDefaultParser();
  let sections = parseSections(text, configPath);

  let main = sections.find((s) => s.name === MAIN_SECTION);
  if (main == null) {
    throw new ConfigError(`${configPath} has no [${MAIN_SECTION}] section`, {
      filePath: configPath,
      hints: ['Run `version-sync example-config` for a starting point'],
    });
  }

  let rawVersion = main.values.get('current_version');
  if (rawVersion == null || rawVersion === '') {
    throw new ConfigError(
      `${configPath} does not declare current_version in [${MAIN_SECTION}]`,
      {filePath: configPath, line: main.line},
    );
  }

  let currentVersion = parseCurrentVersion(rawVersion, configPath, parser);

  let variables = Object.fromEntries(main.values);
  let entries: Array<ConfigEntry> = [];

  for (let section of sections) {
    let match = FILE_SECTION_RE.exec(section.name);
    if (match == null) {
      continue;
    }

    entries.push({
      targetFile: resolveTarget(configPath, match[1]),
      search: section.values.get('search') ?? null,
      replace: section.values.get('replace') ?? null,
      currentVersion,
    });
  }

  let normalizedConfigPath = path.posix.normalize(configPath);
  if (!entries.some((e) => e.targetFile === normalizedConfigPath)) {
    let line = text
      .split(/\r?\n/)
      .find((l) => CURRENT_VERSION_PREFIX_RE.test(l));
    let prefix = line != null ? CURRENT_VERSION_PREFIX_RE.exec(line)?.[1] : null;
    entries.unshift({
      targetFile: normalizedConfigPath,
      search: `${prefix?.trimStart() ?? 'current_version = '}{current_version}`,
      replace: null,
      currentVersion,
    });
  }

  return {configPath: normalizedConfigPath, currentVersion, variables, entries};
}

/**
 * Reads and parses the config as it is at `revision`, or resolves with null
 * when the file does not exist there.
 */
export async function readConfigIfPresent(
  reader: RevisionReader,
  configPath: FilePath,
  revision: Ref,
  parser?: VersionParser,
): Promise<VersionConfig | null> {
  let text = await reader
    .readAt(configPath, revision)
    .catch((err: unknown) => {
      if (err instanceof NotFoundError) {
        return null;
      }
      throw err;
    });

  return text != null
    ? parseBumpversionConfig(text, {configPath, parser})
    : null;
}

/**
 * Reads and parses the config as it is at `revision`.
 */
export async function readConfigAt(
  reader: RevisionReader,
  configPath: FilePath,
  revision: Ref,
  parser?: VersionParser,
): Promise<VersionConfig> {
  let config = await readConfigIfPresent(reader, configPath, revision, parser);
  if (config == null) {
    throw new ConfigError(`${configPath} not found at ${revision}`, {
      filePath: configPath,
      hints: [
        'Pass --config <path> or set VERSION_CONFIG_FILE',
        'Pass --version-file <path> to check without a config',
        'Run `version-sync example-config` for a starting point',
      ],
    });
  }
  return config;
}

export function readExampleConfig(): string {
  return fs.readFileSync(EXAMPLE_CONFIG_PATH, 'utf8');
}
