import {InvalidArgumentError} from 'commander';
import {DEFAULT_CONFIG_FILE, MERGE_STRATEGIES} from '@version-sync/core';
import type {DriftPolicy, MergeStrategy} from '@version-sync/core';
import type {LogLevel} from '@version-sync/logger';

const LOG_LEVELS: ReadonlyArray<LogLevel> = [
  'none',
  'error',
  'warn',
  'info',
  'verbose',
];
const POLICIES: ReadonlyArray<DriftPolicy> = ['content', 'repository'];
const DEFAULT_CONCURRENCY = 4;

/** Flags as commander hands them over. */
export interface Flags {
  base?: string;
  current?: string;
  config?: string;
  versionFile?: string;
  versionRegex?: string;
  files?: Array<string>;
  fileRegexes?: Array<string>;
  policy?: DriftPolicy;
  concurrency?: number;
  json?: boolean;
  logLevel?: LogLevel;
}

export type Env = Record<string, string | undefined>;

/**
 * Everything a run needs. Built once from flags and the environment; nothing
 * past this point reads `process.env`.
 */
export type RunOptions = {
  /** Explicit baseline, or null to try the default branches. */
  base: string | null;
  current: string;
  /** As given, relative to the working directory unless absolute. */
  configPath: string;
  versionFile: string | null;
  versionPattern: string | null;
  files: Array<string>;
  fileRegexes: Array<string>;
  policy: DriftPolicy;
  concurrency: number;
  json: boolean;
  logLevel: LogLevel;
};

function oneOf<T extends string>(
  values: ReadonlyArray<T>,
  value: string,
): T | undefined {
  return values.find((v) => v === value);
}

export function parseLogLevel(value: string): LogLevel {
  let level = oneOf(LOG_LEVELS, value);
  if (level == null) {
    throw new InvalidArgumentError(
      `Expected one of ${LOG_LEVELS.join(', ')}.`,
    );
  }
  return level;
}

export function parsePolicy(value: string): DriftPolicy {
  let policy = oneOf(POLICIES, value);
  if (policy == null) {
    throw new InvalidArgumentError(`Expected one of ${POLICIES.join(', ')}.`);
  }
  return policy;
}

export function parseStrategy(value: string): MergeStrategy {
  let strategy = oneOf(MERGE_STRATEGIES, value);
  if (strategy == null) {
    throw new InvalidArgumentError(
      `Expected one of ${MERGE_STRATEGIES.join(', ')}.`,
    );
  }
  return strategy;
}

export function parseConcurrency(value: string): number {
  let concurrency = Number(value);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidArgumentError(`${value} is not a positive integer.`);
  }
  return concurrency;
}

function fromEnv(env: Env, name: string): string | undefined {
  let value = env[name];
  return value != null && value.trim() !== '' ? value.trim() : undefined;
}

export function normalizeOptions(flags: Flags, env: Env): RunOptions {
  return {
    base: flags.base ?? fromEnv(env, 'VERSION_BASE') ?? null,
    current: flags.current ?? fromEnv(env, 'VERSION_CURRENT') ?? 'HEAD',
    configPath:
      flags.config ?? fromEnv(env, 'VERSION_CONFIG_FILE') ?? DEFAULT_CONFIG_FILE,
    versionFile: flags.versionFile ?? fromEnv(env, 'VERSION_FILE') ?? null,
    versionPattern:
      flags.versionRegex ?? fromEnv(env, 'VERSION_REGEX') ?? null,
    files: flags.files ?? [],
    fileRegexes: flags.fileRegexes ?? [],
    policy: flags.policy ?? 'content',
    concurrency: flags.concurrency ?? DEFAULT_CONCURRENCY,
    json: flags.json ?? false,
    logLevel: flags.logLevel ?? 'info',
  };
}
