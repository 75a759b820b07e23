import type {Diagnostic} from '@version-sync/diagnostic';
import pino, {type DestinationStream, type Logger as PinoLogger} from 'pino';
import pinoPretty from 'pino-pretty';

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'verbose';

export type LogEvent = {
  type: 'log';
  level: Exclude<LogLevel, 'none'>;
  diagnostics: Array<Diagnostic>;
};

export interface IDisposable {
  dispose(): void;
}

export type LoggerOptions = {
  level?: LogLevel;
  /**
   * Where formatted output goes. Defaults to a pino-pretty stream on stderr,
   * stdout is kept free for reports.
   */
  destination?: DestinationStream;
};

const PINO_LEVELS: Record<LogLevel, string> = {
  none: 'silent',
  error: 'error',
  warn: 'warn',
  info: 'info',
  verbose: 'debug',
};

type DiagnosticInput = Diagnostic | Array<Diagnostic> | string;

function toDiagnostics(
  input: DiagnosticInput,
  origin?: string,
): Array<Diagnostic> {
  if (typeof input === 'string') {
    return [{message: input, origin}];
  }
  return Array.isArray(input) ? input : [input];
}

export class Logger {
  #pino: PinoLogger;
  #level: LogLevel;
  #listeners: Set<(event: LogEvent) => void> = new Set();

  constructor(options: LoggerOptions = {}) {
    this.#level = options.level ?? 'info';
    this.#pino = pino(
      {level: PINO_LEVELS[this.#level], base: null},
      options.destination ??
        pinoPretty({
          destination: 2,
          sync: true,
          ignore: 'pid,hostname,time',
          messageKey: 'msg',
        }),
    );
  }

  get level(): LogLevel {
    return this.#level;
  }

  setLogLevel(level: LogLevel): void {
    this.#level = level;
    this.#pino.level = PINO_LEVELS[level];
  }

  /**
   * Subscribes to every log event, whatever the current level.
   */
  onLog(fn: (event: LogEvent) => void): IDisposable {
    this.#listeners.add(fn);
    return {
      dispose: () => {
        this.#listeners.delete(fn);
      },
    };
  }

  verbose(input: DiagnosticInput, origin?: string): void {
    this.#emit('verbose', toDiagnostics(input, origin));
  }

  info(input: DiagnosticInput, origin?: string): void {
    this.#emit('info', toDiagnostics(input, origin));
  }

  warn(input: DiagnosticInput, origin?: string): void {
    this.#emit('warn', toDiagnostics(input, origin));
  }

  error(input: DiagnosticInput, origin?: string): void {
    this.#emit('error', toDiagnostics(input, origin));
  }

  #emit(level: LogEvent['level'], diagnostics: Array<Diagnostic>): void {
    let event: LogEvent = {type: 'log', level, diagnostics};
    for (let listener of this.#listeners) {
      listener(event);
    }

    let write =
      level === 'verbose'
        ? this.#pino.debug.bind(this.#pino)
        : this.#pino[level].bind(this.#pino);

    for (let {message, origin, filePath, line, hints, meta} of diagnostics) {
      write({origin, filePath, line, hints, ...meta}, message);
    }
  }
}
