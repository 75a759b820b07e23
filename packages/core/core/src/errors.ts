import ThrowableDiagnostic from '@version-sync/diagnostic';

const ORIGIN = '@version-sync/core';

export type ParseErrorReason = 'malformed' | 'not-found';

/**
 * A version could not be read: either the text did not match the version
 * pattern (`malformed`) or a snapshot that exists has no occurrence of it
 * (`not-found`).
 */
export class ParseError extends ThrowableDiagnostic {
  reason: ParseErrorReason;

  constructor(
    reason: ParseErrorReason,
    message: string,
    details: {filePath?: string; hints?: Array<string>} = {},
  ) {
    super({
      diagnostic: {
        message,
        origin: ORIGIN,
        filePath: details.filePath,
        hints: details.hints,
      },
    });
    this.name = 'ParseError';
    this.code = 'PARSE_ERROR';
    this.reason = reason;
  }
}

/**
 * The file did not exist at the requested revision. Recoverable: a file
 * missing at the baseline is a new file.
 */
export class NotFoundError extends ThrowableDiagnostic {
  filePath: string;
  revision: string;

  constructor(filePath: string, revision: string) {
    super({
      diagnostic: {
        message: `${filePath} not found at ${revision}`,
        origin: ORIGIN,
        filePath,
      },
    });
    this.name = 'NotFoundError';
    this.code = 'NOT_FOUND';
    this.filePath = filePath;
    this.revision = revision;
  }
}

/**
 * The version control collaborator failed. Never retried.
 */
export class IOError extends ThrowableDiagnostic {
  constructor(message: string, details: {filePath?: string; cause?: unknown} = {}) {
    super({
      diagnostic: {
        message,
        origin: ORIGIN,
        filePath: details.filePath,
        stack:
          details.cause instanceof Error ? details.cause.stack : undefined,
      },
    });
    this.name = 'IOError';
    this.code = 'IO_ERROR';
  }
}

/**
 * Conflict markers that do not form a `<<<<<<<` / `=======` / `>>>>>>>`
 * sequence. `line` is the 1-based line the problem was detected on.
 */
export class MalformedConflictError extends ThrowableDiagnostic {
  line: number;

  constructor(message: string, line: number, filePath?: string) {
    super({
      diagnostic: {
        message,
        origin: ORIGIN,
        filePath,
        line,
        hints: ['Resolve this conflict by hand, then run the merge again'],
      },
    });
    this.name = 'MalformedConflictError';
    this.code = 'MALFORMED_CONFLICT';
    this.line = line;
  }

  /**
   * Folds several malformed blocks into one error so they are reported
   * together.
   */
  static combine(errors: Array<MalformedConflictError>): ThrowableDiagnostic {
    let combined = new ThrowableDiagnostic({
      diagnostic: errors.flatMap((e) => e.diagnostics),
    });
    combined.name = 'MalformedConflictError';
    combined.code = 'MALFORMED_CONFLICT';
    return combined;
  }
}

export class ConfigError extends ThrowableDiagnostic {
  constructor(
    message: string,
    details: {filePath?: string; line?: number; hints?: Array<string>} = {},
  ) {
    super({
      diagnostic: {
        message,
        origin: ORIGIN,
        filePath: details.filePath,
        line: details.line,
        hints: details.hints,
      },
    });
    this.name = 'ConfigError';
    this.code = 'CONFIG_ERROR';
  }
}
