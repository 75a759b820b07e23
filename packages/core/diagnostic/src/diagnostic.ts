/**
 * A structured description of something that went wrong (or is worth
 * reporting). Errors, log messages and report rows are all expressed as
 * diagnostics so they can be printed the same way.
 */
export type Diagnostic = {
  message: string;
  /** Name of the package or component that produced the diagnostic. */
  origin?: string;
  /** Original error name, e.g. `TypeError`. */
  name?: string;
  stack?: string;
  /** Path of the file the diagnostic is about, repo-relative where possible. */
  filePath?: string;
  /** 1-based line the diagnostic points at. */
  line?: number;
  hints?: Array<string>;
  meta?: Record<string, unknown>;
};

type ThrowableDiagnosticOpts = {
  diagnostic: Diagnostic | Array<Diagnostic>;
};

export type DiagnosticCode =
  | 'PARSE_ERROR'
  | 'NOT_FOUND'
  | 'MALFORMED_CONFLICT'
  | 'IO_ERROR'
  | 'CONFIG_ERROR'
  | 'UNKNOWN';

/**
 * An error carrying one or more diagnostics. Every error raised by the
 * version-sync packages is a ThrowableDiagnostic, so callers can print them
 * uniformly and tell them apart by `code`.
 */
export default class ThrowableDiagnostic extends Error {
  diagnostics: Array<Diagnostic>;
  code: DiagnosticCode = 'UNKNOWN';

  constructor(opts: ThrowableDiagnosticOpts) {
    let diagnostics = Array.isArray(opts.diagnostic)
      ? opts.diagnostic
      : [opts.diagnostic];

    super(diagnostics.length > 0 ? diagnostics[0].message : 'Unknown error');
    this.diagnostics = diagnostics;
    this.name = diagnostics[0]?.name ?? 'Error';

    let stack = diagnostics[0]?.stack;
    if (stack != null) {
      this.stack = stack;
    }
  }
}

export function errorToDiagnostic(
  error: ThrowableDiagnostic | Error | string,
  defaultValues?: {origin?: string; filePath?: string},
): Array<Diagnostic> {
  if (typeof error === 'string') {
    return [
      {
        origin: defaultValues?.origin ?? 'Error',
        message: error,
        filePath: defaultValues?.filePath,
      },
    ];
  }

  if (error instanceof ThrowableDiagnostic) {
    return error.diagnostics.map((d) => ({
      ...d,
      origin: d.origin ?? defaultValues?.origin ?? 'unknown',
    }));
  }

  return [
    {
      origin: defaultValues?.origin ?? 'Error',
      message: error.message,
      name: error.name,
      stack: error.stack,
      filePath: defaultValues?.filePath,
    },
  ];
}

export function anyToDiagnostic(input: unknown): Array<Diagnostic> {
  if (
    input instanceof ThrowableDiagnostic ||
    input instanceof Error ||
    typeof input === 'string'
  ) {
    return errorToDiagnostic(input);
  }

  return [{message: String(input), origin: 'unknown'}];
}
