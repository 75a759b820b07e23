import ThrowableDiagnostic from '@version-sync/diagnostic';

export type VcsErrorKind = 'not-found' | 'failed';

/**
 * Raised by VersionControl implementations. `not-found` means the requested
 * file or revision does not exist; `failed` covers everything else (git
 * missing, a corrupt repository, a command exiting non-zero).
 */
export class VcsError extends ThrowableDiagnostic {
  kind: VcsErrorKind;

  constructor(
    kind: VcsErrorKind,
    message: string,
    details: {meta?: Record<string, unknown>; hints?: Array<string>} = {},
  ) {
    super({
      diagnostic: {
        message,
        origin: '@version-sync/vcs',
        meta: details.meta,
        hints: details.hints,
      },
    });
    this.name = 'VcsError';
    this.kind = kind;
    this.code = kind === 'not-found' ? 'NOT_FOUND' : 'IO_ERROR';
  }
}
