export type Ref = string;

/**
 * Read-only access to a repository's history. Paths are repo-relative with
 * forward slashes.
 */
export interface VersionControl {
  /** Absolute path of the working tree root. */
  readonly rootDir: string;
  /**
   * Contents of `filePath` as it existed at `ref`. Rejects with a `VcsError`
   * of kind `not-found` when the file did not exist there.
   */
  getFileAtRevision(filePath: string, ref: Ref): Promise<Buffer>;
  /** Paths that differ between two revisions. */
  diffNameOnly(refA: Ref, refB: Ref): Promise<Set<string>>;
  /** Branch name checked out, or the commit hash when detached. */
  currentRef(): Promise<Ref>;
  /** Commit hash `ref` points at, or null when it does not resolve. */
  revParse(ref: Ref): Promise<string | null>;
  /** Paths with unmerged entries in the index. */
  conflictedFiles(): Promise<Set<string>>;
}
