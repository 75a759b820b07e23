import {VcsError, type Ref, type VersionControl} from '@version-sync/vcs';

export type RevisionFiles = Record<string, string | Buffer>;

export type MemoryVersionControlOptions = {
  rootDir?: string;
  /** Files of each revision, keyed by ref. */
  revisions?: Record<Ref, RevisionFiles>;
  /** Ref returned by `currentRef()`. */
  branch?: Ref;
  conflicted?: Iterable<string>;
};

function toBuffer(contents: string | Buffer): Buffer {
  return typeof contents === 'string' ? Buffer.from(contents, 'utf8') : contents;
}

/**
 * A VersionControl backed by plain maps, for tests that should not spawn git.
 * Revisions are addressed by whatever names the test gives them.
 */
export class MemoryVersionControl implements VersionControl {
  readonly rootDir: string;
  #revisions: Map<Ref, Map<string, Buffer>> = new Map();
  #branch: Ref;
  #conflicted: Set<string>;

  constructor(options: MemoryVersionControlOptions = {}) {
    this.rootDir = options.rootDir ?? '/repo';
    this.#branch = options.branch ?? 'main';
    this.#conflicted = new Set(options.conflicted ?? []);
    for (let [ref, files] of Object.entries(options.revisions ?? {})) {
      this.commit(ref, files);
    }
  }

  /**
   * Records `files` as the full contents of `ref`, replacing what it held.
   */
  commit(ref: Ref, files: RevisionFiles): this {
    this.#revisions.set(
      ref,
      new Map(
        Object.entries(files).map(([filePath, contents]) => [
          filePath,
          toBuffer(contents),
        ]),
      ),
    );
    return this;
  }

  async getFileAtRevision(filePath: string, ref: Ref): Promise<Buffer> {
    let contents = this.#getRevision(ref).get(filePath);
    if (contents == null) {
      throw new VcsError('not-found', `${filePath} does not exist at ${ref}`, {
        meta: {filePath, ref},
      });
    }
    return Buffer.from(contents);
  }

  async diffNameOnly(refA: Ref, refB: Ref): Promise<Set<string>> {
    let a = this.#getRevision(refA);
    let b = this.#getRevision(refB);
    let changed = new Set<string>();
    for (let filePath of new Set([...a.keys(), ...b.keys()])) {
      let before = a.get(filePath);
      let after = b.get(filePath);
      if (before == null || after == null || !before.equals(after)) {
        changed.add(filePath);
      }
    }
    return changed;
  }

  async currentRef(): Promise<Ref> {
    return this.#branch;
  }

  async revParse(ref: Ref): Promise<string | null> {
    return this.#revisions.has(ref) ? ref : null;
  }

  async conflictedFiles(): Promise<Set<string>> {
    return new Set(this.#conflicted);
  }

  #getRevision(ref: Ref): Map<string, Buffer> {
    let files = this.#revisions.get(ref);
    if (files == null) {
      throw new VcsError('failed', `unknown revision ${ref}`, {meta: {ref}});
    }
    return files;
  }
}
