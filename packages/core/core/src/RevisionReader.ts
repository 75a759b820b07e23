import {VcsError, type Ref, type VersionControl} from '@version-sync/vcs';
import {IOError, NotFoundError} from './errors';
import type {FilePath} from './types';

/**
 * Reads file snapshots through the version control collaborator, turning its
 * failures into `NotFoundError` and `IOError`.
 */
export class RevisionReader {
  #vcs: VersionControl;

  constructor(vcs: VersionControl) {
    this.#vcs = vcs;
  }

  async readBytesAt(file: FilePath, revision: Ref): Promise<Buffer> {
    try {
      return await this.#vcs.getFileAtRevision(file, revision);
    } catch (err: unknown) {
      if (err instanceof VcsError && err.kind === 'not-found') {
        throw new NotFoundError(file, revision);
      }

      let reason = err instanceof Error ? err.message : String(err);
      throw new IOError(`Unable to read ${file} at ${revision}: ${reason}`, {
        filePath: file,
        cause: err,
      });
    }
  }

  /**
   * The file's contents at `revision`, decoded as UTF-8.
   */
  async readAt(file: FilePath, revision: Ref): Promise<string> {
    let contents = await this.readBytesAt(file, revision);
    return contents.toString('utf8');
  }
}
