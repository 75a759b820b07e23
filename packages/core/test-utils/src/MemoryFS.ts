import type {FilePath, FileSystem} from '@version-sync/fs';

/**
 * An in-memory FileSystem. Every write is recorded in `writes`.
 */
export class MemoryFS implements FileSystem {
  files: Map<FilePath, string>;
  writes: Array<{filePath: FilePath; contents: string}> = [];
  #cwd: FilePath;

  constructor(files: Record<FilePath, string> = {}, cwd: FilePath = '/repo') {
    this.files = new Map(Object.entries(files));
    this.#cwd = cwd;
  }

  cwd(): FilePath {
    return this.#cwd;
  }

  readFile(filePath: FilePath): Promise<string> {
    let contents = this.files.get(filePath);
    if (contents == null) {
      let err: NodeJS.ErrnoException = new Error(
        `ENOENT: no such file or directory, open '${filePath}'`,
      );
      err.code = 'ENOENT';
      return Promise.reject(err);
    }
    return Promise.resolve(contents);
  }

  writeFile(filePath: FilePath, contents: string): Promise<void> {
    this.files.set(filePath, contents);
    this.writes.push({filePath, contents});
    return Promise.resolve();
  }

  exists(filePath: FilePath): Promise<boolean> {
    return Promise.resolve(this.files.has(filePath));
  }
}
