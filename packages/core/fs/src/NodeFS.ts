import fs from 'graceful-fs';
import path from 'path';

export type FilePath = string;

/**
 * The part of the file system the version-sync packages touch: reading
 * working tree files and replacing them in one step.
 */
export interface FileSystem {
  cwd(): FilePath;
  readFile(filePath: FilePath): Promise<string>;
  writeFile(filePath: FilePath, contents: string): Promise<void>;
  exists(filePath: FilePath): Promise<boolean>;
}

let writeCalls = 0;

export class NodeFS implements FileSystem {
  cwd(): FilePath {
    return process.cwd();
  }

  readFile(filePath: FilePath): Promise<string> {
    return fs.promises.readFile(filePath, 'utf8');
  }

  async exists(filePath: FilePath): Promise<boolean> {
    try {
      let stat = await fs.promises.stat(filePath);
      return stat.isFile();
    } catch (e: unknown) {
      if (isErrnoException(e) && e.code === 'ENOENT') {
        return false;
      }
      throw e;
    }
  }

  /**
   * Writes to a temporary file beside the target and renames it over the
   * target, so readers see either the old or the new contents.
   */
  async writeFile(filePath: FilePath, contents: string): Promise<void> {
    let tmpFilePath = getTempFilePath(filePath);
    try {
      await fs.promises.writeFile(tmpFilePath, contents, 'utf8');
      await fs.promises.rename(tmpFilePath, filePath);
    } catch (e: unknown) {
      await fs.promises.rm(tmpFilePath, {force: true});
      throw e;
    }
  }
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

// The temp file lives in the target's directory so the rename never crosses
// a device boundary.
function getTempFilePath(filePath: FilePath): FilePath {
  writeCalls = writeCalls % Number.MAX_SAFE_INTEGER;
  return path.join(
    path.dirname(filePath),
    '.' +
      path.basename(filePath) +
      '.' +
      process.pid +
      '.' +
      (writeCalls++).toString(36),
  );
}
