import fs from 'fs';
import path from 'path';

/**
 * Walks up from `target` until a directory containing `candidate` is found.
 *
 * @param target - The directory to search from, resolved against the cwd.
 * @param candidate - The marker file or directory to look for.
 */
export function findRoot(target: string, candidate: string): string | null {
  let dir = path.resolve(process.cwd(), target);
  for (;;) {
    if (fs.existsSync(path.join(dir, candidate))) {
      return dir;
    }

    let parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Finds the closest directory at or above `target` that contains `.git`.
 * `.git` may be a directory or, for worktrees and submodules, a file.
 */
export function findRepositoryRoot(target: string): string | null {
  return findRoot(target, '.git');
}
