import childProcess from 'child_process';
import type {Ref, VersionControl} from './types';
import {VcsError} from './VcsError';
import {findRepositoryRoot} from './findRepositoryRoot';

export type GitResult = {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
};

export type GitRunner = (args: Array<string>, cwd: string) => Promise<GitResult>;

const MISSING_PATH_RE = /does not exist in|exists on disk, but not in/;

/**
 * Spawns `git` and collects its output. Resolves for any exit code; only a
 * failure to start the process rejects.
 */
export const runGit: GitRunner = (args, cwd) =>
  new Promise((resolve, reject) => {
    let child = childProcess.spawn('git', args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    let stdout: Array<Buffer> = [];
    let stderr: Array<Buffer> = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', (err) => {
      reject(
        new VcsError('failed', `Unable to run git: ${err.message}`, {
          meta: {args},
        }),
      );
    });
    child.on('close', (code) => {
      resolve({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr).toString('utf8').trim(),
      });
    });
  });

function splitNul(output: Buffer): Set<string> {
  return new Set(output.toString('utf8').split('\0').filter(Boolean));
}

export class GitVersionControl implements VersionControl {
  readonly rootDir: string;
  #run: GitRunner;

  constructor(rootDir: string, run: GitRunner = runGit) {
    this.rootDir = rootDir;
    this.#run = run;
  }

  /**
   * Opens the repository containing `cwd`.
   */
  static open(cwd: string, run: GitRunner = runGit): GitVersionControl {
    let rootDir = findRepositoryRoot(cwd);
    if (rootDir == null) {
      throw new VcsError(
        'failed',
        `${cwd} is not inside a git repository, version-sync must be run from one`,
      );
    }
    return new GitVersionControl(rootDir, run);
  }

  async getFileAtRevision(filePath: string, ref: Ref): Promise<Buffer> {
    let {exitCode, stdout, stderr} = await this.#run(
      ['show', `${ref}:${filePath}`],
      this.rootDir,
    );

    if (exitCode === 0) {
      return stdout;
    }

    if (MISSING_PATH_RE.test(stderr)) {
      throw new VcsError('not-found', `${filePath} does not exist at ${ref}`, {
        meta: {filePath, ref},
      });
    }

    throw this.#failure(['show', `${ref}:${filePath}`], stderr);
  }

  async diffNameOnly(refA: Ref, refB: Ref): Promise<Set<string>> {
    let args = ['diff', '--name-only', '-z', refA, refB, '--'];
    let {exitCode, stdout, stderr} = await this.#run(args, this.rootDir);
    if (exitCode !== 0) {
      throw this.#failure(args, stderr);
    }
    return splitNul(stdout);
  }

  async currentRef(): Promise<Ref> {
    let args = ['rev-parse', '--abbrev-ref', 'HEAD'];
    let {exitCode, stdout, stderr} = await this.#run(args, this.rootDir);
    if (exitCode !== 0) {
      throw this.#failure(args, stderr);
    }

    let name = stdout.toString('utf8').trim();
    if (name !== 'HEAD') {
      return name;
    }

    // Detached HEAD
    let hash = await this.revParse('HEAD');
    if (hash == null) {
      throw this.#failure(['rev-parse', 'HEAD'], 'HEAD does not resolve');
    }
    return hash;
  }

  async revParse(ref: Ref): Promise<string | null> {
    let {exitCode, stdout} = await this.#run(
      ['rev-parse', '--verify', '--quiet', `${ref}^{commit}`],
      this.rootDir,
    );
    return exitCode === 0 ? stdout.toString('utf8').trim() : null;
  }

  async conflictedFiles(): Promise<Set<string>> {
    let args = ['diff', '--name-only', '--diff-filter=U', '-z'];
    let {exitCode, stdout, stderr} = await this.#run(args, this.rootDir);
    if (exitCode !== 0) {
      throw this.#failure(args, stderr);
    }
    return splitNul(stdout);
  }

  #failure(args: Array<string>, stderr: string): VcsError {
    return new VcsError(
      'failed',
      `git ${args.join(' ')} failed${stderr ? `: ${stderr}` : ''}`,
      {meta: {args}},
    );
  }
}
