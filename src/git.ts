import { execa } from 'execa';
import { join, resolve } from 'path';
import fs from 'fs-extra';
import { SecurityValidator } from './utils/security.js';

export type GitOptions = {
  /** Aborts the git process when triggered */
  signal?: AbortSignal;
  /** Milliseconds before the git process is killed */
  timeout?: number;
};

const DEFAULT_TIMEOUT_MS = 120000;

/**
 * True when `repoDir` is a git checkout (has a `.git` directory or file).
 */
export async function repoExists(repoDir: string): Promise<boolean> {
  return fs.pathExists(join(resolve(repoDir), '.git'));
}

/**
 * Shallow-clones `url` into `targetDir`.
 *
 * `targetDir` may already exist as long as it is empty. An existing checkout
 * is pulled instead of cloned.
 */
export async function cloneRepo(url: string, targetDir: string, options: GitOptions = {}): Promise<void> {
  const sanitizedUrl = SecurityValidator.validateCloneUrl(url);
  const sanitizedDir = resolve(targetDir);

  if (await repoExists(sanitizedDir)) {
    return pullRepo(sanitizedDir, options);
  }

  await execa('git', [
    'clone',
    '--depth', '1',
    '--', sanitizedUrl, sanitizedDir
  ], {
    shell: false, // Explicitly disable shell interpretation
    cancelSignal: options.signal,
    timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
    env: { GIT_TERMINAL_PROMPT: '0' } // fail instead of asking for credentials
  });
}

/**
 * Fast-forwards an existing checkout from its default remote.
 */
export async function pullRepo(repoDir: string, options: GitOptions = {}): Promise<void> {
  await execa('git', [
    '-C', resolve(repoDir),
    'pull', '--ff-only'
  ], {
    shell: false,
    cancelSignal: options.signal,
    timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
    env: { GIT_TERMINAL_PROMPT: '0' }
  });
}

