import { readdir } from 'fs/promises';
import { join } from 'path';
import fs from 'fs-extra';
import { cloneRepo, pullRepo, repoExists, type GitOptions } from './git.js';
import { runPool } from './utils/pool.js';
import { ui } from './ui.js';
import { ErrorUtils, SecurityValidator } from './utils/security.js';
import type { CreatorSpec } from './types.js';

export type EnsureReposOptions = GitOptions & {
  /** Concurrent git operations, defaults to 5 */
  concurrency?: number;
};

export const DEFAULT_CONCURRENCY = 5;

/** Creator ids name cache directories, so they stay a single path segment. */
export const CREATOR_ID_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

/**
 * Local checkouts of creators' repositories, one directory per creator id.
 *
 * Assumes a single process owns the cache directory.
 */
export class RepoCache {
  constructor(private readonly cacheDir: string) {}

  repoPath(creatorId: string): string {
    if (!CREATOR_ID_PATTERN.test(creatorId)) {
      throw new Error(`Invalid creator id: ${creatorId}`);
    }
    return join(this.cacheDir, creatorId);
  }

  async isCached(creatorId: string): Promise<boolean> {
    return repoExists(this.repoPath(creatorId));
  }

  /**
   * Makes sure a creator's repository is checked out locally: clones it when
   * missing, pulls it otherwise. A failed pull keeps the cached copy.
   *
   * @returns Path of the checkout
   * @throws {Error} When the repository cannot be cloned
   */
  async ensureRepo(creator: CreatorSpec, options: GitOptions = {}): Promise<string> {
    const repoPath = this.repoPath(creator.id);

    if (!(await repoExists(repoPath))) {
      try {
        await fs.ensureDir(this.cacheDir);
        await cloneRepo(creator.repo, repoPath, options);
      } catch (error) {
        // leave no half-cloned directory behind
        await fs.remove(repoPath);
        throw new Error(`couldn't download ${creator.name}'s dotfiles: ${SecurityValidator.sanitizeErrorMessage(error)}`);
      }
      return repoPath;
    }

    try {
      await pullRepo(repoPath, options);
    } catch (error) {
      options.signal?.throwIfAborted();
      ui.warning(`Couldn't update ${creator.name}'s dotfiles, using cached copy: ${SecurityValidator.sanitizeErrorMessage(error)}`);
    }
    return repoPath;
  }

  /**
   * Ensures several repositories with a bounded number of concurrent git
   * operations. Every creator is attempted; when some fail, the first
   * failure is thrown after all of them have finished.
   */
  async ensureRepos(creators: CreatorSpec[], options: EnsureReposOptions = {}): Promise<Map<string, string>> {
    const { concurrency = DEFAULT_CONCURRENCY, ...gitOptions } = options;
    let completed = 0;

    const settled = await runPool(creators, concurrency, async (creator) => {
      try {
        return await this.ensureRepo(creator, gitOptions);
      } finally {
        completed++;
        ui.progress(completed, creators.length, 'repositories ready');
      }
    });

    const paths = new Map<string, string>();
    const failures: unknown[] = [];
    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        paths.set(creators[index].id, result.value);
      } else {
        failures.push(result.reason);
      }
    });

    if (failures.length > 0) {
      if (failures.length > 1) {
        ui.warning(`${failures.length} repositories failed to download`);
      }
      throw ErrorUtils.toError(failures[0]);
    }
    return paths;
  }

  async listCachedCreators(): Promise<string[]> {
    try {
      const entries = await readdir(this.cacheDir, { withFileTypes: true });
      return entries.filter(e => e.isDirectory()).map(e => e.name).sort();
    } catch (error) {
      if (ErrorUtils.hasCode(error, 'ENOENT')) return [];
      throw error;
    }
  }

  async clearCreator(creatorId: string): Promise<void> {
    await fs.remove(this.repoPath(creatorId));
  }

  async clearAll(): Promise<void> {
    await fs.remove(this.cacheDir);
  }
}
