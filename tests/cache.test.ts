import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, rmSync } from 'fs';
import { join } from 'path';
import { RepoCache } from '../src/cache.js';
import * as git from '../src/git.js';
import type { CreatorSpec } from '../src/types.js';
import { createTestDir, writeTree } from './utils/index.js';

vi.mock('../src/git.js');

const creator = (id: string): CreatorSpec => ({
  id,
  name: id.toUpperCase(),
  repo: `https://example.com/${id}/dotfiles`
});

describe('Repository cache', () => {
  let testDir: string;
  let cacheDir: string;
  let cache: RepoCache;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    testDir = createTestDir('cache-test', expect.getState().currentTestName);
    cacheDir = join(testDir, 'cache');
    cache = new RepoCache(cacheDir);
    vi.mocked(git.repoExists).mockResolvedValue(false);
    vi.mocked(git.cloneRepo).mockResolvedValue();
    vi.mocked(git.pullRepo).mockResolvedValue();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  test('rejects creator ids that are not a single path segment', () => {
    expect(() => cache.repoPath('../escape')).toThrow('Invalid creator id: ../escape');
    expect(() => cache.repoPath('')).toThrow('Invalid creator id: ');
    expect(cache.repoPath('alice')).toBe(join(cacheDir, 'alice'));
  });

  test('isCached checks the creator checkout', async () => {
    vi.mocked(git.repoExists).mockResolvedValue(true);

    expect(await cache.isCached('alice')).toBe(true);
    expect(git.repoExists).toHaveBeenCalledWith(join(cacheDir, 'alice'));
  });

  test('clones a creator that is not cached yet', async () => {
    const path = await cache.ensureRepo(creator('alice'), { timeout: 5000 });

    expect(path).toBe(join(cacheDir, 'alice'));
    expect(git.cloneRepo).toHaveBeenCalledWith('https://example.com/alice/dotfiles', join(cacheDir, 'alice'), { timeout: 5000 });
    expect(git.pullRepo).not.toHaveBeenCalled();
  });

  test('pulls a cached creator', async () => {
    vi.mocked(git.repoExists).mockResolvedValue(true);

    await cache.ensureRepo(creator('alice'));

    expect(git.pullRepo).toHaveBeenCalledWith(join(cacheDir, 'alice'), {});
    expect(git.cloneRepo).not.toHaveBeenCalled();
  });

  test('keeps the cached copy when the pull fails', async () => {
    vi.mocked(git.repoExists).mockResolvedValue(true);
    vi.mocked(git.pullRepo).mockRejectedValue(new Error('no network'));

    await expect(cache.ensureRepo(creator('alice'))).resolves.toBe(join(cacheDir, 'alice'));
  });

  test('a failed clone leaves no directory behind', async () => {
    vi.mocked(git.cloneRepo).mockImplementation(async (_url, dir) => {
      writeTree(dir, { 'partial': '' });
      throw new Error('fatal: repository not found');
    });

    await expect(cache.ensureRepo(creator('alice')))
      .rejects.toThrow("couldn't download ALICE's dotfiles: fatal: repository not found");
    expect(existsSync(join(cacheDir, 'alice'))).toBe(false);
  });

  test('never runs more clones at once than the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    vi.mocked(git.cloneRepo).mockImplementation(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 10));
      inFlight--;
    });
    const creators = ['a', 'b', 'c', 'd', 'e'].map(creator);

    const paths = await cache.ensureRepos(creators, { concurrency: 2 });

    expect(peak).toBe(2);
    expect([...paths.keys()]).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(git.cloneRepo).toHaveBeenCalledTimes(5);
  });

  test('attempts every creator and throws the first failure', async () => {
    vi.mocked(git.cloneRepo).mockImplementation(async (url) => {
      if (url.includes('/b/')) throw new Error('boom b');
      if (url.includes('/c/')) throw new Error('boom c');
    });

    await expect(cache.ensureRepos(['a', 'b', 'c'].map(creator)))
      .rejects.toThrow("couldn't download B's dotfiles: boom b");
    expect(git.cloneRepo).toHaveBeenCalledTimes(3);
  });

  test('lists cached creators in order', async () => {
    expect(await cache.listCachedCreators()).toEqual([]);

    writeTree(cacheDir, { 'bob/.git/': '', 'alice/.git/': '', 'stray-file': '' });

    expect(await cache.listCachedCreators()).toEqual(['alice', 'bob']);

    await cache.clearCreator('bob');
    expect(await cache.listCachedCreators()).toEqual(['alice']);

    await cache.clearAll();
    expect(existsSync(cacheDir)).toBe(false);
  });
});
