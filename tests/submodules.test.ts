import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readdirSync, rmSync } from 'fs';
import { join } from 'path';
import {
  convertSshToHttps,
  findSubmoduleByPath,
  isEmptyDirectory,
  materializeSubmodules,
  parseGitmodules,
  type CloneFn
} from '../src/submodules.js';
import { createTestDir, writeTree } from './utils/index.js';

const GITMODULES = [
  '[submodule "nvim"]',
  '\tpath = .config/nvim',
  '\turl = git@github.com:alice/nvim.git',
  '# plugins live elsewhere',
  '[submodule "tmux"]',
  '\tpath = tmux',
  '\turl = https://example.com/alice/tmux',
  '[submodule "broken"]',
  '\tpath = nothing',
  ''
].join('\n');

describe('Submodules', () => {
  let repo: string;

  beforeEach(() => {
    repo = createTestDir('submodules-test', expect.getState().currentTestName);
  });

  afterEach(() => {
    rmSync(repo, { recursive: true, force: true });
  });

  describe('parseGitmodules', () => {
    test('returns complete entries in file order', async () => {
      writeTree(repo, { '.gitmodules': GITMODULES });

      expect(await parseGitmodules(repo)).toEqual([
        { name: 'nvim', path: '.config/nvim', url: 'git@github.com:alice/nvim.git' },
        { name: 'tmux', path: 'tmux', url: 'https://example.com/alice/tmux' }
      ]);
    });

    test('a repository without .gitmodules has no submodules', async () => {
      expect(await parseGitmodules(repo)).toEqual([]);
    });

    test('findSubmoduleByPath matches the configured path', async () => {
      writeTree(repo, { '.gitmodules': GITMODULES });
      const submodules = await parseGitmodules(repo);

      expect(findSubmoduleByPath(submodules, 'tmux')?.name).toBe('tmux');
      expect(findSubmoduleByPath(submodules, 'nvim')).toBeUndefined();
    });
  });

  describe('convertSshToHttps', () => {
    test('converts scp-style URLs', () => {
      expect(convertSshToHttps('git@github.com:alice/nvim.git')).toBe('https://github.com/alice/nvim');
    });

    test('converts ssh:// URLs and drops the port', () => {
      expect(convertSshToHttps('ssh://git@gitlab.com:2222/team/dots.git')).toBe('https://gitlab.com/team/dots');
    });

    test('leaves HTTPS URLs unchanged', () => {
      expect(convertSshToHttps('https://example.com/alice/tmux')).toBe('https://example.com/alice/tmux');
    });
  });

  describe('isEmptyDirectory', () => {
    test('treats a lone .git placeholder as empty', async () => {
      writeTree(repo, { 'a/': '', 'b/.git': 'gitdir: x\n', 'c/init.lua': '' });

      expect(await isEmptyDirectory(join(repo, 'a'))).toBe(true);
      expect(await isEmptyDirectory(join(repo, 'b'))).toBe(true);
      expect(await isEmptyDirectory(join(repo, 'c'))).toBe(false);
    });

    test('a .git directory is a checkout, not a placeholder', async () => {
      writeTree(repo, { 'a/.git/HEAD': 'ref: refs/heads/main\n' });

      expect(await isEmptyDirectory(join(repo, 'a'))).toBe(false);
    });
  });

  describe('materializeSubmodules', () => {
    const twoModules = [
      '[submodule "a"]',
      '\tpath = a',
      '\turl = git@github.com:alice/a.git',
      '[submodule "b"]',
      '\tpath = b',
      '\turl = https://example.com/alice/b',
      ''
    ].join('\n');

    test('one resolved entry makes the level succeed', async () => {
      writeTree(repo, { '.gitmodules': twoModules, 'a/.git': 'gitdir: ../.git/modules/a\n' });
      const emptyAtClone: boolean[] = [];
      const clone = vi.fn<CloneFn>(async (url, targetDir) => {
        emptyAtClone.push(readdirSync(targetDir).length === 0);
        if (url.includes('/b')) throw new Error('repository not found');
        writeTree(targetDir, { 'init.lua': '' });
      });

      const outcome = await materializeSubmodules(repo, 3, { clone });

      expect(outcome).toEqual({
        ok: true,
        depthExhausted: false,
        entries: [
          {
            name: 'a', path: 'a', url: 'git@github.com:alice/a.git',
            status: 'resolved', source: 'cloned', clonedFrom: 'https://github.com/alice/a',
            nested: { ok: true, entries: [], depthExhausted: false }
          },
          {
            name: 'b', path: 'b', url: 'https://example.com/alice/b',
            status: 'failed', reason: 'repository not found'
          }
        ]
      });
      expect(emptyAtClone).toEqual([true, true]);
      expect(existsSync(join(repo, 'a', 'init.lua'))).toBe(true);
    });

    test('fails the level when nothing resolves', async () => {
      writeTree(repo, { '.gitmodules': twoModules });
      const clone = vi.fn<CloneFn>(async () => {
        throw new Error('network unreachable');
      });

      const outcome = await materializeSubmodules(repo, 3, { clone });

      expect(outcome.ok).toBe(false);
      expect(outcome.entries.map(e => e.status)).toEqual(['failed', 'failed']);
    });

    test('retries with the original URL when HTTPS fails', async () => {
      writeTree(repo, { '.gitmodules': twoModules.split('[submodule "b"]')[0] });
      const clone = vi.fn<CloneFn>(async (url) => {
        if (url.startsWith('https://')) throw new Error('authentication required');
      });

      const outcome = await materializeSubmodules(repo, 3, { clone });

      expect(clone.mock.calls.map(call => call[0])).toEqual([
        'https://github.com/alice/a',
        'git@github.com:alice/a.git'
      ]);
      expect(outcome.entries[0]).toMatchObject({ status: 'resolved', clonedFrom: 'git@github.com:alice/a.git' });
    });

    test('leaves populated directories alone', async () => {
      writeTree(repo, { '.gitmodules': twoModules, 'a/init.lua': '', 'b/init.lua': '' });
      const clone = vi.fn<CloneFn>(async () => {});

      const outcome = await materializeSubmodules(repo, 3, { clone });

      expect(clone).not.toHaveBeenCalled();
      expect(outcome.entries.map(e => e.status === 'resolved' ? e.source : e.status)).toEqual(['present', 'present']);
    });

    test('never touches a checkout that has its own .git directory', async () => {
      writeTree(repo, {
        '.gitmodules': twoModules.split('[submodule "b"]')[0],
        'a/.git/HEAD': 'ref: refs/heads/main\n'
      });
      const clone = vi.fn<CloneFn>(async () => {
        throw new Error('offline');
      });

      const outcome = await materializeSubmodules(repo, 1, { clone });

      expect(clone).not.toHaveBeenCalled();
      expect(existsSync(join(repo, 'a', '.git', 'HEAD'))).toBe(true);
      expect(outcome.entries[0]).toMatchObject({ status: 'resolved', source: 'present' });
    });

    test('skips paths that leave the repository', async () => {
      writeTree(repo, { '.gitmodules': '[submodule "evil"]\n\tpath = ../evil\n\turl = https://example.com/evil\n' });
      const clone = vi.fn<CloneFn>(async () => {});

      const outcome = await materializeSubmodules(repo, 3, { clone });

      expect(clone).not.toHaveBeenCalled();
      expect(outcome).toEqual({
        ok: false,
        depthExhausted: false,
        entries: [{
          name: 'evil', path: '../evil', url: 'https://example.com/evil',
          status: 'skipped', reason: 'path escapes the repository'
        }]
      });
    });

    test('stops recursing when the depth is used up', async () => {
      writeTree(repo, { '.gitmodules': twoModules.split('[submodule "b"]')[0] });
      const clone = vi.fn<CloneFn>(async (_url, targetDir) => {
        writeTree(targetDir, { '.gitmodules': '[submodule "deep"]\n\tpath = deep\n\turl = https://example.com/deep\n' });
      });

      const outcome = await materializeSubmodules(repo, 1, { clone });

      expect(clone).toHaveBeenCalledTimes(1);
      expect(outcome.entries[0]).toMatchObject({
        status: 'resolved',
        nested: { ok: true, entries: [], depthExhausted: true }
      });
    });

    test('does nothing at depth zero', async () => {
      writeTree(repo, { '.gitmodules': twoModules });
      const clone = vi.fn<CloneFn>(async () => {});

      expect(await materializeSubmodules(repo, 0, { clone })).toEqual({ ok: true, entries: [], depthExhausted: true });
      expect(clone).not.toHaveBeenCalled();
    });
  });
});
