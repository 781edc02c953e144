import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { Applier, ApplyBatchError, summarizeOutcomes } from '../src/applier.js';
import { BackupManager } from '../src/backup.js';
import type { ApplyOutcome } from '../src/types.js';
import { TestDirManager, writeTree } from './utils/index.js';

const owner = { creatorId: 'alice', dotfileId: 'shell' };

describe('Applier', () => {
  const dirs = new TestDirManager();
  let repo: string;
  let home: string;
  let backupDir: string;
  let applier: Applier;

  beforeEach(() => {
    const testDir = dirs.create('applier-test', expect.getState().currentTestName);
    repo = join(testDir, 'repo');
    home = join(testDir, 'home');
    backupDir = join(testDir, 'backups');
    writeTree(testDir, { 'home/': '' });
    applier = new Applier(new BackupManager(backupDir, home), home);
  });

  afterEach(() => {
    dirs.cleanup();
  });

  describe('resolveTargetPath', () => {
    test.each([
      ['~/.zshrc', '/home/tester/.zshrc'],
      ['.vimrc', '/home/tester/.vimrc'],
      ['.config/nvim/init.lua', '/home/tester/.config/nvim/init.lua'],
      ['/etc/hosts', '/etc/hosts'],
      ['bin/tool', '/home/tester/bin/tool']
    ])('%s resolves to %s', (input, expected) => {
      const fixed = new Applier(new BackupManager('/unused', '/home/tester'), '/home/tester');

      expect(fixed.resolveTargetPath(input)).toBe(expected);
    });
  });

  test('installs a new file without a backup', async () => {
    writeTree(repo, { '.zshrc': 'export EDITOR=nvim\n' });

    const outcome = await applier.apply(join(repo, '.zshrc'), '.zshrc', owner);

    expect(outcome).toEqual({
      sourcePath: join(repo, '.zshrc'),
      targetPath: join(home, '.zshrc'),
      backupPath: undefined,
      success: true,
      state: 'succeeded',
      repair: 'not-needed'
    });
    expect(readFileSync(join(home, '.zshrc'), 'utf8')).toBe('export EDITOR=nvim\n');
  });

  test('backs up the file it replaces', async () => {
    writeTree(repo, { '.zshrc': 'new\n' });
    writeTree(home, { '.zshrc': 'old\n' });

    const outcome = await applier.apply(join(repo, '.zshrc'), '.zshrc', owner);

    expect(outcome.success).toBe(true);
    expect(outcome.backupPath).toBeDefined();
    expect(readFileSync(outcome.backupPath ?? '', 'utf8')).toBe('old\n');
    expect(readFileSync(join(home, '.zshrc'), 'utf8')).toBe('new\n');
  });

  test('one failing file does not stop the batch', async () => {
    writeTree(repo, { '.a': 'a\n', '.b': 'b\n', '.c': 'c\n' });
    writeTree(home, { 'blocked': 'a regular file\n' });

    const outcomes = await applier.applyMultiple(new Map([
      [join(repo, '.a'), '.a'],
      [join(repo, '.b'), 'blocked/.b'],
      [join(repo, '.c'), '.c']
    ]), owner);

    expect(outcomes.map(o => o.success)).toEqual([true, false, true]);
    expect(outcomes[1].state).toBe('failed');
    expect(outcomes[1].repair).toBe('not-needed');
    expect(outcomes[1].error?.message).toMatch(/^couldn't write file: /);
    expect(readFileSync(join(home, '.c'), 'utf8')).toBe('c\n');
    expect(summarizeOutcomes(outcomes)).toEqual({ status: 'partial', succeeded: 2, failed: 1 });
  });

  test('restores the previous content when the write fails', async () => {
    writeTree(home, { '.vimrc': 'mine\n' });

    const outcome = await applier.apply(join(repo, 'missing-source'), '.vimrc', owner);

    expect(outcome.success).toBe(false);
    expect(outcome.repair).toBe('restored');
    expect(readFileSync(join(home, '.vimrc'), 'utf8')).toBe('mine\n');
  });

  test('does not write when the backup fails', async () => {
    writeTree(repo, { '.vimrc': 'theirs\n' });
    writeTree(home, { '.vimrc': 'mine\n' });
    writeFileSync(backupDir, 'not a directory');

    const outcome = await applier.apply(join(repo, '.vimrc'), '.vimrc', owner);

    expect(outcome.success).toBe(false);
    expect(outcome.repair).toBe('not-needed');
    expect(outcome.backupPath).toBeUndefined();
    expect(outcome.error?.message).toMatch(/^couldn't create backup: /);
    expect(readFileSync(join(home, '.vimrc'), 'utf8')).toBe('mine\n');
  });

  test('rollback restores replaced files and leaves new ones', async () => {
    writeTree(repo, { '.a': 'new a\n', '.b': 'new b\n', '.c': 'new c\n' });
    writeTree(home, { '.a': 'old a\n', '.b': 'old b\n' });
    const outcomes = await applier.applyMultiple(new Map([
      [join(repo, '.a'), '.a'],
      [join(repo, '.b'), '.b'],
      [join(repo, '.c'), '.c']
    ]), owner);

    const result = await applier.rollback(outcomes);

    expect(result).toEqual({ restored: 2, failed: 0 });
    expect(readFileSync(join(home, '.a'), 'utf8')).toBe('old a\n');
    expect(readFileSync(join(home, '.b'), 'utf8')).toBe('old b\n');
    expect(existsSync(join(home, '.c'))).toBe(true);
  });

  test('rollback counts backups that are gone', async () => {
    const outcome: ApplyOutcome = {
      sourcePath: join(repo, '.a'),
      targetPath: join(home, '.a'),
      backupPath: join(backupDir, 'gone.bak'),
      success: true,
      state: 'succeeded',
      repair: 'not-needed'
    };

    expect(await applier.rollback([outcome])).toEqual({ restored: 0, failed: 1 });
  });
});

describe('summarizeOutcomes', () => {
  const outcome = (success: boolean): ApplyOutcome => ({
    sourcePath: '/repo/.a',
    targetPath: '/home/tester/.a',
    success,
    state: success ? 'succeeded' : 'failed',
    repair: 'not-needed',
    error: success ? undefined : new Error('disk full')
  });

  test('reports the batch status', () => {
    expect(summarizeOutcomes([outcome(true), outcome(true)])).toEqual({ status: 'succeeded', succeeded: 2, failed: 0 });
    expect(summarizeOutcomes([outcome(false)])).toEqual({ status: 'failed', succeeded: 0, failed: 1 });
  });

  test('ApplyBatchError lists every failed file', () => {
    const error = new ApplyBatchError([outcome(true), outcome(false)]);

    expect(error.name).toBe('ApplyBatchError');
    expect(error.message).toBe('failed to apply 1 of 2 file(s):\n/home/tester/.a: disk full');
    expect(error.outcomes).toHaveLength(2);
  });
});
