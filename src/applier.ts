import { dirname, isAbsolute, join } from 'path';
import fs from 'fs-extra';
import { BackupManager, copyWithMode } from './backup.js';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/security.js';
import type { ApplyOutcome, BackupRecord, OwnerIds, RepairResult, ResolvedFileMap } from './types.js';

/**
 * Per-file progress. Only `succeeded` and `failed` are terminal.
 *
 * pending → backed-up → written → succeeded
 * pending → backed-up → write-failed → repair-attempted → failed
 * pending → failed (the backup itself failed; nothing was written)
 */
export type ApplyStep =
  | 'pending'
  | 'backed-up'
  | 'written'
  | 'write-failed'
  | 'repair-attempted'
  | 'succeeded'
  | 'failed';

export type BatchSummary = {
  status: 'succeeded' | 'partial' | 'failed';
  succeeded: number;
  failed: number;
};

export type RollbackResult = {
  restored: number;
  failed: number;
};

/**
 * Raised by callers that treat a partially applied batch as a failure.
 * Carries every outcome so per-file status is not lost.
 */
export class ApplyBatchError extends Error {
  constructor(public readonly outcomes: ApplyOutcome[]) {
    const failed = outcomes.filter(o => !o.success);
    super(`failed to apply ${failed.length} of ${outcomes.length} file(s):\n` +
      failed.map(o => `${o.targetPath}: ${o.error?.message ?? 'unknown error'}`).join('\n'));
    this.name = 'ApplyBatchError';
  }
}

/**
 * Copies resolved dotfiles onto the target machine, backing up whatever
 * they replace first.
 */
export class Applier {
  constructor(
    private readonly backups: BackupManager,
    private readonly homeDir: string
  ) {}

  /**
   * Turns a logical target into an absolute path. Dotfiles live under the
   * home directory, so `~/x`, `.x` and bare relative paths all resolve there;
   * absolute paths are used as given.
   */
  resolveTargetPath(relPath: string): string {
    if (relPath.startsWith('~')) {
      return join(this.homeDir, relPath.slice(1));
    }
    if (relPath.startsWith('.')) {
      return join(this.homeDir, relPath);
    }
    if (isAbsolute(relPath)) {
      return relPath;
    }
    return join(this.homeDir, relPath);
  }

  /**
   * Installs one file. Never throws: failures are reported on the outcome,
   * after trying to put the previous content back.
   */
  async apply(sourcePath: string, targetRelPath: string, owner: OwnerIds): Promise<ApplyOutcome> {
    const targetPath = this.resolveTargetPath(targetRelPath);
    let step: ApplyStep = 'pending';
    const trace = (next: ApplyStep) => {
      ui.debug(`${targetPath}: ${step} → ${next}`);
      step = next;
    };

    let backup: BackupRecord | null;
    try {
      backup = await this.backups.backup(targetPath, owner.creatorId, owner.dotfileId);
    } catch (error) {
      trace('failed');
      return {
        sourcePath,
        targetPath,
        success: false,
        state: 'failed',
        error: new Error(`couldn't create backup: ${ErrorUtils.extractErrorMessage(error)}`),
        repair: 'not-needed'
      };
    }
    trace('backed-up');
    const backupPath = backup?.backupPath;

    try {
      await fs.ensureDir(dirname(targetPath));
      await copyWithMode(sourcePath, targetPath);
    } catch (error) {
      trace('write-failed');
      const repair = await this.repair(targetPath, backup);
      trace('repair-attempted');
      trace('failed');
      return {
        sourcePath,
        targetPath,
        backupPath,
        success: false,
        state: 'failed',
        error: new Error(`couldn't write file: ${ErrorUtils.extractErrorMessage(error)}`),
        repair
      };
    }
    trace('written');
    trace('succeeded');

    return { sourcePath, targetPath, backupPath, success: true, state: 'succeeded', repair: 'not-needed' };
  }

  /**
   * Applies every entry of the map in order. A failing file does not stop
   * the others.
   */
  async applyMultiple(files: ResolvedFileMap, owner: OwnerIds): Promise<ApplyOutcome[]> {
    const outcomes: ApplyOutcome[] = [];
    for (const [sourcePath, targetRelPath] of files) {
      outcomes.push(await this.apply(sourcePath, targetRelPath, owner));
    }
    return outcomes;
  }

  /**
   * Restores every file that was backed up during a batch. Files that did
   * not exist before are left in place.
   */
  async rollback(outcomes: ApplyOutcome[]): Promise<RollbackResult> {
    const result: RollbackResult = { restored: 0, failed: 0 };

    for (const outcome of outcomes) {
      if (!outcome.backupPath) continue;
      try {
        await this.backups.restore(outcome.backupPath, outcome.targetPath);
        result.restored++;
      } catch (error) {
        ui.debug(`Rollback of ${outcome.targetPath} failed: ${ErrorUtils.extractErrorMessage(error)}`);
        result.failed++;
      }
    }
    return result;
  }

  private async repair(targetPath: string, backup: BackupRecord | null): Promise<RepairResult> {
    try {
      if (backup) {
        await this.backups.restore(backup.backupPath, targetPath);
        return 'restored';
      }
      // nothing existed before, so a partial file must not stay behind
      if (!(await fs.pathExists(targetPath))) {
        return 'not-needed';
      }
      await fs.remove(targetPath);
      return 'removed-partial';
    } catch (error) {
      ui.warning(`Couldn't repair ${targetPath}: ${ErrorUtils.extractErrorMessage(error)}`);
      return 'failed';
    }
  }
}

export function summarizeOutcomes(outcomes: ApplyOutcome[]): BatchSummary {
  const succeeded = outcomes.filter(o => o.success).length;
  const failed = outcomes.length - succeeded;
  const status = failed === 0 ? 'succeeded' : succeeded === 0 ? 'failed' : 'partial';
  return { status, succeeded, failed };
}
