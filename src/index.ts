#!/usr/bin/env node

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import {
  chooseManualPath,
  confirmApply,
  confirmRollback,
  getUserSelections,
  handlePromptError,
  selectAction,
  selectBackup,
  UserCancelledError
} from './prompts.js';
import {
  acquireRepository,
  applyResolved,
  createMaterializer,
  prepareRepository,
  previewDiffs,
  resolveWithFallback,
  type PreviewEntry
} from './pipeline.js';
import { Applier, ApplyBatchError } from './applier.js';
import { BackupManager } from './backup.js';
import { ensureDirectories, loadConfig, type Config } from './config.js';
import { ui } from './ui.js';

/**
 * Shows the preview and returns how many files would change.
 */
function displayPreview(entries: PreviewEntry[]): number {
  let changes = 0;
  for (const entry of entries) {
    if (entry.kind === 'error') {
      ui.error(`❌ ${entry.targetPath}: ${entry.message}`);
      continue;
    }
    ui.diffSummary(entry.result);
    if (entry.result.kind !== 'identical') {
      changes++;
      ui.diffBody(entry.result.diff);
    }
    console.log();
  }
  return changes;
}

async function runApply(config: Config, backups: BackupManager): Promise<void> {
  const { creator, dotfile } = await getUserSelections();
  const owner = { creatorId: creator.id, dotfileId: dotfile.id };

  const repoPath = await acquireRepository(creator, config);
  const snapshot = await prepareRepository(repoPath);
  const files = await resolveWithFallback(snapshot, dotfile, createMaterializer(config), chooseManualPath);

  const applier = new Applier(backups, config.homeDir);
  const previews = await previewDiffs(files, applier, config.previewLines);
  const changes = displayPreview(previews);

  const unreadable = previews.filter(entry => entry.kind === 'error').length;
  if (changes === 0) {
    if (unreadable > 0) {
      throw new Error(`${unreadable} file(s) could not be compared, nothing was applied`);
    }
    ui.success('✅ Everything is already up to date');
    return;
  }

  if (!(await confirmApply(files.size))) {
    throw new UserCancelledError('Apply cancelled by user');
  }

  const { outcomes, summary } = await applyResolved(files, applier, owner);

  if (summary.status !== 'succeeded') {
    if (await confirmRollback(summary.failed)) {
      const rollback = await applier.rollback(outcomes);
      ui.info(`Restored ${rollback.restored} file(s), ${rollback.failed} could not be restored`);
    }
    throw new ApplyBatchError(outcomes);
  }

  ui.applyComplete(summary.succeeded);
}

async function runRestore(backups: BackupManager): Promise<void> {
  const record = await selectBackup(await backups.listAll());
  await backups.restore(record.backupPath, record.originalPath);
  ui.success(`✅ Restored ${record.originalPath}`);
}

async function main(): Promise<void> {
  try {
    ui.header('🧩 dotgraft\n');

    const config = loadConfig();
    await ensureDirectories(config);
    ui.debug(`Using ${config.baseDir}, installing into ${config.homeDir}`);

    const backups = new BackupManager(config.backupDir, config.homeDir);
    const action = await selectAction();

    if (action === 'restore') {
      await runRestore(backups);
    } else {
      await runApply(config, backups);
    }
  } catch (error) {
    handlePromptError(error);
  }
}

export { main };

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  await main();
}
