import { readFile, stat, chmod } from 'fs/promises';
import { basename, dirname, isAbsolute, join, relative } from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/security.js';
import type { BackupRecord } from './types.js';

export const INDEX_FILE = 'backup_manifest.json';

const indexEntrySchema = z.object({
  original_path: z.string(),
  backup_path: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  creator_id: z.string(),
  dotfile_id: z.string()
});

const indexSchema = z.array(indexEntrySchema);

type IndexEntry = z.infer<typeof indexEntrySchema>;

function toRecord(entry: IndexEntry): BackupRecord {
  return {
    originalPath: entry.original_path,
    backupPath: entry.backup_path,
    timestamp: new Date(entry.timestamp),
    creatorId: entry.creator_id,
    dotfileId: entry.dotfile_id
  };
}

function toEntry(record: BackupRecord): IndexEntry {
  return {
    original_path: record.originalPath,
    backup_path: record.backupPath,
    timestamp: record.timestamp.toISOString(),
    creator_id: record.creatorId,
    dotfile_id: record.dotfileId
  };
}

/**
 * `YYYYMMDD_HHMMSS` in local time.
 */
export function formatBackupTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Copies bytes and permission bits of `src` onto `dst`.
 */
export async function copyWithMode(src: string, dst: string): Promise<void> {
  await fs.copyFile(src, dst);
  const { mode } = await stat(src);
  await chmod(dst, mode & 0o7777);
}

type IndexRead =
  | { state: 'ok'; entries: IndexEntry[] }
  | { state: 'missing' }
  | { state: 'corrupt'; reason: string };

/**
 * Snapshots files before they are overwritten and keeps an index of every
 * snapshot taken.
 *
 * Backups mirror the original's location relative to the home directory
 * (`~/.config/nvim/init.lua` → `<backupDir>/.config/nvim/init.lua_<ts>_<id>.bak`)
 * and are never deleted automatically. The index is rewritten on every
 * backup and assumes a single writer.
 */
export class BackupManager {
  constructor(
    private readonly backupDir: string,
    private readonly homeDir: string
  ) {}

  get indexPath(): string {
    return join(this.backupDir, INDEX_FILE);
  }

  /**
   * Copies `originalPath` into the backup tree and records it.
   *
   * @returns The record, or `null` when there is nothing to protect
   * @throws When the copy or the index update fails
   */
  async backup(originalPath: string, creatorId: string, dotfileId: string, now = new Date()): Promise<BackupRecord | null> {
    if (!(await fs.pathExists(originalPath))) {
      return null;
    }

    const backupPath = await this.allocateBackupPath(originalPath, dotfileId, now);
    await fs.ensureDir(dirname(backupPath));
    try {
      await copyWithMode(originalPath, backupPath);
    } catch (error) {
      throw new Error(`couldn't back up ${originalPath}: ${ErrorUtils.extractErrorMessage(error)}`);
    }

    const record: BackupRecord = { originalPath, backupPath, timestamp: now, creatorId, dotfileId };
    await this.appendToIndex(record);
    ui.debug(`Backed up ${originalPath} to ${backupPath}`);
    return record;
  }

  /**
   * Every recorded backup of `originalPath`, oldest first.
   */
  async listBackups(originalPath: string): Promise<BackupRecord[]> {
    return (await this.listAll()).filter(r => r.originalPath === originalPath);
  }

  /**
   * Every recorded backup. A missing or unreadable index reads as empty.
   */
  async listAll(): Promise<BackupRecord[]> {
    const index = await this.readIndex();
    return index.state === 'ok' ? index.entries.map(toRecord) : [];
  }

  /**
   * Copies a backup over `originalPath`, recreating its directory if needed.
   *
   * @throws {Error} When the backup file does not exist
   */
  async restore(backupPath: string, originalPath: string): Promise<void> {
    if (!(await fs.pathExists(backupPath))) {
      throw new Error(`backup doesn't exist: ${backupPath}`);
    }
    await fs.ensureDir(dirname(originalPath));
    try {
      await copyWithMode(backupPath, originalPath);
    } catch (error) {
      throw new Error(`couldn't restore ${originalPath}: ${ErrorUtils.extractErrorMessage(error)}`);
    }
  }

  /**
   * Directory of the backup, relative to the backup root. Files outside the
   * home directory are stored flat.
   */
  private relativeDir(originalPath: string): string {
    const rel = relative(this.homeDir, originalPath);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      return '';
    }
    return dirname(rel);
  }

  private async allocateBackupPath(originalPath: string, dotfileId: string, now: Date): Promise<string> {
    const dir = join(this.backupDir, this.relativeDir(originalPath));
    const stem = `${basename(originalPath)}_${formatBackupTimestamp(now)}_${dotfileId}`;

    let candidate = join(dir, `${stem}.bak`);
    for (let n = 1; await fs.pathExists(candidate); n++) {
      candidate = join(dir, `${stem}-${n}.bak`);
    }
    return candidate;
  }

  private async readIndex(): Promise<IndexRead> {
    let raw: string;
    try {
      raw = await readFile(this.indexPath, 'utf8');
    } catch (error) {
      if (ErrorUtils.hasCode(error, 'ENOENT')) return { state: 'missing' };
      return { state: 'corrupt', reason: ErrorUtils.extractErrorMessage(error) };
    }

    try {
      const parsed = indexSchema.safeParse(JSON.parse(raw));
      return parsed.success
        ? { state: 'ok', entries: parsed.data }
        : { state: 'corrupt', reason: parsed.error.issues[0]?.message ?? 'invalid index' };
    } catch (error) {
      return { state: 'corrupt', reason: ErrorUtils.extractErrorMessage(error) };
    }
  }

  private async appendToIndex(record: BackupRecord): Promise<void> {
    const index = await this.readIndex();
    let entries: IndexEntry[] = [];

    if (index.state === 'ok') {
      entries = index.entries;
    } else if (index.state === 'corrupt') {
      // keep the unreadable index around instead of overwriting its history
      const aside = `${this.indexPath}.corrupt-${formatBackupTimestamp(record.timestamp)}`;
      await fs.move(this.indexPath, aside, { overwrite: true });
      ui.warning(`Backup index was unreadable (${index.reason}); moved it to ${aside}`);
    }

    entries.push(toEntry(record));
    await fs.ensureDir(this.backupDir);
    await fs.writeJson(this.indexPath, entries, { spaces: 2 });
  }
}
