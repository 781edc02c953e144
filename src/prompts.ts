import { input, select, confirm } from '@inquirer/prompts';
import { basename, isAbsolute, resolve } from 'path';
import fs from 'fs-extra';
import { CREATOR_ID_PATTERN } from './cache.js';
import { ui } from './ui.js';
import { ErrorUtils, SecurityValidator } from './utils/security.js';
import type { BackupRecord, CreatorSpec, DotfileSpec } from './types.js';

export type Action = 'apply' | 'restore';

export type UserSelection = {
  creator: CreatorSpec;
  dotfile: DotfileSpec;
};

/**
 * Thrown when the user cancels: Ctrl+C, ESC, or a declined confirmation.
 *
 * @example
 * ```typescript
 * if (!confirmed) {
 *   throw new UserCancelledError('Apply cancelled by user');
 * }
 * ```
 */
export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

function isPromptExit(error: unknown): boolean {
  return error instanceof Error &&
    (error.name === 'ExitPromptError' || error.message.includes('User force closed'));
}

async function ask<T>(prompt: () => Promise<T>): Promise<T> {
  try {
    return await prompt();
  } catch (error) {
    if (isPromptExit(error)) {
      throw new UserCancelledError('Operation cancelled by user (Ctrl+C)');
    }
    throw error;
  }
}

function looksLikeUrl(source: string): boolean {
  return source.includes('://') || /^[^/\s]+@[^/\s]+:/.test(source);
}

/**
 * Default creator id for a source: the owner segment of a clone URL, or
 * the directory name of a local checkout.
 *
 * @example
 * ```typescript
 * suggestCreatorId('https://github.com/alice/dotfiles.git'); // 'alice'
 * suggestCreatorId('/home/me/my dots');                      // 'my-dots'
 * ```
 */
export function suggestCreatorId(source: string): string {
  const trimmed = source.trim().replace(/\/+$/, '').replace(/\.git$/, '');
  const segments = trimmed.split(/[/:]/).filter(Boolean);
  const picked = looksLikeUrl(trimmed) && segments.length >= 2
    ? segments[segments.length - 2]
    : basename(trimmed);
  return picked.replace(/[^A-Za-z0-9._-]+/g, '-').replace(/^[.]+/, '');
}

/**
 * Splits a comma separated list of logical paths.
 */
export function parsePathList(value: string): string[] {
  return value.split(',').map(p => p.trim()).filter(Boolean);
}

export async function selectAction(): Promise<Action> {
  return ask(() => select<Action>({
    message: 'What do you want to do?',
    choices: [
      { name: 'Apply dotfiles from a repository', value: 'apply' },
      { name: 'Restore a file from a backup', value: 'restore' }
    ]
  }));
}

/**
 * Asks where the dotfiles come from and which paths to install.
 *
 * The source is either a clone URL or a local directory. Logical paths are
 * entered the way they appear in the home directory (`.config/nvim`,
 * `~/.tmux.conf`).
 *
 * @throws {UserCancelledError} When the user cancels
 */
export async function getUserSelections(): Promise<UserSelection> {
  const source = (await ask(() => input({
    message: 'Dotfile repository (clone URL or local directory):',
    validate: async (value: string) => {
      const trimmed = value.trim();
      if (!trimmed) {
        return 'Repository cannot be empty';
      }
      if (!looksLikeUrl(trimmed) && await fs.pathExists(trimmed)) {
        return true;
      }
      try {
        SecurityValidator.validateCloneUrl(trimmed);
        return true;
      } catch (error) {
        return ErrorUtils.extractErrorMessage(error);
      }
    }
  }))).trim();

  const creatorId = (await ask(() => input({
    message: 'Creator id:',
    default: suggestCreatorId(source) || undefined,
    validate: (value: string) => CREATOR_ID_PATTERN.test(value.trim())
      ? true
      : 'Creator id can only contain letters, numbers, dots, hyphens, and underscores'
  }))).trim();

  const creatorName = (await ask(() => input({
    message: 'Creator name:',
    default: creatorId
  }))).trim() || creatorId;

  const dotfileId = (await ask(() => input({
    message: 'Dotfile id (e.g. nvim):',
    validate: (value: string) => /^[A-Za-z0-9._-]+$/.test(value.trim())
      ? true
      : 'Dotfile id can only contain letters, numbers, dots, hyphens, and underscores'
  }))).trim();

  const paths = parsePathList(await ask(() => input({
    message: 'Paths to install (comma separated):',
    validate: (value: string) => parsePathList(value).length > 0 ? true : 'Enter at least one path'
  })));

  return {
    creator: {
      id: creatorId,
      name: creatorName,
      repo: looksLikeUrl(source) ? source : resolve(source)
    },
    dotfile: {
      id: dotfileId,
      name: dotfileId,
      description: '',
      paths,
      dependencies: []
    }
  };
}

/**
 * Manual fallback when a logical path cannot be located. The answer is
 * taken relative to the repository and must stay inside it.
 *
 * @returns Absolute path of the chosen file or directory
 * @throws {UserCancelledError} When the user leaves the answer empty
 */
export async function chooseManualPath(requestedPath: string, repoPath: string): Promise<string> {
  const answer = (await ask(() => input({
    message: `Path inside the repository to use for ${requestedPath} (empty to cancel):`,
    validate: async (value: string) => {
      const trimmed = value.trim();
      if (!trimmed) return true;
      const candidate = isAbsolute(trimmed) ? trimmed : resolve(repoPath, trimmed);
      if (!SecurityValidator.isWithin(repoPath, candidate)) {
        return 'Path must be inside the repository';
      }
      return (await fs.pathExists(candidate)) ? true : `${trimmed} doesn't exist`;
    }
  }))).trim();

  if (!answer) {
    throw new UserCancelledError(`No file selected for ${requestedPath}`);
  }
  return isAbsolute(answer) ? answer : resolve(repoPath, answer);
}

export async function confirmApply(fileCount: number): Promise<boolean> {
  return ask(() => confirm({
    message: `Apply ${fileCount} file(s)? Existing files are backed up first.`,
    default: true
  }));
}

export async function confirmRollback(failedCount: number): Promise<boolean> {
  return ask(() => confirm({
    message: `${failedCount} file(s) failed. Roll back the files that were replaced?`,
    default: true
  }));
}

/**
 * Picks one recorded backup, newest first.
 *
 * @throws {Error} When there are no backups to pick from
 */
export async function selectBackup(records: BackupRecord[]): Promise<BackupRecord> {
  if (records.length === 0) {
    throw new Error('No backups recorded');
  }
  const newestFirst = [...records].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());

  return ask(() => select<BackupRecord>({
    message: 'Backup to restore:',
    choices: newestFirst.map(record => ({
      name: `${record.originalPath} ${ui.dim(`(${record.timestamp.toLocaleString()}, ${record.creatorId}/${record.dotfileId})`)}`,
      value: record
    }))
  }));
}

/**
 * Reports an error from the interactive flow and exits: 0 for a
 * cancellation, 1 for anything else.
 */
export function handlePromptError(error: unknown): void {
  console.log('');

  if (error instanceof UserCancelledError) {
    ui.userCancelled();
    process.exit(0);
  }

  const errorMessage = ErrorUtils.extractErrorMessage(error);

  if (errorMessage.includes('No backups recorded')) {
    ui.error('❌ Nothing to restore: no backups recorded yet');
    process.exit(1);
  } else {
    ui.error(`❌ An error occurred: ${errorMessage}`);
    process.exit(1);
  }
}
