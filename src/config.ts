import { homedir } from 'os';
import { join } from 'path';
import fs from 'fs-extra';
import { z } from 'zod';

/**
 * Runtime settings, resolved once at startup.
 */
export type Config = {
  /** Base directory for everything dotgraft stores */
  baseDir: string;
  /** Creator repositories, one directory per creator id */
  cacheDir: string;
  /** Backups and the backup index */
  backupDir: string;
  /** Directory dotfiles are installed into */
  homeDir: string;
  cloneTimeoutMs: number;
  /** Concurrent repository downloads */
  concurrency: number;
  /** Nested submodule levels fetched for an empty directory */
  submoduleDepth: number;
  /** Lines of a new file shown in the preview */
  previewLines: number;
};

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  HOME: z.string().optional(),
  XDG_CONFIG_HOME: z.string().optional(),
  DOTGRAFT_HOME: z.string().optional(),
  DOTGRAFT_TARGET_HOME: z.string().optional(),
  DOTGRAFT_CLONE_TIMEOUT_MS: positiveInt(120000),
  DOTGRAFT_CONCURRENCY: positiveInt(5),
  DOTGRAFT_SUBMODULE_DEPTH: positiveInt(3),
  DOTGRAFT_PREVIEW_LINES: positiveInt(20)
});

/**
 * Builds the configuration from environment variables.
 *
 * Defaults follow the XDG layout: `$XDG_CONFIG_HOME/dotgraft`, falling back
 * to `~/.config/dotgraft`.
 *
 * @throws {Error} When a numeric variable is not a positive integer
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration: ${issue.path.join('.')} ${issue.message}`);
  }
  const vars = parsed.data;

  const home = vars.HOME || homedir();
  const configHome = vars.XDG_CONFIG_HOME || join(home, '.config');
  const baseDir = vars.DOTGRAFT_HOME || join(configHome, 'dotgraft');

  return {
    baseDir,
    cacheDir: join(baseDir, 'cache'),
    backupDir: join(baseDir, 'backups'),
    homeDir: vars.DOTGRAFT_TARGET_HOME || home,
    cloneTimeoutMs: vars.DOTGRAFT_CLONE_TIMEOUT_MS,
    concurrency: vars.DOTGRAFT_CONCURRENCY,
    submoduleDepth: vars.DOTGRAFT_SUBMODULE_DEPTH,
    previewLines: vars.DOTGRAFT_PREVIEW_LINES
  };
}

/**
 * Creates the directories the configuration points at. Safe to call
 * repeatedly.
 */
export async function ensureDirectories(config: Config): Promise<void> {
  for (const dir of [config.baseDir, config.cacheDir, config.backupDir]) {
    await fs.ensureDir(dir);
  }
}
