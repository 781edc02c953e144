import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';
import fs from 'fs-extra';
import { ui } from './ui.js';
import { ErrorUtils, SecurityValidator } from './utils/security.js';
import type { MaterializeOutcome, SubmoduleConfig, SubmoduleEntryOutcome } from './types.js';

export type CloneFn = (url: string, targetDir: string, options?: { signal?: AbortSignal }) => Promise<void>;

export type MaterializeOptions = {
  /** Clones `url` into the existing, empty `targetDir` */
  clone: CloneFn;
  signal?: AbortSignal;
};

const SECTION_HEADER = /^\[submodule\s+"(.*)"\s*\]$/;
const KEY_VALUE = /^([A-Za-z][\w-]*)\s*=\s*(.*)$/;

/**
 * Parses the `.gitmodules` file of `repoDir`.
 *
 * A repository without the file has no submodules: the result is an empty
 * list. Sections missing a `path` or `url` are dropped; the order of the
 * file is kept.
 */
export async function parseGitmodules(repoDir: string): Promise<SubmoduleConfig[]> {
  let content: string;
  try {
    content = await readFile(join(repoDir, '.gitmodules'), 'utf8');
  } catch (error) {
    if (ErrorUtils.hasCode(error, 'ENOENT')) return [];
    throw new Error(`couldn't read .gitmodules: ${ErrorUtils.extractErrorMessage(error)}`);
  }

  const submodules: SubmoduleConfig[] = [];
  let current: Partial<SubmoduleConfig> | null = null;

  const flush = () => {
    if (current?.path && current.url) {
      submodules.push({ name: current.name ?? current.path, path: current.path, url: current.url });
    }
  };

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    if (line.startsWith('[')) {
      flush();
      const header = SECTION_HEADER.exec(line);
      current = header ? { name: header[1] } : null;
      continue;
    }

    const pair = current ? KEY_VALUE.exec(line) : null;
    if (!current || !pair) continue;

    const key = pair[1].toLowerCase();
    if (key === 'path') current.path = pair[2].trim();
    if (key === 'url') current.url = pair[2].trim();
  }
  flush();

  return submodules;
}

/**
 * Converts an SSH clone URL to its HTTPS equivalent so public submodules can
 * be fetched without SSH keys.
 *
 * @example
 * ```typescript
 * convertSshToHttps('git@github.com:owner/nvim.git'); // 'https://github.com/owner/nvim'
 * convertSshToHttps('https://github.com/owner/nvim'); // unchanged
 * ```
 */
export function convertSshToHttps(url: string): string {
  const scp = /^[\w.-]+@([^:/]+):(.+?)(?:\.git)?\/?$/.exec(url);
  if (scp) {
    return `https://${scp[1]}/${scp[2]}`;
  }

  const ssh = /^ssh:\/\/(?:[^@/]+@)?([^:/]+)(?::\d+)?\/(.+?)(?:\.git)?\/?$/.exec(url);
  if (ssh) {
    return `https://${ssh[1]}/${ssh[2]}`;
  }

  return url;
}

export function findSubmoduleByPath(submodules: SubmoduleConfig[], path: string): SubmoduleConfig | undefined {
  return submodules.find(s => s.path === path);
}

/**
 * True when `dir` contains nothing, or only the `.git` placeholder file git
 * leaves for a submodule that was never initialized. A `.git` directory is a
 * real checkout, so the directory is not empty.
 *
 * @throws When `dir` cannot be read (missing, not a directory)
 */
export async function isEmptyDirectory(dir: string): Promise<boolean> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.every(entry => entry.name === '.git' && !entry.isDirectory());
}

async function cloneWithFallback(
  submodule: SubmoduleConfig,
  targetDir: string,
  options: MaterializeOptions
): Promise<string> {
  const original = SecurityValidator.validateCloneUrl(submodule.url);
  const https = convertSshToHttps(original);

  try {
    await options.clone(https, targetDir, { signal: options.signal });
    return https;
  } catch (error) {
    if (https === original) throw error;
    ui.debug(`HTTPS clone of ${submodule.path} failed, retrying with ${original}`);
    await options.clone(original, targetDir, { signal: options.signal });
    return original;
  }
}

async function materializeNested(
  dir: string,
  maxDepth: number,
  options: MaterializeOptions
): Promise<MaterializeOutcome | undefined> {
  try {
    return await materializeSubmodules(dir, maxDepth, options);
  } catch (error) {
    options.signal?.throwIfAborted();
    ui.warning(`Couldn't resolve nested submodules in ${dir}: ${ErrorUtils.extractErrorMessage(error)}`);
    return undefined;
  }
}

async function materializeEntry(
  root: string,
  submodule: SubmoduleConfig,
  maxDepth: number,
  options: MaterializeOptions
): Promise<SubmoduleEntryOutcome> {
  const dir = join(root, submodule.path);
  if (!SecurityValidator.isWithin(root, dir) || dir === join(root)) {
    return { ...submodule, status: 'skipped', reason: 'path escapes the repository' };
  }

  const info = await stat(dir).catch(() => null);
  if (info && !info.isDirectory()) {
    return { ...submodule, status: 'skipped', reason: 'path exists and is not a directory' };
  }

  try {
    if (!info) {
      await fs.ensureDir(dir);
    } else if (!(await isEmptyDirectory(dir))) {
      const nested = await materializeNested(dir, maxDepth - 1, options);
      return { ...submodule, status: 'resolved', source: 'present', nested };
    } else {
      // git refuses to clone next to the gitlink placeholder
      await fs.remove(join(dir, '.git'));
    }
  } catch (error) {
    return { ...submodule, status: 'failed', reason: ErrorUtils.extractErrorMessage(error) };
  }

  let clonedFrom: string;
  try {
    clonedFrom = await cloneWithFallback(submodule, dir, options);
  } catch (error) {
    // Private or unreachable submodules are common; siblings still get a chance
    return { ...submodule, status: 'failed', reason: SecurityValidator.sanitizeErrorMessage(error) };
  }

  const nested = await materializeNested(dir, maxDepth - 1, options);
  return { ...submodule, status: 'resolved', source: 'cloned', clonedFrom, nested };
}

/**
 * Clones every uninitialized submodule of `root`, then recurses into the
 * results until `maxDepth` is used up.
 *
 * Entries are processed one after another. A failing entry is recorded and
 * skipped; the level only reports `ok: false` when it declared submodules
 * and none of them resolved.
 *
 * @param root - Checkout containing the `.gitmodules` file
 * @param maxDepth - Levels left, including this one
 */
export async function materializeSubmodules(
  root: string,
  maxDepth: number,
  options: MaterializeOptions
): Promise<MaterializeOutcome> {
  if (maxDepth <= 0) {
    return { ok: true, entries: [], depthExhausted: true };
  }

  const submodules = await parseGitmodules(root);
  if (submodules.length === 0) {
    return { ok: true, entries: [], depthExhausted: false };
  }

  ui.debug(`Resolving ${submodules.length} submodule(s) in ${root}`);

  const entries: SubmoduleEntryOutcome[] = [];
  for (const submodule of submodules) {
    options.signal?.throwIfAborted();
    entries.push(await materializeEntry(root, submodule, maxDepth, options));
  }

  const resolved = entries.filter(e => e.status === 'resolved').length;
  return { ok: resolved > 0, entries, depthExhausted: false };
}
