import { readdir, stat } from 'fs/promises';
import { basename, dirname, join, relative } from 'path';
import fs from 'fs-extra';
import { isEmptyDirectory } from './submodules.js';
import { SecurityValidator } from './utils/security.js';
import { ui } from './ui.js';
import type {
  Layout,
  MaterializeOutcome,
  RepositorySnapshot,
  ResolveResult,
  ResolvedFileMap
} from './types.js';

export type PathLookup =
  | { found: true; path: string }
  | { found: false };

/**
 * Directory aliases creators use instead of the real location, tried in
 * order. Only the first occurrence of the pattern is substituted.
 */
export const PATH_ALIASES: ReadonlyArray<readonly [pattern: string, replacements: readonly string[]]> = [
  ['.config', ['xdg_config', 'config']],
  ['~', ['home']]
];

const NOT_FOUND: PathLookup = { found: false };

async function existsWithin(root: string, candidate: string): Promise<string | null> {
  if (!SecurityValidator.isWithin(root, candidate)) {
    return null;
  }
  return (await fs.pathExists(candidate)) ? candidate : null;
}

async function sortedDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter(e => e.isDirectory() && !e.name.startsWith('.'))
      .map(e => e.name)
      .sort();
  } catch {
    return [];
  }
}

async function searchLayout(root: string, logicalPath: string, layout: Layout): Promise<string | null> {
  switch (layout) {
    case 'package-based': {
      for (const pkg of await sortedDirectories(root)) {
        const hit = await existsWithin(root, join(root, pkg, logicalPath));
        if (hit) return hit;
      }
      return null;
    }
    case 'managed-single-root': {
      // The manager stores `.vimrc` as `dot_vimrc`
      const base = basename(logicalPath);
      if (!base.startsWith('.')) return null;
      const managed = join(root, dirname(logicalPath), `dot_${base.slice(1)}`);
      return existsWithin(root, managed);
    }
    case 'single-config-dir':
      return existsWithin(root, join(root, 'config', logicalPath));
    default:
      // flat repositories were covered by the exact lookup
      return null;
  }
}

/**
 * Locates the file or directory a logical path refers to inside a checkout.
 *
 * Lookup order, first hit wins:
 * 1. `root/logicalPath`
 * 2. the same location with the leading dot of the last component removed
 *    (`.vimrc` → `vimrc`)
 * 3. alias substitution (`.config` → `xdg_config` | `config`, `~` → `home`)
 * 4. the layout-specific search
 *
 * Candidates outside `root` never match.
 */
export async function resolvePath(root: string, logicalPath: string, layout: Layout): Promise<PathLookup> {
  const exact = await existsWithin(root, join(root, logicalPath));
  if (exact) return { found: true, path: exact };

  const base = basename(logicalPath);
  if (base.startsWith('.') && base.length > 1) {
    const undotted = await existsWithin(root, join(root, dirname(logicalPath), base.slice(1)));
    if (undotted) return { found: true, path: undotted };
  }

  for (const [pattern, replacements] of PATH_ALIASES) {
    if (!logicalPath.includes(pattern)) continue;
    for (const replacement of replacements) {
      const aliased = await existsWithin(root, join(root, logicalPath.replace(pattern, replacement)));
      if (aliased) return { found: true, path: aliased };
    }
  }

  const searched = await searchLayout(root, logicalPath, layout);
  return searched ? { found: true, path: searched } : NOT_FOUND;
}

/**
 * Walks `dir` and adds every file to `into`, keyed by absolute path and
 * mapped to `logicalPath` joined with the file's path relative to `dir`.
 * `.git` entries are skipped entirely, directories and gitlink files alike.
 *
 * @returns Number of files added
 */
export async function collectFiles(dir: string, logicalPath: string, into: ResolvedFileMap): Promise<number> {
  let added = 0;

  async function walk(current: string): Promise<void> {
    const entries = await readdir(current, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      if (entry.name === '.git') continue;
      const full = join(current, entry.name);

      if (entry.isDirectory()) {
        await walk(full);
        continue;
      }

      const target = entry.isSymbolicLink() ? await stat(full).catch(() => null) : null;
      if (entry.isFile() || target?.isFile()) {
        into.set(full, join(logicalPath, relative(dir, full)));
        added++;
      } else if (entry.isSymbolicLink()) {
        ui.debug(`Skipping ${full}: ${target ? 'links to a directory' : 'broken symlink'}`);
      }
    }
  }

  await walk(dir);
  return added;
}

export type ResolveOptions = {
  /**
   * Called when a requested directory holds no files, typically an
   * uninitialized submodule. Receives the repository root.
   */
  materialize?: (root: string) => Promise<MaterializeOutcome>;
};

/**
 * Resolves every logical path of a dotfile into concrete files.
 *
 * Returns `not-found` for the first path that cannot be located so the
 * caller can fall back to manual selection; that is not an error.
 */
export async function resolveDotfile(
  snapshot: RepositorySnapshot,
  logicalPaths: string[],
  options: ResolveOptions = {}
): Promise<ResolveResult> {
  const { root, layout } = snapshot;
  const files: ResolvedFileMap = new Map();
  let submodules: MaterializeOutcome | undefined;

  for (const logicalPath of logicalPaths) {
    const lookup = await resolvePath(root, logicalPath, layout);
    if (!lookup.found) {
      ui.debug(`No match for ${logicalPath} (layout: ${layout})`);
      return { kind: 'not-found', requestedPath: logicalPath, repoPath: root };
    }

    const info = await stat(lookup.path);
    if (!info.isDirectory()) {
      files.set(lookup.path, logicalPath);
      continue;
    }

    let found = await collectFiles(lookup.path, logicalPath, files);

    if (found === 0 && options.materialize && await isEmptyDirectory(lookup.path)) {
      ui.info(`${logicalPath} looks like an uninitialized submodule, fetching it...`);
      submodules = await options.materialize(root);
      if (submodules.ok) {
        found = await collectFiles(lookup.path, logicalPath, files);
      }
    }

    if (found === 0) {
      return { kind: 'not-found', requestedPath: logicalPath, repoPath: root };
    }
  }

  return submodules ? { kind: 'resolved', files, submodules } : { kind: 'resolved', files };
}

/**
 * Maps a file or directory the user picked by hand onto a logical path.
 */
export async function mapSelection(selectedPath: string, logicalPath: string): Promise<ResolvedFileMap> {
  const files: ResolvedFileMap = new Map();
  const info = await stat(selectedPath);

  if (info.isDirectory()) {
    await collectFiles(selectedPath, logicalPath, files);
  } else {
    files.set(selectedPath, logicalPath);
  }
  return files;
}
