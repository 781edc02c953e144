import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { join, resolve } from 'path';
import type { Layout, RepositorySnapshot } from './types.js';

/** Root files written by a dotfile manager that owns the whole tree. */
export const MANAGER_MARKERS = [
  '.chezmoiroot',
  '.chezmoi.toml',
  '.chezmoi.yaml',
  '.chezmoi.json',
  '.chezmoi.toml.tmpl',
  '.chezmoi.yaml.tmpl',
  '.chezmoi.json.tmpl'
];

/** Root entries that belong to version control, not to the dotfiles. */
export const VCS_METADATA = new Set(['.git', '.gitignore', '.github', '.gitmodules', '.gitattributes']);

/** Top-level directories that never hold a package. */
const NON_PACKAGE_DIRS = new Set(['scripts', 'bin']);

type RootListing = {
  root: string;
  entries: Dirent[];
};

type LayoutRule = {
  layout: Layout;
  matches: (listing: RootListing) => Promise<boolean>;
};

async function listDir(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch {
    return [];
  }
}

function hasConfigLikeEntry(entries: Dirent[]): boolean {
  return entries.some(e => e.name.startsWith('.') || e.name.includes('config'));
}

async function countPackageDirs({ root, entries }: RootListing): Promise<number> {
  const candidates = entries.filter(e =>
    e.isDirectory() && !e.name.startsWith('.') && !NON_PACKAGE_DIRS.has(e.name)
  );

  let count = 0;
  for (const dir of candidates) {
    if (hasConfigLikeEntry(await listDir(join(root, dir.name)))) {
      count++;
    }
  }
  return count;
}

/**
 * Classification rules in priority order. The first rule that matches wins,
 * so a repository with a manager marker is managed even when it also has
 * dotfiles at its root.
 */
const LAYOUT_RULES: readonly LayoutRule[] = [
  {
    layout: 'managed-single-root',
    matches: async ({ entries }) =>
      entries.some(e => !e.isDirectory() && MANAGER_MARKERS.includes(e.name))
  },
  {
    layout: 'package-based',
    matches: async (listing) => (await countPackageDirs(listing)) >= 2
  },
  {
    layout: 'single-config-dir',
    matches: async ({ entries }) =>
      entries.some(e => e.isDirectory() && e.name === 'config')
  },
  {
    layout: 'flat',
    matches: async ({ entries }) =>
      entries.some(e => e.name.startsWith('.') && !VCS_METADATA.has(e.name))
  },
  {
    // A bare git directory used as the dotfile store. Only reached when
    // nothing above matched.
    layout: 'bare-worktree',
    matches: async ({ entries }) =>
      entries.some(e => e.isFile() && e.name === 'HEAD') &&
      entries.some(e => e.isDirectory() && e.name === 'objects') &&
      entries.some(e => e.isDirectory() && e.name === 'refs')
  }
];

/**
 * Inspects a checked-out repository and assigns one layout.
 *
 * Pure inspection: nothing is written. A root that cannot be read is
 * classified as `unknown`.
 *
 * @example
 * ```typescript
 * const layout = await classifyLayout('/home/me/.config/dotgraft/cache/primeagen');
 * // 'package-based'
 * ```
 */
export async function classifyLayout(root: string): Promise<Layout> {
  const listing: RootListing = { root, entries: await listDir(root) };

  for (const rule of LAYOUT_RULES) {
    if (await rule.matches(listing)) {
      return rule.layout;
    }
  }
  return 'unknown';
}

export async function inspectRepository(root: string): Promise<RepositorySnapshot> {
  const absolute = resolve(root);
  return { root: absolute, layout: await classifyLayout(absolute) };
}
