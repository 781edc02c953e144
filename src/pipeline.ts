import { stat } from 'fs/promises';
import { resolve } from 'path';
import { inspectRepository } from './layout.js';
import { mapSelection, resolveDotfile } from './resolver.js';
import { materializeSubmodules } from './submodules.js';
import { generateDiff } from './diff.js';
import { cloneRepo } from './git.js';
import { RepoCache } from './cache.js';
import { Applier, summarizeOutcomes, type BatchSummary } from './applier.js';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/security.js';
import type { Config } from './config.js';
import type {
  ApplyOutcome,
  CreatorSpec,
  DiffResult,
  DotfileSpec,
  MaterializeOutcome,
  OwnerIds,
  RepositorySnapshot,
  ResolvedFileMap
} from './types.js';

export type PreviewEntry =
  | { kind: 'ok'; result: DiffResult }
  | { kind: 'error'; sourcePath: string; targetPath: string; message: string };

/**
 * Classifies a checked-out repository and reports the layout.
 */
export async function prepareRepository(root: string): Promise<RepositorySnapshot> {
  const snapshot = await inspectRepository(root);
  ui.layoutDetected(snapshot.layout);
  return snapshot;
}

/**
 * Builds the submodule fallback used by the resolver: clones missing
 * submodules with the configured depth and timeout.
 */
export function createMaterializer(
  config: Pick<Config, 'submoduleDepth' | 'cloneTimeoutMs'>,
  signal?: AbortSignal
): (root: string) => Promise<MaterializeOutcome> {
  return async (root) => {
    let outcome: MaterializeOutcome;
    try {
      outcome = await materializeSubmodules(root, config.submoduleDepth, {
        clone: (url, dir, options) => cloneRepo(url, dir, { ...options, timeout: config.cloneTimeoutMs }),
        signal
      });
    } catch (error) {
      signal?.throwIfAborted();
      ui.warning(`Couldn't resolve submodules: ${ErrorUtils.extractErrorMessage(error)}`);
      return { ok: false, entries: [], depthExhausted: false };
    }
    outcome.entries.forEach(entry => ui.submoduleEntry(entry));
    if (!outcome.ok) {
      ui.warning(`Couldn't resolve any of the ${outcome.entries.length} submodule(s)`);
    }
    return outcome;
  };
}

/**
 * Resolves a dotfile's logical paths one at a time. A path that cannot be
 * located is handed to `choosePath`, and the file or directory it returns
 * is mapped onto that logical path instead.
 */
export async function resolveWithFallback(
  snapshot: RepositorySnapshot,
  dotfile: DotfileSpec,
  materialize: (root: string) => Promise<MaterializeOutcome>,
  choosePath: (requestedPath: string, repoPath: string) => Promise<string>
): Promise<ResolvedFileMap> {
  const files: ResolvedFileMap = new Map();
  let materialized: Promise<MaterializeOutcome> | undefined;
  const materializeOnce = (root: string) => (materialized ??= materialize(root));

  for (const logicalPath of dotfile.paths) {
    const result = await resolveDotfile(snapshot, [logicalPath], { materialize: materializeOnce });
    const resolved = result.kind === 'resolved'
      ? result.files
      : await chooseInstead(result.requestedPath, result.repoPath, choosePath);
    resolved.forEach((target, source) => {
      const existing = files.get(source);
      if (existing === undefined) {
        files.set(source, target);
      } else if (existing !== target) {
        ui.warning(`${source} is already mapped to ${existing}, skipping ${target}`);
      }
    });
  }

  ui.filesResolved(files.size);
  return files;
}

async function chooseInstead(
  requestedPath: string,
  repoPath: string,
  choosePath: (requestedPath: string, repoPath: string) => Promise<string>
): Promise<ResolvedFileMap> {
  ui.pathNotFound(requestedPath, repoPath);
  return mapSelection(await choosePath(requestedPath, repoPath), requestedPath);
}

/**
 * Local checkout for a creator. A local directory is used in place;
 * anything else is cloned into (or updated in) the cache.
 */
export async function acquireRepository(
  creator: CreatorSpec,
  config: Pick<Config, 'cacheDir' | 'cloneTimeoutMs' | 'concurrency'>,
  signal?: AbortSignal
): Promise<string> {
  if (await isDirectory(creator.repo)) {
    ui.debug(`Using local repository ${creator.repo}`);
    return resolve(creator.repo);
  }

  ui.fetching(creator.name);
  const cache = new RepoCache(config.cacheDir);
  const paths = await cache.ensureRepos([creator], {
    concurrency: config.concurrency,
    timeout: config.cloneTimeoutMs,
    signal
  });
  const repoPath = paths.get(creator.id);
  if (!repoPath) {
    throw new Error(`couldn't download ${creator.name}'s dotfiles`);
  }
  return repoPath;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Diffs every resolved file against what is installed now. A file that
 * cannot be read is reported on its own entry; the others are still
 * compared.
 */
export async function previewDiffs(
  files: ResolvedFileMap,
  applier: Applier,
  previewLines?: number
): Promise<PreviewEntry[]> {
  const entries: PreviewEntry[] = [];

  for (const [sourcePath, targetRelPath] of files) {
    const targetPath = applier.resolveTargetPath(targetRelPath);
    try {
      entries.push({ kind: 'ok', result: await generateDiff(sourcePath, targetPath, { previewLines }) });
    } catch (error) {
      entries.push({ kind: 'error', sourcePath, targetPath, message: ErrorUtils.extractErrorMessage(error) });
    }
  }

  return entries;
}

/**
 * Applies the resolved files and reports per-file status.
 */
export async function applyResolved(
  files: ResolvedFileMap,
  applier: Applier,
  owner: OwnerIds
): Promise<{ outcomes: ApplyOutcome[]; summary: BatchSummary }> {
  ui.info(`Applying ${files.size} file(s)...`);
  const outcomes = await applier.applyMultiple(files, owner);
  outcomes.forEach(outcome => ui.applyOutcome(outcome));

  const summary = summarizeOutcomes(outcomes);
  if (summary.status !== 'succeeded') {
    ui.warning(`Warning: ${summary.failed} file(s) failed to apply`);
  }
  return { outcomes, summary };
}
