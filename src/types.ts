/**
 * Organisational convention of a dotfile repository.
 *
 * Layouts are not mutually exclusive: a repository can look both
 * package-based and flat. Classification picks the first rule that matches,
 * see {@link classifyLayout} in `layout.ts`.
 */
export type Layout =
  | 'flat'
  | 'package-based'
  | 'managed-single-root'
  | 'single-config-dir'
  | 'bare-worktree'
  | 'unknown';

/**
 * A checked-out repository together with its classified layout.
 * Recomputed on every run.
 */
export type RepositorySnapshot = {
  /** Absolute path of the checkout */
  root: string;
  layout: Layout;
};

/**
 * Dotfile entry as published by the registry.
 *
 * @example
 * ```typescript
 * const dotfile: DotfileSpec = {
 *   id: 'nvim',
 *   name: 'Neovim',
 *   description: 'Lua config with lazy.nvim',
 *   paths: ['.config/nvim'],
 *   dependencies: ['nvim', 'ripgrep']
 * };
 * ```
 */
export type DotfileSpec = {
  id: string;
  name: string;
  description: string;
  /** Logical paths, e.g. `.config/nvim` or `~/.tmux.conf` */
  paths: string[];
  dependencies: string[];
};

/** Creator entry as published by the registry. */
export type CreatorSpec = {
  id: string;
  name: string;
  /** Clone URL of the creator's dotfile repository */
  repo: string;
};

/** Owner of a backup or an apply run. */
export type OwnerIds = {
  creatorId: string;
  dotfileId: string;
};

/** One `[submodule "..."]` section of a `.gitmodules` file. */
export type SubmoduleConfig = {
  name: string;
  /** Path relative to the repository that declares it */
  path: string;
  url: string;
};

export type SubmoduleEntryOutcome = SubmoduleConfig & (
  | {
      status: 'resolved';
      /** `cloned` when fetched now, `present` when it was already populated */
      source: 'cloned' | 'present';
      /** URL that produced the checkout, when cloned */
      clonedFrom?: string;
      nested?: MaterializeOutcome;
    }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string }
);

export type MaterializeOutcome = {
  /** False only when the level declared submodules and none resolved */
  ok: boolean;
  entries: SubmoduleEntryOutcome[];
  /** True when recursion stopped because the depth budget ran out */
  depthExhausted: boolean;
};

/**
 * Absolute source path → logical target path (e.g. `.config/nvim/init.lua`).
 * Keys are unique, so no two entries ever target the same file.
 */
export type ResolvedFileMap = Map<string, string>;

export type ResolveResult =
  | {
      kind: 'resolved';
      files: ResolvedFileMap;
      /** Present when submodules had to be materialized to find files */
      submodules?: MaterializeOutcome;
    }
  | {
      kind: 'not-found';
      /** Logical path that could not be located */
      requestedPath: string;
      repoPath: string;
    };

export type DiffKind = 'new' | 'identical' | 'modified';

export type DiffResult = {
  sourcePath: string;
  /** Absolute path on the target machine */
  targetPath: string;
  kind: DiffKind;
  /** Rendered, bounded description of the change */
  diff: string;
  additions: number;
  deletions: number;
};

export type BackupRecord = {
  originalPath: string;
  backupPath: string;
  timestamp: Date;
  creatorId: string;
  dotfileId: string;
};

/** Terminal states of the per-file apply state machine. */
export type ApplyState = 'succeeded' | 'failed';

export type RepairResult = 'not-needed' | 'restored' | 'removed-partial' | 'failed';

export type ApplyOutcome = {
  sourcePath: string;
  targetPath: string;
  backupPath?: string;
  success: boolean;
  state: ApplyState;
  error?: Error;
  repair: RepairResult;
};
