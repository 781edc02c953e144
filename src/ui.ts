import pc from 'picocolors';
import type { ApplyOutcome, DiffResult, Layout, SubmoduleEntryOutcome } from './types.js';

const verbose = () => process.env.DOTGRAFT_VERBOSE === 'true';

const layoutLabels: Record<Layout, string> = {
  'flat': 'flat (dotfiles at repository root)',
  'package-based': 'package-based (one directory per program)',
  'managed-single-root': 'managed by a dotfile manager',
  'single-config-dir': 'single config directory',
  'bare-worktree': 'bare repository',
  'unknown': 'unknown'
};

/**
 * Centralized UI messaging utilities for consistent CLI experience
 */
export const ui = {
  // Headers
  header: (message: string) => console.log(pc.cyan(message)),

  // Status messages
  success: (message: string) => console.log(pc.green(message)),
  error: (message: string) => console.log(pc.red(message)),
  warning: (message: string) => console.log(pc.yellow(message)),
  info: (message: string) => console.log(pc.gray(message)),
  debug: (message: string) => {
    if (verbose()) console.log(pc.dim(`[debug] ${message}`));
  },

  // Special formatting
  dim: (text: string) => pc.gray(text),

  // Progress indicators
  progress: (current: number, total: number, message: string) => {
    const percentage = total === 0 ? 100 : Math.round((current / total) * 100);
    const progressBar = '█'.repeat(Math.floor(percentage / 5)) + '░'.repeat(20 - Math.floor(percentage / 5));
    console.log(pc.blue(`[${progressBar}] ${percentage}% ${message} (${current}/${total})`));
  },

  // Common message patterns
  fetching: (creator: string) =>
    console.log(pc.gray(`Fetching dotfiles from ${creator}...`)),

  layoutDetected: (layout: Layout) =>
    console.log(pc.gray(`Repository layout: ${layoutLabels[layout]}`)),

  filesResolved: (count: number) =>
    console.log(pc.green(`✅ Resolved ${count} file(s)\n`)),

  submoduleEntry: (entry: SubmoduleEntryOutcome) => {
    if (entry.status === 'resolved') {
      console.log(pc.gray(`   ✓ ${entry.path} (${entry.source})`));
    } else {
      console.log(pc.yellow(`   ${entry.status === 'skipped' ? '↷' : '✗'} ${entry.path}: ${entry.reason}`));
    }
  },

  diffSummary: (result: DiffResult) => {
    const label = result.kind === 'new'
      ? pc.green('new')
      : result.kind === 'identical'
        ? pc.gray('unchanged')
        : pc.yellow(`+${result.additions} -${result.deletions}`);
    console.log(`${pc.bold(result.targetPath)} ${label}`);
  },

  diffBody: (diff: string) => {
    for (const line of diff.split('\n')) {
      if (line.startsWith('+ ')) console.log(pc.green(line));
      else if (line.startsWith('- ')) console.log(pc.red(line));
      else console.log(pc.gray(line));
    }
  },

  applyOutcome: (outcome: ApplyOutcome) => {
    if (outcome.success) {
      const backup = outcome.backupPath ? pc.gray(` (backup: ${outcome.backupPath})`) : '';
      console.log(pc.green(`   ✓ ${outcome.targetPath}`) + backup);
    } else {
      const reason = outcome.error ? outcome.error.message : 'unknown error';
      console.log(pc.red(`   ✗ ${outcome.targetPath}: ${reason}`) + pc.gray(` [repair: ${outcome.repair}]`));
    }
  },

  // Error messages with suggestions
  pathNotFound: (requested: string, repoPath: string) => {
    ui.warning(`⚠️  Couldn't find ${requested} in ${repoPath}`);
    ui.info('💡 Pick the matching file or directory by hand.');
  },

  userCancelled: () => {
    ui.warning('⚠️  Operation cancelled by user');
  },

  // Final messages
  applyComplete: (count: number) => {
    ui.success(`🎉 Applied ${count} file(s)`);
    ui.info('Previous versions were backed up and can be restored with the restore action.\n');
  }
} as const;
