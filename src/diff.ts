import { readFile } from 'fs/promises';
import { diffLines, type Change } from 'diff';
import { ErrorUtils } from './utils/security.js';
import type { DiffResult } from './types.js';

export type DiffOptions = {
  /** Lines of a new file shown before truncating */
  previewLines?: number;
};

export const DEFAULT_PREVIEW_LINES = 20;

/** Unchanged runs longer than this collapse to a head, `...` and a tail. */
const CONTEXT_COLLAPSE_THRESHOLD = 6;
const CONTEXT_EDGE = 2;

type Hunk =
  | { type: 'equal'; lines: string[] }
  | { type: 'change'; removed: string[]; added: string[] };

function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Groups the edit script into equal runs and change blocks. Consecutive
 * insertions and deletions are merged into one block with every deletion
 * before every insertion, which reads better than interleaved runs.
 */
function toHunks(changes: Change[]): Hunk[] {
  const hunks: Hunk[] = [];

  for (const change of changes) {
    const lines = splitLines(change.value);
    if (!change.added && !change.removed) {
      hunks.push({ type: 'equal', lines });
      continue;
    }

    let last = hunks[hunks.length - 1];
    if (!last || last.type !== 'change') {
      last = { type: 'change', removed: [], added: [] };
      hunks.push(last);
    }
    if (change.added) last.added.push(...lines);
    else last.removed.push(...lines);
  }

  return hunks;
}

function renderHunks(hunks: Hunk[]): string {
  const out: string[] = [];

  for (const hunk of hunks) {
    if (hunk.type === 'change') {
      out.push(...hunk.removed.map(line => `- ${line}`));
      out.push(...hunk.added.map(line => `+ ${line}`));
    } else if (hunk.lines.length > CONTEXT_COLLAPSE_THRESHOLD) {
      out.push(...hunk.lines.slice(0, CONTEXT_EDGE).map(line => `  ${line}`));
      out.push('  ...');
      out.push(...hunk.lines.slice(-CONTEXT_EDGE).map(line => `  ${line}`));
    } else {
      out.push(...hunk.lines.map(line => `  ${line}`));
    }
  }

  return out.join('\n');
}

function renderNewFile(lines: string[], previewLines: number): string {
  const shown = lines.slice(0, previewLines).map(line => `+ ${line}`);
  if (lines.length > previewLines) {
    shown.push(`... +${lines.length - previewLines} more lines`);
  }
  return shown.join('\n');
}

/**
 * Renders the line difference between `oldText` and `newText`.
 *
 * @returns The rendered text and the line counts of the edit script
 */
export function renderDiff(oldText: string, newText: string): { diff: string; additions: number; deletions: number } {
  const hunks = toHunks(diffLines(oldText, newText));

  let additions = 0;
  let deletions = 0;
  for (const hunk of hunks) {
    if (hunk.type === 'change') {
      additions += hunk.added.length;
      deletions += hunk.removed.length;
    }
  }

  return { diff: renderHunks(hunks), additions, deletions };
}

/**
 * Compares a creator's file (`sourcePath`) with what is currently installed
 * at `targetPath`.
 *
 * A missing target is a new file, not an error. Any other read failure is
 * thrown.
 */
export async function generateDiff(
  sourcePath: string,
  targetPath: string,
  options: DiffOptions = {}
): Promise<DiffResult> {
  const previewLines = options.previewLines ?? DEFAULT_PREVIEW_LINES;
  const source = await readFile(sourcePath);

  let target: Buffer;
  try {
    target = await readFile(targetPath);
  } catch (error) {
    if (!ErrorUtils.hasCode(error, 'ENOENT')) {
      throw error;
    }
    const lines = splitLines(source.toString('utf8'));
    return {
      sourcePath,
      targetPath,
      kind: 'new',
      diff: renderNewFile(lines, previewLines),
      additions: lines.length,
      deletions: 0
    };
  }

  if (source.equals(target)) {
    return { sourcePath, targetPath, kind: 'identical', diff: '', additions: 0, deletions: 0 };
  }

  return {
    sourcePath,
    targetPath,
    kind: 'modified',
    ...renderDiff(target.toString('utf8'), source.toString('utf8'))
  };
}

export function getDiffStats(result: DiffResult): { additions: number; deletions: number } {
  return { additions: result.additions, deletions: result.deletions };
}
