/**
 * Bulwark Filesystem Commands — Line Diff
 *
 * Minimal line diff (longest common subsequence) rendered as a unified
 * diff with three lines of context. Used for the previews of every
 * mutating file command.
 *
 * The common prefix and suffix are stripped before the LCS table is built,
 * so a small edit to a large file stays cheap. When the differing middle
 * still exceeds MAX_DIFF_LINES on either side, the diff is summarized
 * instead of computed.
 */

export type DiffOp = 'equal' | 'insert' | 'delete';

export interface DiffLine {
  readonly op: DiffOp;
  readonly text: string;
}

export const MAX_DIFF_LINES = 2000;
export const CONTEXT_LINES = 3;

/** Splits on '\n'; a trailing newline does not produce an empty last line. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Edit script turning `before` into `after`. Returns null when the
 * differing region is too large to diff.
 */
export function diffLines(before: ReadonlyArray<string>, after: ReadonlyArray<string>): DiffLine[] | null {
  let prefix = 0;
  while (prefix < before.length && prefix < after.length && before[prefix] === after[prefix]) prefix++;
  let suffix = 0;
  while (
    suffix < before.length - prefix &&
    suffix < after.length - prefix &&
    before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix++;
  }

  const left = before.slice(prefix, before.length - suffix);
  const right = after.slice(prefix, after.length - suffix);
  if (left.length > MAX_DIFF_LINES || right.length > MAX_DIFF_LINES) return null;

  const n = left.length;
  const m = right.length;
  const width = m + 1;
  const table = new Uint32Array((n + 1) * width);
  const at = (i: number, j: number): number => table[i * width + j] ?? 0;

  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      table[i * width + j] = left[i] === right[j] ? 1 + at(i + 1, j + 1) : Math.max(at(i + 1, j), at(i, j + 1));
    }
  }

  const out: DiffLine[] = before.slice(0, prefix).map((text) => ({ op: 'equal', text }));
  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    const l = left[i] ?? '';
    const r = right[j] ?? '';
    if (l === r) {
      out.push({ op: 'equal', text: l });
      i++;
      j++;
    } else if (at(i + 1, j) >= at(i, j + 1)) {
      out.push({ op: 'delete', text: l });
      i++;
    } else {
      out.push({ op: 'insert', text: r });
      j++;
    }
  }
  for (; i < n; i++) out.push({ op: 'delete', text: left[i] ?? '' });
  for (; j < m; j++) out.push({ op: 'insert', text: right[j] ?? '' });
  for (const text of before.slice(before.length - suffix)) out.push({ op: 'equal', text });
  return out;
}

// ---------------------------------------------------------------------------
// Unified rendering
// ---------------------------------------------------------------------------

interface Positioned extends DiffLine {
  /** 0-based line index in `before` at which this line sits. */
  readonly oldIndex: number;
  readonly newIndex: number;
}

function position(lines: ReadonlyArray<DiffLine>): Positioned[] {
  let oldIndex = 0;
  let newIndex = 0;
  return lines.map((line) => {
    const positioned = { ...line, oldIndex, newIndex };
    if (line.op !== 'insert') oldIndex++;
    if (line.op !== 'delete') newIndex++;
    return positioned;
  });
}

function range(start: number, count: number): string {
  return `${count === 0 ? start : start + 1},${count}`;
}

const PREFIX: Readonly<Record<DiffOp, string>> = { equal: ' ', insert: '+', delete: '-' };

function renderHunks(lines: ReadonlyArray<DiffLine>): string[] {
  const positioned = position(lines);
  const changes = positioned.flatMap((line, index) => (line.op === 'equal' ? [] : [index]));
  const out: string[] = [];

  let cursor = 0;
  while (cursor < changes.length) {
    const first = changes[cursor] ?? 0;
    let last = first;
    cursor++;
    while (cursor < changes.length && (changes[cursor] ?? 0) - last <= 2 * CONTEXT_LINES + 1) {
      last = changes[cursor] ?? last;
      cursor++;
    }

    const hunk = positioned.slice(
      Math.max(0, first - CONTEXT_LINES),
      Math.min(positioned.length, last + CONTEXT_LINES + 1),
    );
    const head = hunk[0];
    if (head === undefined) continue;
    const oldCount = hunk.filter((line) => line.op !== 'insert').length;
    const newCount = hunk.filter((line) => line.op !== 'delete').length;
    out.push(`@@ -${range(head.oldIndex, oldCount)} +${range(head.newIndex, newCount)} @@`);
    for (const line of hunk) out.push(PREFIX[line.op] + line.text);
  }
  return out;
}

/**
 * Unified diff of one file. `null` content means the file is absent on
 * that side (creation or deletion).
 */
export function renderUnifiedDiff(path: string, before: string | null, after: string | null): string {
  if (before !== null && after !== null && before === after) {
    return `(no changes to ${path})`;
  }

  const oldLines = splitLines(before ?? '');
  const newLines = splitLines(after ?? '');
  const header = [`--- ${before === null ? '/dev/null' : path}`, `+++ ${after === null ? '/dev/null' : path}`];

  const lines = diffLines(oldLines, newLines);
  if (lines === null) {
    return [...header, `(diff omitted: ${oldLines.length} lines before, ${newLines.length} lines after)`].join('\n');
  }
  const hunks = renderHunks(lines);
  if (hunks.length === 0) {
    // Same lines, different bytes: a trailing newline, or an empty file.
    return [...header, before === null || after === null ? '(empty file)' : '(line endings changed)'].join('\n');
  }
  return [...header, ...hunks].join('\n');
}
