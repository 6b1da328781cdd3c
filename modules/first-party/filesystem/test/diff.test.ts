/**
 * Bulwark Filesystem Commands — Line Diff Tests
 *
 *   DIFF-U1: splitLines ignores one trailing newline
 *   DIFF-U2: a single changed line renders one hunk with context
 *   DIFF-U3: distant changes render separate hunks, nearby ones merge
 *   DIFF-U4: creation and deletion use /dev/null and a zero-length range
 *   DIFF-U5: identical content, newline-only changes and oversized input
 *
 * Pure functions; no I/O.
 */

import { describe, it, expect } from 'vitest';
import { MAX_DIFF_LINES, diffLines, renderUnifiedDiff, splitLines } from '../src/diff.js';

function numbered(count: number, prefix = 'l'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}

describe('splitLines', () => {
  it('DIFF-U1: trailing newline handling', () => {
    expect(splitLines('')).toEqual([]);
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
    expect(splitLines('a\n\n')).toEqual(['a', '']);
  });
});

describe('diffLines', () => {
  it('orders a replacement as delete, then insert', () => {
    expect(diffLines(['a', 'b', 'c'], ['a', 'B', 'c'])).toEqual([
      { op: 'equal', text: 'a' },
      { op: 'delete', text: 'b' },
      { op: 'insert', text: 'B' },
      { op: 'equal', text: 'c' },
    ]);
  });

  it('finds insertions inside unchanged text', () => {
    expect(diffLines(['a', 'c'], ['a', 'b', 'c'])).toEqual([
      { op: 'equal', text: 'a' },
      { op: 'insert', text: 'b' },
      { op: 'equal', text: 'c' },
    ]);
  });
});

describe('renderUnifiedDiff', () => {
  it('DIFF-U2: one changed line', () => {
    expect(renderUnifiedDiff('notes.md', 'a\nb\nc\n', 'a\nB\nc\n')).toBe(
      ['--- notes.md', '+++ notes.md', '@@ -1,3 +1,3 @@', ' a', '-b', '+B', ' c'].join('\n'),
    );
  });

  it('DIFF-U3: distant changes get their own hunks', () => {
    const before = numbered(20);
    const after = [...before];
    after[1] = 'X';
    after[17] = 'Y';

    expect(renderUnifiedDiff('f.txt', before.join('\n'), after.join('\n'))).toBe(
      [
        '--- f.txt',
        '+++ f.txt',
        '@@ -1,5 +1,5 @@',
        ' l1',
        '-l2',
        '+X',
        ' l3',
        ' l4',
        ' l5',
        '@@ -15,6 +15,6 @@',
        ' l15',
        ' l16',
        ' l17',
        '-l18',
        '+Y',
        ' l19',
        ' l20',
      ].join('\n'),
    );
  });

  it('DIFF-U3: changes separated by six unchanged lines share a hunk', () => {
    const before = numbered(10);
    const after = [...before];
    after[1] = 'X';
    after[8] = 'Y';

    const hunks = renderUnifiedDiff('f.txt', before.join('\n'), after.join('\n'))
      .split('\n')
      .filter((line) => line.startsWith('@@'));

    expect(hunks).toEqual(['@@ -1,10 +1,10 @@']);
  });

  it('DIFF-U4: creation and deletion', () => {
    expect(renderUnifiedDiff('new.txt', null, 'hello\n')).toBe(
      ['--- /dev/null', '+++ new.txt', '@@ -0,0 +1,1 @@', '+hello'].join('\n'),
    );
    expect(renderUnifiedDiff('old.txt', 'x\n', null)).toBe(
      ['--- old.txt', '+++ /dev/null', '@@ -1,1 +0,0 @@', '-x'].join('\n'),
    );
    expect(renderUnifiedDiff('empty.txt', null, '')).toBe(['--- /dev/null', '+++ empty.txt', '(empty file)'].join('\n'));
  });

  it('DIFF-U5: identical, newline-only and oversized input', () => {
    expect(renderUnifiedDiff('same.txt', 'a\n', 'a\n')).toBe('(no changes to same.txt)');
    expect(renderUnifiedDiff('nl.txt', 'a', 'a\n')).toBe(['--- nl.txt', '+++ nl.txt', '(line endings changed)'].join('\n'));

    const count = MAX_DIFF_LINES + 1;
    expect(renderUnifiedDiff('big.txt', numbered(count, 'a').join('\n'), numbered(count, 'b').join('\n'))).toBe(
      ['--- big.txt', '+++ big.txt', `(diff omitted: ${count} lines before, ${count} lines after)`].join('\n'),
    );
  });
});
