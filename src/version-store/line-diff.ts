/**
 * Line Diff
 *
 * Longest-common-subsequence diff over lines. Within a changed hunk removed
 * lines come before added lines.
 */

import type { DiffRecord } from './types';

export function splitLines(text: string): string[] {
  if (text === '') return [];
  return text.replace(/\r\n/g, '\n').split('\n');
}

/**
 * Diff two texts line by line
 */
export function diffLines(oldText: string, newText: string): DiffRecord[] {
  const a = splitLines(oldText);
  const b = splitLines(newText);

  // Common prefix and suffix never need the table
  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++;
  }

  const records: DiffRecord[] = [];

  for (let i = 0; i < prefix; i++) {
    records.push({ type: 'unchanged', line: a[i], oldLine: i + 1, newLine: i + 1 });
  }

  const midA = a.slice(prefix, a.length - suffix);
  const midB = b.slice(prefix, b.length - suffix);
  records.push(...diffMiddle(midA, midB, prefix, prefix));

  for (let k = suffix; k > 0; k--) {
    const oldIndex = a.length - k;
    const newIndex = b.length - k;
    records.push({ type: 'unchanged', line: a[oldIndex], oldLine: oldIndex + 1, newLine: newIndex + 1 });
  }

  return records;
}

/**
 * Swap added/removed and the line number sides
 */
export function invertDiff(records: DiffRecord[]): DiffRecord[] {
  return records.map(record => {
    const inverted: DiffRecord = {
      type: record.type === 'added' ? 'removed' : record.type === 'removed' ? 'added' : 'unchanged',
      line: record.line,
    };
    if (record.newLine !== undefined) inverted.oldLine = record.newLine;
    if (record.oldLine !== undefined) inverted.newLine = record.oldLine;
    return inverted;
  });
}

function diffMiddle(a: string[], b: string[], offsetA: number, offsetB: number): DiffRecord[] {
  const n = a.length;
  const m = b.length;
  const records: DiffRecord[] = [];

  if (n === 0 || m === 0) {
    a.forEach((line, i) => records.push({ type: 'removed', line, oldLine: offsetA + i + 1 }));
    b.forEach((line, j) => records.push({ type: 'added', line, newLine: offsetB + j + 1 }));
    return records;
  }

  // lcs[i][j] = LCS length of a[i..] and b[j..]
  const lcs: Uint32Array[] = [];
  for (let i = 0; i <= n; i++) {
    lcs.push(new Uint32Array(m + 1));
  }
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i][j] = a[i] === b[j]
        ? lcs[i + 1][j + 1] + 1
        : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (a[i] === b[j]) {
      records.push({ type: 'unchanged', line: a[i], oldLine: offsetA + i + 1, newLine: offsetB + j + 1 });
      i++;
      j++;
    } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
      records.push({ type: 'removed', line: a[i], oldLine: offsetA + i + 1 });
      i++;
    } else {
      records.push({ type: 'added', line: b[j], newLine: offsetB + j + 1 });
      j++;
    }
  }
  for (; i < n; i++) {
    records.push({ type: 'removed', line: a[i], oldLine: offsetA + i + 1 });
  }
  for (; j < m; j++) {
    records.push({ type: 'added', line: b[j], newLine: offsetB + j + 1 });
  }

  return records;
}

/**
 * Unified-style text rendering (`+`, `-`, ` ` prefixes)
 */
export function formatDiff(records: DiffRecord[]): string {
  return records
    .map(r => `${r.type === 'added' ? '+' : r.type === 'removed' ? '-' : ' '} ${r.line}`)
    .join('\n');
}
