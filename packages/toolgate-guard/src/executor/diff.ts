import diff_match_patch from 'diff-match-patch';

export type DiffLine = {
  kind: 'context' | 'added' | 'removed';
  text: string;
};

/**
 * Line diff of two texts. Lines are compared without their terminators, so
 * a missing final newline is not a change.
 */
export function computeDiffLines(oldText: string, newText: string): DiffLine[] {
  const dmp = new diff_match_patch();
  const { chars1, chars2, lineArray } = dmp.diff_linesToChars_(terminateLines(oldText), terminateLines(newText));

  const diffs = dmp.diff_main(chars1, chars2, false);
  dmp.diff_charsToLines_(diffs, lineArray);

  const out: DiffLine[] = [];

  for (const [op, chunk] of diffs) {
    for (const text of splitLines(chunk)) {
      if (op === diff_match_patch.DIFF_EQUAL) {
        out.push({ kind: 'context', text });
      } else if (op === diff_match_patch.DIFF_INSERT) {
        out.push({ kind: 'added', text });
      } else {
        out.push({ kind: 'removed', text });
      }
    }
  }

  return out;
}

/**
 * Unified diff with `context` lines around each hunk. Empty when the texts
 * have the same lines.
 */
export function unifiedDiff(
  oldText: string,
  newText: string,
  fromFile: string,
  toFile: string,
  context = 3,
): string {
  const lines = computeDiffLines(oldText, newText);
  const hunks = groupHunks(lines, context);
  if (hunks.length === 0) return '';

  const out = [`--- ${fromFile}`, `+++ ${toFile}`];

  for (const [from, to] of hunks) {
    const before = lines.slice(0, from);
    const body = lines.slice(from, to);
    const oldStart = before.filter(l => l.kind !== 'added').length;
    const newStart = before.filter(l => l.kind !== 'removed').length;
    const oldLength = body.filter(l => l.kind !== 'added').length;
    const newLength = body.filter(l => l.kind !== 'removed').length;

    out.push(`@@ -${formatRange(oldStart, oldLength)} +${formatRange(newStart, newLength)} @@`);
    for (const line of body) {
      const prefix = line.kind === 'added' ? '+' : line.kind === 'removed' ? '-' : ' ';
      out.push(prefix + line.text);
    }
  }

  return out.join('\n');
}

/**
 * [from, to) index ranges of hunks. Changes separated by more than
 * `2 * context` unchanged lines land in separate hunks.
 */
function groupHunks(lines: DiffLine[], context: number): Array<[number, number]> {
  const groups: Array<[number, number]> = [];
  let first = -1;
  let last = -1;

  lines.forEach((line, index) => {
    if (line.kind === 'context') return;
    if (first >= 0 && index - last - 1 > 2 * context) {
      groups.push([first, last]);
      first = -1;
    }
    if (first < 0) first = index;
    last = index;
  });
  if (first >= 0) groups.push([first, last]);

  return groups.map(([a, b]) => [Math.max(0, a - context), Math.min(lines.length, b + context + 1)]);
}

function formatRange(start: number, length: number): string {
  if (length === 1) return `${start + 1}`;
  return `${length === 0 ? start : start + 1},${length}`;
}

function terminateLines(text: string): string {
  return splitLines(text)
    .map(line => `${line}\n`)
    .join('');
}

function splitLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split('\n');
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
