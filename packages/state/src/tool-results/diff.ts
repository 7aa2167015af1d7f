import type { DiffLine } from '@tether/shared-types';

/**
 * Build display diff lines for a string replacement: every old line as a
 * removal, then every new line as an addition, each numbered from 1.
 */
export function diffFromEdit(oldString: string, newString: string): DiffLine[] {
  const lines: DiffLine[] = [];
  oldString.split('\n').forEach((text, i) => {
    lines.push({ kind: 'removal', text, lineNumber: i + 1 });
  });
  newString.split('\n').forEach((text, i) => {
    lines.push({ kind: 'addition', text, lineNumber: i + 1 });
  });
  return lines;
}

export function countDiffLines(lines: DiffLine[]): { added: number; removed: number } {
  let added = 0;
  let removed = 0;
  for (const line of lines) {
    if (line.kind === 'addition') added++;
    else if (line.kind === 'removal') removed++;
  }
  return { added, removed };
}
