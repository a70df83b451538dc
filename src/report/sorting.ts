import { Declaration } from '../registry/types';

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Ascending by line span. Stable: equal spans keep their input order.
 */
export function sortByLineCount(declarations: readonly Declaration[]): Declaration[] {
  return [...declarations].sort((a, b) => a.lineCount - b.lineCount);
}

/**
 * By file path, then by line
 */
export function sortByLocation(declarations: readonly Declaration[]): Declaration[] {
  return [...declarations].sort(
    (a, b) =>
      compareStrings(a.position.filename, b.position.filename) ||
      a.position.line - b.position.line
  );
}
