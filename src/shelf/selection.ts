import { FileOperations } from './file-operations.ts';
import { titleSortKey } from './filename-grammar.ts';
import type { FileEntry, Result, SortKey, SortedBooks } from './types.ts';

const SORT_KEYS: Record<string, SortKey> = {
  a: 'author',
  t: 'title',
  d: 'date',
  s: 'size',
};

export function parseSortKey(input: string): Result<SortKey> {
  const key = SORT_KEYS[input.trim().toLowerCase()];
  return key ? { ok: true, value: key } : { ok: false, error: 'Enter a valid choice (A, T, D or S).' };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function byName(a: string, b: string): number {
  return compareText(a.toLowerCase(), b.toLowerCase()) || compareText(a, b);
}

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Case-insensitive filename order. "author" works because names start with
 * the author; "title" ignores authors and a leading article.
 */
export function sortByName(books: readonly string[]): string[] {
  return [...books].sort(byName);
}

export function sortByTitle(books: readonly string[]): string[] {
  return [...books].sort((a, b) => compareText(titleSortKey(a), titleSortKey(b)) || byName(a, b));
}

/** Newest first; ties fall back to name order. */
export function sortByDate(entries: readonly FileEntry[]): FileEntry[] {
  return [...entries].sort((a, b) => b.mtime.getTime() - a.mtime.getTime() || byName(a.name, b.name));
}

/** Largest first; ties fall back to name order. */
export function sortBySize(entries: readonly FileEntry[]): FileEntry[] {
  return [...entries].sort((a, b) => b.size - a.size || byName(a.name, b.name));
}

export async function sortBooks(
  directory: string,
  books: readonly string[],
  key: SortKey,
  fileOps: FileOperations = new FileOperations(),
): Promise<SortedBooks> {
  switch (key) {
    case 'author':
      return { books: sortByName(books), details: null };
    case 'title':
      return { books: sortByTitle(books), details: null };
    case 'date': {
      const entries = sortByDate(await Promise.all(books.map(book => fileOps.stat(directory, book))));
      return { books: entries.map(e => e.name), details: entries.map(e => formatTimestamp(e.mtime)) };
    }
    case 'size': {
      const entries = sortBySize(await Promise.all(books.map(book => fileOps.stat(directory, book))));
      return { books: entries.map(e => e.name), details: entries.map(e => `${e.size} bytes`) };
    }
  }
}

/**
 * Parse "1,5,10-20" against a list of `count` items. Returns zero-based
 * indices without duplicates, in ascending order so the selection keeps the
 * sorted order. Spaces are ignored.
 */
export function parseSelection(expression: string, count: number): Result<number[]> {
  const parts = expression.replace(/\s+/g, '').split(',');
  const indices = new Set<number>();

  for (const part of parts) {
    const match = /^(\d+)(?:-(\d+))?$/.exec(part);
    if (!match?.[1]) {
      return { ok: false, error: `"${part}" is not a number or a range.` };
    }

    const from = Number(match[1]);
    const to = match[2] !== undefined ? Number(match[2]) : from;

    if (from < 1 || to > count) {
      return { ok: false, error: `"${part}" is outside 1-${count}.` };
    }
    if (from > to) {
      return { ok: false, error: `"${part}" is a reversed range.` };
    }

    for (let n = from; n <= to; n++) {
      indices.add(n - 1);
    }
  }

  return { ok: true, value: [...indices].sort((a, b) => a - b) };
}

export function selectBooks(sorted: readonly string[], indices: readonly number[]): string[] {
  return indices.flatMap(index => {
    const book = sorted[index];
    return book === undefined ? [] : [book];
  });
}
