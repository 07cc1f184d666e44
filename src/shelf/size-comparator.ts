import { config } from '../config.ts';
import { FileOperations } from './file-operations.ts';
import { baseName, hasBookExtension } from './filename-grammar.ts';
import { assertSorted, binarySearch } from './sorted-search.ts';
import type { SizeDifference, SizeMatch } from './types.ts';

export function sizeKey(filename: string): string {
  return baseName(filename).toLowerCase();
}

/** Order a listing the way {@link findSizeMatches} needs its second argument. */
export function sortBySizeKey(books: readonly string[]): string[] {
  return [...books].sort((a, b) => {
    const ka = sizeKey(a);
    const kb = sizeKey(b);
    if (ka !== kb) return ka < kb ? -1 : 1;
    return a < b ? -1 : a > b ? 1 : 0;
  });
}

/**
 * Pair each book of directory 1 with a book of directory 2 whose base name is
 * equal ignoring case. `books2` must already be ordered by {@link sizeKey};
 * an unsorted listing throws `UnsortedInputError` instead of silently missing
 * matches.
 */
export function findSizeMatches(
  books1: readonly string[],
  books2: readonly string[],
  extensions: readonly string[] = config.files.supportedExtensions,
): SizeMatch[] {
  const candidates = books2.filter(book => hasBookExtension(book, extensions));
  const keys = candidates.map(sizeKey);
  assertSorted(keys, 'Second directory listing');

  const matches: SizeMatch[] = [];
  for (const name1 of books1) {
    if (!hasBookExtension(name1, extensions)) continue;
    const name2 = candidates[binarySearch(keys, sizeKey(name1))];
    if (name2 !== undefined) {
      matches.push({ name1, name2 });
    }
  }
  return matches;
}

/**
 * Report when file 1 is larger than file 2 by at least `threshold` of its own
 * size. A threshold of 1 reports nothing.
 */
export function measureDifference(
  name1: string,
  size1: number,
  size2: number,
  threshold: number,
): SizeDifference | null {
  if (threshold >= 1 || size1 <= size2 || size1 - size2 < size1 * threshold) {
    return null;
  }

  return {
    size1,
    size2,
    percent: Math.round(((size1 - size2) / size1) * 1000) / 10,
    baseName: baseName(name1),
  };
}

export function compareDifferences(a: SizeDifference, b: SizeDifference): number {
  if (a.size1 !== b.size1) return b.size1 - a.size1;
  if (a.size2 !== b.size2) return b.size2 - a.size2;
  return a.baseName < b.baseName ? 1 : a.baseName > b.baseName ? -1 : 0;
}

/**
 * Books of directory 1 that are larger than the same book in directory 2,
 * largest first.
 */
export async function compareSizes(
  directory1: string,
  books1: readonly string[],
  directory2: string,
  books2: readonly string[],
  threshold: number,
  fileOps: FileOperations = new FileOperations(),
): Promise<SizeDifference[]> {
  if (!(threshold >= 0 && threshold <= 1)) {
    throw new Error(`Size threshold must be between 0 and 1, got ${threshold}`);
  }

  const differences: SizeDifference[] = [];

  for (const { name1, name2 } of findSizeMatches(books1, books2, fileOps.getSupportedExtensions())) {
    const [file1, file2] = await Promise.all([fileOps.stat(directory1, name1), fileOps.stat(directory2, name2)]);
    const difference = measureDifference(name1, file1.size, file2.size, threshold);
    if (difference) {
      differences.push(difference);
    }
  }

  return differences.sort(compareDifferences);
}
