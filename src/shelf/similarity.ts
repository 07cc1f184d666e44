import { config } from '../config.ts';
import { baseName, hasBookExtension } from './filename-grammar.ts';
import type { DirectoryComparison, SimilarityPair, WithinDirectoryComparison } from './types.ts';

/**
 * Upper bound on {@link sequenceRatio}: counts shared characters regardless of
 * their order.
 */
export function quickRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;

  const available = new Map<string, number>();
  for (const ch of b) {
    available.set(ch, (available.get(ch) ?? 0) + 1);
  }

  let matches = 0;
  for (const ch of a) {
    const left = available.get(ch) ?? 0;
    if (left > 0) {
      available.set(ch, left - 1);
      matches++;
    }
  }

  return (2 * matches) / total;
}

/**
 * Longest common block of a[alo:ahi] and b[blo:bhi]. Ties go to the block that
 * starts earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: string,
  b: string,
  positionsInB: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): { i: number; j: number; size: number } {
  let best = { i: alo, j: blo, size: 0 };
  let lengthsEndingAt = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of positionsInB.get(a.charAt(i)) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (lengthsEndingAt.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { i: i - k + 1, j: j - k + 1, size: k };
      }
    }
    lengthsEndingAt = next;
  }

  return best;
}

/**
 * Ratcliff/Obershelp similarity, 2·M / (|a| + |b|), where M is the total size
 * of the matching blocks found by recursively taking the longest common block
 * and repeating on both sides of it. 1 only for equal strings.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;

  const positionsInB = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b.charAt(j);
    const positions = positionsInB.get(ch);
    if (positions) positions.push(j);
    else positionsInB.set(ch, [j]);
  }

  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = findLongestMatch(a, b, positionsInB, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }

  return (2 * matched) / total;
}

/** `sequenceRatio` when it can reach `threshold`, otherwise 0. */
function ratioAtLeast(a: string, b: string, threshold: number): number {
  if (quickRatio(a, b) < threshold) return 0;
  return sequenceRatio(a, b);
}

function bookBaseNames(books: readonly string[], extensions: readonly string[]): string[] {
  return books.filter(book => hasBookExtension(book, extensions)).map(book => baseName(book));
}

/**
 * Similar base names within one directory. Each unordered pair is reported once,
 * in listing order. Equal base names (same book in two formats) are "identical",
 * never "similar". Quadratic in the number of books.
 */
export function compareWithinDirectory(
  books: readonly string[],
  threshold: number = config.similarityThreshold,
  extensions: readonly string[] = config.files.supportedExtensions,
): WithinDirectoryComparison {
  const names = bookBaseNames(books, extensions);
  const result: WithinDirectoryComparison = { identical: [], similar: [] };

  for (let x = 0; x < names.length; x++) {
    for (let y = x + 1; y < names.length; y++) {
      const a = names[x];
      const b = names[y];
      if (a === undefined || b === undefined) continue;

      if (a === b) {
        result.identical.push([a, b]);
      } else if (ratioAtLeast(a, b, threshold) >= threshold) {
        result.similar.push([a, b]);
      }
    }
  }

  return result;
}

/**
 * Check every book of directory 1 against directory 2. The scan for one book
 * stops at its first identical match; similar pairs seen before that are kept.
 * A book with neither kind of match is listed as missing. Quadratic in the
 * combined number of books, and the output keeps directory-1 order.
 */
export function compareDirectories(
  books1: readonly string[],
  books2: readonly string[],
  threshold: number = config.similarityThreshold,
  extensions: readonly string[] = config.files.supportedExtensions,
): DirectoryComparison {
  const names2 = bookBaseNames(books2, extensions);
  const result: DirectoryComparison = { identical: [], similar: [], missing: [] };

  for (const a of bookBaseNames(books1, extensions)) {
    let found = false;

    for (const b of names2) {
      if (a === b) {
        result.identical.push(a);
        found = true;
        break;
      }
      if (ratioAtLeast(a, b, threshold) >= threshold) {
        const pair: SimilarityPair = [a, b];
        result.similar.push(pair);
        found = true;
      }
    }

    if (!found) {
      result.missing.push(a);
    }
  }

  return result;
}
