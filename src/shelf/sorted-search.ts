export class UnsortedInputError extends Error {
  constructor(
    message: string,
    public readonly index: number,
  ) {
    super(message);
    this.name = 'UnsortedInputError';
  }
}

/** Throws unless `keys` are in non-decreasing order. */
export function assertSorted(keys: readonly string[], label: string): void {
  for (let i = 1; i < keys.length; i++) {
    const previous = keys[i - 1];
    const current = keys[i];
    if (previous !== undefined && current !== undefined && previous > current) {
      throw new UnsortedInputError(
        `${label} must be sorted: "${previous}" comes before "${current}" at position ${i + 1}`,
        i,
      );
    }
  }
}

/**
 * Index of some element equal to `item`, or -1. `sorted` must be in
 * non-decreasing order; nothing here checks that.
 */
export function binarySearch(sorted: readonly string[], item: string): number {
  let low = 0;
  let high = sorted.length;

  while (high > low) {
    const mid = (low + high) >> 1;
    const value = sorted[mid];
    if (value === undefined) break;
    if (value === item) return mid;
    if (value < item) low = mid + 1;
    else high = mid;
  }

  return -1;
}
