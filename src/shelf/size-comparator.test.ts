import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { compareSizes, findSizeMatches, measureDifference, sortBySizeKey } from './size-comparator.ts';
import { UnsortedInputError, binarySearch } from './sorted-search.ts';

describe('binarySearch', () => {
  it('finds present items and returns -1 otherwise', () => {
    expect(binarySearch(['a', 'c', 'e'], 'e')).toBe(2);
    expect(binarySearch(['a', 'c', 'e'], 'd')).toBe(-1);
    expect(binarySearch([], 'a')).toBe(-1);
  });
});

describe('findSizeMatches', () => {
  it('matches base names ignoring case and format', () => {
    expect(findSizeMatches(['Dune.epub', 'Emma.epub'], ['dune.pdf', 'zeta.epub'])).toEqual([
      { name1: 'Dune.epub', name2: 'dune.pdf' },
    ]);
  });

  it('rejects an unsorted second listing', () => {
    expect(() => findSizeMatches(['Dune.epub'], ['zeta.epub', 'dune.pdf'])).toThrow(UnsortedInputError);
  });

  it('accepts a listing ordered by sortBySizeKey', () => {
    const sorted = sortBySizeKey(['zeta.epub', 'dune.pdf']);
    expect(sorted).toEqual(['dune.pdf', 'zeta.epub']);
    expect(findSizeMatches(['Zeta.mobi'], sorted)).toEqual([{ name1: 'Zeta.mobi', name2: 'zeta.epub' }]);
  });
});

describe('measureDifference', () => {
  it('reports a difference of at least the threshold share', () => {
    expect(measureDifference('Dune.epub', 1000, 400, 0.5)).toEqual({
      size1: 1000,
      size2: 400,
      percent: 60,
      baseName: 'Dune',
    });
    expect(measureDifference('Dune.epub', 1000, 400, 0.7)).toBeNull();
  });

  it('never reports at threshold 1 or when the first file is not larger', () => {
    expect(measureDifference('Dune.epub', 1000, 0, 1)).toBeNull();
    expect(measureDifference('Dune.epub', 400, 1000, 0)).toBeNull();
  });
});

describe('compareSizes', () => {
  let root: string;
  let dir1: string;
  let dir2: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'sizes-'));
    dir1 = path.join(root, 'one');
    dir2 = path.join(root, 'two');
    await fs.mkdir(dir1);
    await fs.mkdir(dir2);
    await fs.writeFile(path.join(dir1, 'Dune.epub'), Buffer.alloc(1000));
    await fs.writeFile(path.join(dir1, 'Emma.epub'), Buffer.alloc(300));
    await fs.writeFile(path.join(dir2, 'Dune.epub'), Buffer.alloc(400));
    await fs.writeFile(path.join(dir2, 'Emma.epub'), Buffer.alloc(100));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists larger books, largest first', async () => {
    const result = await compareSizes(dir1, ['Emma.epub', 'Dune.epub'], dir2, ['Dune.epub', 'Emma.epub'], 0.5);
    expect(result).toEqual([
      { size1: 1000, size2: 400, percent: 60, baseName: 'Dune' },
      { size1: 300, size2: 100, percent: 66.7, baseName: 'Emma' },
    ]);
  });

  it('rejects thresholds outside 0..1', async () => {
    await expect(compareSizes(dir1, [], dir2, [], 1.5)).rejects.toThrow(
      'Size threshold must be between 0 and 1, got 1.5',
    );
  });
});
