import { describe, expect, it } from 'vitest';
import { compareDirectories, compareWithinDirectory, quickRatio, sequenceRatio } from './similarity.ts';

describe('sequenceRatio', () => {
  it('is 1 for equal strings and 0 for disjoint ones', () => {
    expect(sequenceRatio('Dune', 'Dune')).toBe(1);
    expect(sequenceRatio('abc', 'xyz')).toBe(0);
    expect(sequenceRatio('', '')).toBe(1);
  });

  it('counts matching blocks', () => {
    expect(sequenceRatio('abcd', 'bcde')).toBe(0.75);
  });

  it('takes character order into account', () => {
    expect(quickRatio('ab', 'ba')).toBe(1);
    expect(sequenceRatio('ab', 'ba')).toBe(0.5);
  });
});

describe('compareWithinDirectory', () => {
  it('reports the same book in two formats as identical', () => {
    const result = compareWithinDirectory(
      ['Herbert, Frank - Dune.epub', 'Herbert, Frank - Dune.pdf', 'Austen, Jane - Emma.epub', 'notes.txt'],
      0.9,
    );
    expect(result).toEqual({
      identical: [['Herbert, Frank - Dune', 'Herbert, Frank - Dune']],
      similar: [],
    });
  });

  it('reports each similar pair once', () => {
    const result = compareWithinDirectory(
      ['Herbert, Frank - Dune.epub', 'Austen, Jane - Emma.epub', 'Herbert, Frank - Dunes.epub'],
      0.9,
    );
    expect(result).toEqual({
      identical: [],
      similar: [['Herbert, Frank - Dune', 'Herbert, Frank - Dunes']],
    });
  });
});

describe('compareDirectories', () => {
  it('sorts books of the first directory into identical, similar and missing', () => {
    const result = compareDirectories(
      ['Herbert, Frank - Dune.epub', 'Austen, Jane - Emma.epub', 'Orwell, George - 1984.pdf'],
      ['Herbert, Frank - Dune.mobi', 'Austen, Jane - Emma_.epub', 'Hugo, Victor - Les Miserables.epub'],
      0.9,
    );
    expect(result).toEqual({
      identical: ['Herbert, Frank - Dune'],
      similar: [['Austen, Jane - Emma', 'Austen, Jane - Emma_']],
      missing: ['Orwell, George - 1984'],
    });
  });

  it('treats every pair as similar at threshold 0', () => {
    const result = compareDirectories(['Dune.epub'], ['Emma.epub', 'Dune.pdf'], 0);
    expect(result.similar).toEqual([['Dune', 'Emma']]);
    expect(result.identical).toEqual(['Dune']);
  });
});
