import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  applyRenames,
  fixApostrophes,
  fixCommaSpacing,
  planApostropheRepair,
  planSpacingCleanup,
  planSubstringRemoval,
  planSubtitleCrop,
  planTitleOnly,
  removeMultipleSpacing,
} from './normalizer.ts';
import { RenameLedger } from './rename-ledger.ts';

describe('name fixes', () => {
  it('collapses whitespace and removes it before the extension', () => {
    expect(removeMultipleSpacing('Smith,  John -  Dune .epub')).toBe('Smith, John - Dune.epub');
    expect(removeMultipleSpacing('Book   Name  .epub')).toBe('Book Name.epub');
    expect(removeMultipleSpacing('Name .epub')).toBe('Name.epub');
    expect(removeMultipleSpacing('Dune   .PDF')).toBe('Dune.PDF');
  });

  it('fixes comma spacing but leaves digit groups alone', () => {
    expect(fixCommaSpacing('Smith ,John - Dune.epub')).toBe('Smith, John - Dune.epub');
    expect(fixCommaSpacing('Smith , John.pdf')).toBe('Smith, John.pdf');
    expect(fixCommaSpacing('10,000 Leagues.pdf')).toBe('10,000 Leagues.pdf');
    expect(fixCommaSpacing('Verne, Jules - 20,000 Leagues.epub')).toBe('Verne, Jules - 20,000 Leagues.epub');
  });

  it('turns letter_letter into an apostrophe', () => {
    expect(fixApostrophes('Don_t Look Up.mobi')).toBe("Don't Look Up.mobi");
    expect(fixApostrophes('Adams, Douglas - Don_t Panic.epub')).toBe("Adams, Douglas - Don't Panic.epub");
    expect(fixApostrophes('Herbert, Frank - Dune_ Book One.epub')).toBe('Herbert, Frank - Dune_ Book One.epub');
  });
});

describe('planners', () => {
  it('only plan names that change', () => {
    expect(planSpacingCleanup(['Dune.epub', 'Emma  .epub'])).toEqual([{ from: 'Emma  .epub', to: 'Emma.epub' }]);
    expect(planApostropheRepair(['Dune.epub'])).toEqual([]);
  });

  it('crop titles and subtitles', () => {
    const books = ['Smith, John - Great War_ A History, The.epub'];
    expect(planTitleOnly(books)).toEqual([{ from: books[0], to: 'The Great War.epub' }]);
    expect(planSubtitleCrop(books)).toEqual([{ from: books[0], to: 'Smith, John - The Great War.epub' }]);
  });

  it('remove the first occurrence of a substring', () => {
    expect(planSubstringRemoval(['Dune [v1] [v1].epub', 'Emma.epub'], ' [v1]')).toEqual([
      { from: 'Dune [v1] [v1].epub', to: 'Dune [v1].epub' },
    ]);
    expect(planSubstringRemoval(['Dune.epub'], '')).toEqual([]);
  });
});

describe('applyRenames', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'normalizer-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function touch(...names: string[]): Promise<void> {
    for (const name of names) {
      await fs.writeFile(path.join(dir, name), name);
    }
  }

  it('renames files and records each rename', async () => {
    await touch('Emma  .epub', 'Dune.epub');
    const ledger = new RenameLedger();
    const onRenamed = vi.fn();

    const report = await applyRenames(dir, planSpacingCleanup(['Emma  .epub', 'Dune.epub']), ledger, { onRenamed });

    expect(report).toEqual({ renamed: [{ from: 'Emma  .epub', to: 'Emma.epub' }], skipped: [] });
    expect(ledger.entries()).toEqual([['Emma.epub', 'Emma  .epub']]);
    expect(onRenamed).toHaveBeenCalledTimes(1);
    expect((await fs.readdir(dir)).sort()).toEqual(['Dune.epub', 'Emma.epub']);
  });

  it('never overwrites an existing file', async () => {
    await touch('Dune.epub', 'Dune .epub');
    const ledger = new RenameLedger();

    const report = await applyRenames(dir, planSpacingCleanup(['Dune .epub']), ledger);

    expect(report.skipped).toEqual([{ from: 'Dune .epub', to: 'Dune.epub' }]);
    expect(ledger.isEmpty()).toBe(true);
    expect(await fs.readFile(path.join(dir, 'Dune.epub'), 'utf-8')).toBe('Dune.epub');
  });

  it('uses the name picked by the conflict resolver', async () => {
    await touch('Dune.epub', 'Dune .epub');
    const ledger = new RenameLedger();
    const resolveConflict = vi.fn(async () => ({ action: 'rename' as const, name: 'Dune (2).epub' }));

    const report = await applyRenames(dir, planSpacingCleanup(['Dune .epub']), ledger, { resolveConflict });

    expect(resolveConflict).toHaveBeenCalledWith({ from: 'Dune .epub', to: 'Dune.epub' });
    expect(report.renamed).toEqual([{ from: 'Dune .epub', to: 'Dune (2).epub' }]);
    expect(ledger.entries()).toEqual([['Dune (2).epub', 'Dune .epub']]);
  });

  it('keeps earlier renames in the ledger when a later one fails', async () => {
    await touch('a.epub', 'c.epub');
    const ledger = new RenameLedger();
    const plans = [
      { from: 'a.epub', to: 'a2.epub' },
      { from: 'gone.epub', to: 'gone2.epub' },
      { from: 'c.epub', to: 'c2.epub' },
    ];

    await expect(applyRenames(dir, plans, ledger)).rejects.toMatchObject({ code: 'ENOENT' });

    expect(ledger.entries()).toEqual([['a2.epub', 'a.epub']]);
    expect((await fs.readdir(dir)).sort()).toEqual(['a2.epub', 'c.epub']);
  });

  it('refuses a resolver name that leaves the directory', async () => {
    const shelf = path.join(dir, 'shelf');
    await fs.mkdir(shelf);
    await fs.writeFile(path.join(shelf, 'Dune.epub'), 'one');
    await fs.writeFile(path.join(shelf, 'Dune .epub'), 'two');
    const ledger = new RenameLedger();

    await expect(
      applyRenames(shelf, planSpacingCleanup(['Dune .epub']), ledger, {
        resolveConflict: async () => ({ action: 'rename', name: '../Dune.epub' }),
      }),
    ).rejects.toThrow('Refusing to rename to "../Dune.epub": not a filename within the directory');

    expect((await fs.readdir(shelf)).sort()).toEqual(['Dune .epub', 'Dune.epub']);
    expect(await fs.readdir(dir)).toEqual(['shelf']);
    expect(ledger.isEmpty()).toBe(true);
  });

  it('treats the source name picked by the resolver as a skip', async () => {
    await touch('Dune.epub', 'Dune .epub');
    const ledger = new RenameLedger();

    const report = await applyRenames(dir, planSpacingCleanup(['Dune .epub']), ledger, {
      resolveConflict: async () => ({ action: 'rename', name: 'Dune .epub' }),
    });

    expect(report).toEqual({ renamed: [], skipped: [{ from: 'Dune .epub', to: 'Dune .epub' }] });
    expect(ledger.isEmpty()).toBe(true);
  });

  it('clears the ledger even when there is nothing to rename', async () => {
    const ledger = new RenameLedger();
    ledger.record('Dune.epub', 'Dune .epub');

    await applyRenames(dir, [], ledger);

    expect(ledger.size).toBe(0);
  });
});
