import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import JSZip from 'jszip';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ArchiveInspector,
  checkImageSummary,
  findOversizedImages,
  isImagesEntry,
  listAllImages,
} from './archive-inspector.ts';

async function writeEpub(file: string, entries: Record<string, number>): Promise<void> {
  const zip = new JSZip();
  zip.file('mimetype', 'application/epub+zip');
  for (const [name, size] of Object.entries(entries)) {
    zip.file(name, Buffer.alloc(size));
  }
  await fs.writeFile(file, await zip.generateAsync({ type: 'nodebuffer' }));
}

describe('archive inspection', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'archives-'));
    await writeEpub(path.join(dir, 'Big.epub'), {
      'cover.jpg': 150,
      'images/a.png': 300,
      'images/b.png': 200,
      'OEBPS/chapter.html': 40,
    });
    await writeEpub(path.join(dir, 'Small.epub'), { 'Cover.JPEG': 50 });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('only treats the top-level images folder as images', () => {
    expect(isImagesEntry('images/a.png')).toBe(true);
    expect(isImagesEntry('OEBPS/images/a.png')).toBe(false);
  });

  it('summarizes cover and images sizes', async () => {
    const summary = await new ArchiveInspector().summarize(path.join(dir, 'Big.epub'));
    expect(summary).toEqual({ coverSize: 150, imagesSize: 500, imageCount: 2 });
  });

  it('reports covers and image folders above their thresholds', async () => {
    const findings = await findOversizedImages(dir, ['Big.epub', 'Small.epub', 'Other.mobi'], {
      coverThreshold: 100,
      imagesThreshold: 400,
      maxImages: 10,
    });
    expect(findings).toEqual([
      { book: 'Big.epub', kind: 'cover', size: 150, threshold: 100, percent: 150, imageCount: 1 },
      { book: 'Big.epub', kind: 'images', size: 500, threshold: 400, percent: 125, imageCount: 2 },
    ]);
  });

  it('skips the image folder check for books with many images', () => {
    const findings = checkImageSummary(
      'Big.epub',
      { coverSize: 150, imagesSize: 500, imageCount: 2 },
      { coverThreshold: null, imagesThreshold: 400, maxImages: 1 },
    );
    expect(findings).toEqual([]);
  });

  it('lists every cover and image folder, largest first', async () => {
    const listing = await listAllImages(dir, ['Small.epub', 'Big.epub']);
    expect(listing).toEqual({
      covers: [
        { book: 'Big.epub', size: 150 },
        { book: 'Small.epub', size: 50 },
      ],
      images: [{ book: 'Big.epub', size: 500, count: 2 }],
    });
  });

  it('wraps errors from unreadable archives', async () => {
    await fs.writeFile(path.join(dir, 'Broken.epub'), 'not an archive');
    await expect(new ArchiveInspector().summarize(path.join(dir, 'Broken.epub'))).rejects.toThrow(
      /^Failed to open archive /,
    );
  });
});
