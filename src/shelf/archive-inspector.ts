import fs from 'fs/promises';
import path from 'path';
import JSZip from 'jszip';
import type { ArchiveEntry, ImageCheckOptions, ImageFinding, ImageSummary } from './types.ts';

const COVER_NAMES = new Set(['cover.jpg', 'cover.jpeg']);
const IMAGES_PREFIX = 'images/';

export function isCoverEntry(name: string): boolean {
  return COVER_NAMES.has(name.toLowerCase());
}

export function isImagesEntry(name: string): boolean {
  return name.toLowerCase().startsWith(IMAGES_PREFIX);
}

export function isEpub(filename: string): boolean {
  return filename.toLowerCase().endsWith('.epub');
}

export class ArchiveInspector {
  /**
   * Uncompressed size of every file entry accepted by `include`. Entries are
   * inflated to be measured, so pass a filter for large archives.
   */
  async listEntries(archivePath: string, include: (name: string) => boolean = () => true): Promise<ArchiveEntry[]> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(await fs.readFile(archivePath));
    } catch (error) {
      throw new Error(`Failed to open archive ${archivePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const entries: ArchiveEntry[] = [];
    for (const file of Object.values(zip.files)) {
      if (file.dir || !include(file.name)) continue;
      const content = await file.async('uint8array');
      entries.push({ name: file.name, size: content.byteLength });
    }
    return entries;
  }

  async summarize(archivePath: string): Promise<ImageSummary> {
    const entries = await this.listEntries(archivePath, name => isCoverEntry(name) || isImagesEntry(name));
    return summarizeImages(entries);
  }
}

export function summarizeImages(entries: readonly ArchiveEntry[]): ImageSummary {
  const summary: ImageSummary = { coverSize: 0, imagesSize: 0, imageCount: 0 };

  for (const entry of entries) {
    if (isCoverEntry(entry.name)) {
      summary.coverSize = entry.size;
    }
    if (isImagesEntry(entry.name)) {
      summary.imagesSize += entry.size;
      summary.imageCount++;
    }
  }

  return summary;
}

function percentOf(size: number, threshold: number): number {
  return threshold > 0 ? Math.round((size / threshold) * 1000) / 10 : Infinity;
}

/**
 * Covers and image folders above their thresholds. Books with more than
 * `maxImages` images are left out of the image-folder check.
 */
export function checkImageSummary(book: string, summary: ImageSummary, options: ImageCheckOptions): ImageFinding[] {
  const findings: ImageFinding[] = [];
  const { coverThreshold, imagesThreshold, maxImages } = options;

  if (coverThreshold !== null && summary.coverSize > coverThreshold) {
    findings.push({
      book,
      kind: 'cover',
      size: summary.coverSize,
      threshold: coverThreshold,
      percent: percentOf(summary.coverSize, coverThreshold),
      imageCount: 1,
    });
  }

  if (imagesThreshold !== null && summary.imageCount <= maxImages && summary.imagesSize > imagesThreshold) {
    findings.push({
      book,
      kind: 'images',
      size: summary.imagesSize,
      threshold: imagesThreshold,
      percent: percentOf(summary.imagesSize, imagesThreshold),
      imageCount: summary.imageCount,
    });
  }

  return findings;
}

export async function findOversizedImages(
  directory: string,
  books: readonly string[],
  options: ImageCheckOptions,
  inspector: ArchiveInspector = new ArchiveInspector(),
): Promise<ImageFinding[]> {
  if (options.coverThreshold === null && options.imagesThreshold === null) {
    return [];
  }

  const findings: ImageFinding[] = [];
  for (const book of books.filter(isEpub)) {
    const summary = await inspector.summarize(path.join(directory, book));
    findings.push(...checkImageSummary(book, summary, options));
  }
  return findings;
}

export interface ImageListing {
  covers: Array<{ book: string; size: number }>;
  images: Array<{ book: string; size: number; count: number }>;
}

/** Every cover and non-empty image folder, largest first. */
export async function listAllImages(
  directory: string,
  books: readonly string[],
  inspector: ArchiveInspector = new ArchiveInspector(),
): Promise<ImageListing> {
  const listing: ImageListing = { covers: [], images: [] };

  for (const book of books.filter(isEpub)) {
    const entries = await inspector.listEntries(path.join(directory, book), name => isCoverEntry(name) || isImagesEntry(name));
    for (const entry of entries.filter(e => isCoverEntry(e.name))) {
      listing.covers.push({ book, size: entry.size });
    }
    const summary = summarizeImages(entries);
    if (summary.imagesSize > 0) {
      listing.images.push({ book, size: summary.imagesSize, count: summary.imageCount });
    }
  }

  const bySizeThenBook = (a: { book: string; size: number }, b: { book: string; size: number }) =>
    b.size - a.size || (a.book < b.book ? -1 : a.book > b.book ? 1 : 0);
  listing.covers.sort(bySizeThenBook);
  listing.images.sort(bySizeThenBook);

  return listing;
}
