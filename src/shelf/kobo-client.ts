import fs from 'fs/promises';
import path from 'path';
import Database from 'better-sqlite3';
import { config } from '../config.ts';
import { binarySearch } from './sorted-search.ts';
import type { ShelfEntry } from './types.ts';

interface ShelfContentRow {
  ShelfName: string;
  ContentId: string;
}

export function koboDatabasePath(devicePath: string, databasePath: string = config.kobo.databasePath): string {
  return path.join(devicePath, databasePath);
}

/** "file:///mnt/onboard/Books/Title.kepub.epub" -> "Title.kepub.epub" */
export function filenameFromContentId(contentId: string): string {
  return contentId.replace(/.+\//, '');
}

/**
 * Copy the database next to itself before it is modified.
 * Returns the path of the copy.
 */
export async function backupDatabase(dbPath: string, backupName: string = config.kobo.backupName): Promise<string> {
  const backupPath = path.join(path.dirname(dbPath), backupName);
  await fs.copyFile(dbPath, backupPath);
  return backupPath;
}

/**
 * Collections ("shelves") on a Kobo e-reader live in the ShelfContent table of
 * KoboReader.sqlite, one row per book per collection.
 */
export class KoboClient {
  private db: Database.Database;

  constructor(dbPath: string) {
    try {
      this.db = new Database(dbPath, { fileMustExist: true });
    } catch (error) {
      throw new Error(`Failed to open Kobo database at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  getShelfEntries(): ShelfEntry[] {
    const rows = this.db.prepare<[], ShelfContentRow>('SELECT ShelfName, ContentId FROM ShelfContent').all();

    return rows.map(row => ({
      shelfName: row.ShelfName,
      contentId: row.ContentId,
      filename: filenameFromContentId(row.ContentId),
    }));
  }

  /** Collection entries whose book is not among `books` (the files on the device). */
  findStaleEntries(books: readonly string[]): ShelfEntry[] {
    const sorted = [...books].sort();
    return this.getShelfEntries().filter(entry => binarySearch(sorted, entry.filename) === -1);
  }

  /**
   * Delete stale collection entries and return what was removed. The scan and
   * the deletes share one transaction.
   */
  removeStaleEntries(books: readonly string[]): ShelfEntry[] {
    const remove = this.db.prepare<[string]>('DELETE FROM ShelfContent WHERE ContentId = ?');

    const run = this.db.transaction(() => {
      const stale = this.findStaleEntries(books);
      for (const entry of stale) {
        remove.run(entry.contentId);
      }
      return stale;
    });

    return run();
  }

  close(): void {
    this.db.close();
  }
}
