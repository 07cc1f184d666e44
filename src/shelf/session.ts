import path from 'path';
import type { ShelfConfig } from '../config.ts';
import { FileOperations } from './file-operations.ts';
import { RenameLedger } from './rename-ledger.ts';
import type { RenamePlan } from './types.ts';

/**
 * State of one interactive run: the directory being worked on, the working set
 * of book filenames in it, and the undo ledger. Passed explicitly to every
 * action.
 */
export class Session {
  readonly ledger = new RenameLedger();
  readonly fileOps: FileOperations;
  directory = '';
  books: string[] = [];

  constructor(readonly config: ShelfConfig) {
    this.fileOps = new FileOperations(config.files.supportedExtensions);
  }

  /** Switch directories. Undo history from the previous directory is dropped. */
  async open(directory: string): Promise<void> {
    const resolved = path.resolve(directory);
    const books = await this.fileOps.listBooks(resolved);
    this.directory = resolved;
    this.books = books;
    this.ledger.begin();
  }

  async refresh(): Promise<void> {
    this.books = await this.fileOps.listBooks(this.directory);
  }

  select(books: string[]): void {
    this.books = books;
  }

  /** Keep the working set in step with renames done on disk. */
  applyRenames(renames: readonly RenamePlan[]): void {
    const renamed = new Map(renames.map(({ from, to }) => [from, to]));
    this.books = this.books.map(book => renamed.get(book) ?? book);
  }
}
