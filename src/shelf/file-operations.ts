import fs from 'fs/promises';
import path from 'path';
import { config } from '../config.ts';
import { hasBookExtension } from './filename-grammar.ts';
import type { ConflictResolver, FileEntry, RenamePlan } from './types.ts';

export type RenameOutcome =
  | { status: 'renamed'; from: string; to: string }
  | { status: 'skipped'; from: string; to: string };

export const skipConflicts: ConflictResolver = async () => ({ action: 'skip' });

/** A name for an entry of the current directory: no path separators, not "." or "..". */
export function isPlainFilename(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && path.basename(name) === name;
}

function assertPlainFilename(name: string): string {
  if (!isPlainFilename(name)) {
    throw new Error(`Refusing to rename to "${name}": not a filename within the directory`);
  }
  return name;
}

export class FileOperations {
  private supportedExtensions: string[];

  constructor(supportedExtensions: readonly string[] = config.files.supportedExtensions) {
    this.supportedExtensions = supportedExtensions.map(ext => ext.toLowerCase());
  }

  /** Book filenames directly inside `directory`, in directory-listing order. */
  async listBooks(directory: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(directory, { withFileTypes: true });
      return entries
        .filter(entry => entry.isFile() && this.isSupportedBookFile(entry.name))
        .map(entry => entry.name);
    } catch (error) {
      throw new Error(`Failed to read directory ${directory}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async stat(directory: string, name: string): Promise<FileEntry> {
    const stats = await fs.stat(path.join(directory, name));
    return { name, size: stats.size, mtime: stats.mtime };
  }

  async exists(directory: string, name: string): Promise<boolean> {
    try {
      await fs.access(path.join(directory, name));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Rename within one directory without overwriting. When the target is taken
   * the resolver picks a different name or skips; it is asked again if the
   * name it picked is taken too. Picking the source name again counts as a
   * skip. Names that would leave `directory` are refused.
   */
  async renameSafely(directory: string, plan: RenamePlan, resolveConflict: ConflictResolver): Promise<RenameOutcome> {
    let target = assertPlainFilename(plan.to);

    while (await this.isTaken(directory, plan.from, target)) {
      const resolution = await resolveConflict({ from: plan.from, to: target });
      if (resolution.action === 'skip') {
        return { status: 'skipped', from: plan.from, to: target };
      }
      if (resolution.name === plan.from) {
        return { status: 'skipped', from: plan.from, to: plan.from };
      }
      target = assertPlainFilename(resolution.name);
    }

    await fs.rename(path.join(directory, plan.from), path.join(directory, target));
    return { status: 'renamed', from: plan.from, to: target };
  }

  private async isTaken(directory: string, from: string, to: string): Promise<boolean> {
    // A case-only rename would find the source itself on case-insensitive filesystems
    if (from.toLowerCase() === to.toLowerCase()) {
      if (from === to) return false;
      const names = await fs.readdir(directory);
      return names.includes(to);
    }
    return this.exists(directory, to);
  }

  isSupportedBookFile(filename: string): boolean {
    return hasBookExtension(filename, this.supportedExtensions);
  }

  getSupportedExtensions(): string[] {
    return [...this.supportedExtensions];
  }
}
