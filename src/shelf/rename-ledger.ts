import { FileOperations, skipConflicts, type RenameOutcome } from './file-operations.ts';
import type { ConflictResolver, RestoreReport } from './types.ts';

/**
 * New-name to old-name mapping for the most recent destructive batch only.
 * Every batch calls {@link RenameLedger.begin}, which throws away the previous
 * generation; there is no deeper history.
 */
export class RenameLedger {
  private entriesByNewName = new Map<string, string>();

  begin(): void {
    this.entriesByNewName.clear();
  }

  record(newName: string, oldName: string): void {
    this.entriesByNewName.set(newName, oldName);
  }

  get size(): number {
    return this.entriesByNewName.size;
  }

  isEmpty(): boolean {
    return this.entriesByNewName.size === 0;
  }

  /** Pairs of [newName, oldName] in the order the renames happened. */
  entries(): Array<[string, string]> {
    return [...this.entriesByNewName.entries()];
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface RestoreOptions {
  fileOps?: FileOperations;
  resolveConflict?: ConflictResolver;
}

/**
 * Rename every recorded file back to its old name, newest rename first, so
 * chains such as A -> B, C -> A unwind in order.
 * An old name taken since goes to the conflict resolver like any other rename.
 * Missing files are reported and skipped. The ledger itself is left untouched,
 * so a second run finds every new name missing.
 */
export async function restoreLedger(
  directory: string,
  ledger: RenameLedger,
  options: RestoreOptions = {},
): Promise<RestoreReport> {
  const fileOps = options.fileOps ?? new FileOperations();
  const resolveConflict = options.resolveConflict ?? skipConflicts;
  const report: RestoreReport = { restored: 0, renamed: [], skipped: [], missing: [] };

  for (const [newName, oldName] of ledger.entries().reverse()) {
    if (!(await fileOps.exists(directory, newName))) {
      report.missing.push(newName);
      continue;
    }

    let outcome: RenameOutcome;
    try {
      outcome = await fileOps.renameSafely(directory, { from: newName, to: oldName }, resolveConflict);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      report.missing.push(newName);
      continue;
    }

    if (outcome.status === 'renamed') {
      report.restored++;
      report.renamed.push({ from: outcome.from, to: outcome.to });
    } else {
      report.skipped.push({ from: outcome.from, to: outcome.to });
    }
  }

  return report;
}
