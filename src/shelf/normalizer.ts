import { config } from '../config.ts';
import { FileOperations, skipConflicts } from './file-operations.ts';
import { stripSubtitleOnly, stripToTitle } from './filename-grammar.ts';
import type { RenameLedger } from './rename-ledger.ts';
import type { BatchReport, ConflictResolver, RenamePlan } from './types.ts';

const MULTIPLE_WHITESPACE = /\s{2,}/g;
const SPACE_BEFORE_COMMA = /\s+,/g;
const COMMA_WITHOUT_SPACE = /,(?=[^\s\d])/g;
const UNDERSCORE_BETWEEN_LETTERS = /(?<=\p{L})_(?=\p{L})/gu;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function planEach(books: readonly string[], rename: (name: string) => string): RenamePlan[] {
  const plans: RenamePlan[] = [];
  for (const from of books) {
    const to = rename(from);
    if (to !== from) {
      plans.push({ from, to });
    }
  }
  return plans;
}

export function removeMultipleSpacing(
  name: string,
  extensions: readonly string[] = config.files.supportedExtensions,
): string {
  let result = name;
  for (const ext of extensions) {
    const beforeExtension = new RegExp(`\\s+(${escapeRegExp(ext)})$`, 'i');
    result = result.replace(beforeExtension, '$1');
  }
  return result.replace(MULTIPLE_WHITESPACE, ' ');
}

export function fixCommaSpacing(name: string): string {
  return name.replace(SPACE_BEFORE_COMMA, ',').replace(COMMA_WITHOUT_SPACE, ', ');
}

export function fixApostrophes(name: string): string {
  return name.replace(UNDERSCORE_BETWEEN_LETTERS, "'");
}

export function planSpacingCleanup(books: readonly string[], extensions?: readonly string[]): RenamePlan[] {
  return planEach(books, name => removeMultipleSpacing(name, extensions));
}

export function planCommaCleanup(books: readonly string[]): RenamePlan[] {
  return planEach(books, fixCommaSpacing);
}

export function planApostropheRepair(books: readonly string[]): RenamePlan[] {
  return planEach(books, fixApostrophes);
}

export function planTitleOnly(books: readonly string[], variantMarkers?: readonly string[]): RenamePlan[] {
  return planEach(books, name => stripToTitle(name, variantMarkers));
}

export function planSubtitleCrop(books: readonly string[], variantMarkers?: readonly string[]): RenamePlan[] {
  return planEach(books, name => stripSubtitleOnly(name, variantMarkers));
}

/** Removes the first occurrence of `substring` only. */
export function planSubstringRemoval(books: readonly string[], substring: string): RenamePlan[] {
  if (!substring) return [];
  return planEach(books, name => name.replace(substring, ''));
}

export interface ApplyOptions {
  fileOps?: FileOperations;
  resolveConflict?: ConflictResolver;
  onRenamed?: (plan: RenamePlan) => void;
}

/**
 * Run a batch of renames inside `directory`. The ledger is cleared first, even
 * when `plans` is empty, and an entry is recorded only after its rename went
 * through. A filesystem error other than a name conflict ends the batch; the
 * ledger still holds every rename completed before it.
 */
export async function applyRenames(
  directory: string,
  plans: readonly RenamePlan[],
  ledger: RenameLedger,
  options: ApplyOptions = {},
): Promise<BatchReport> {
  const fileOps = options.fileOps ?? new FileOperations();
  const resolveConflict = options.resolveConflict ?? skipConflicts;
  const report: BatchReport = { renamed: [], skipped: [] };

  ledger.begin();

  for (const plan of plans) {
    const outcome = await fileOps.renameSafely(directory, plan, resolveConflict);
    const done = { from: outcome.from, to: outcome.to };

    if (outcome.status === 'renamed') {
      ledger.record(outcome.to, outcome.from);
      report.renamed.push(done);
      options.onRenamed?.(done);
    } else {
      report.skipped.push(done);
    }
  }

  return report;
}
