import path from 'path';
import type { ShelfConfig } from '../config.ts';
import { findOversizedImages, listAllImages } from './archive-inspector.ts';
import { planAuthorRestoration } from './author-restorer.ts';
import {
  findHyphenWithoutSpacing,
  findMissingAuthor,
  findMissingCapitalization,
  findSubtitles,
  pickRandom,
} from './inspections.ts';
import { KoboClient, backupDatabase, koboDatabasePath } from './kobo-client.ts';
import {
  applyRenames,
  planApostropheRepair,
  planCommaCleanup,
  planSpacingCleanup,
  planSubstringRemoval,
  planSubtitleCrop,
  planTitleOnly,
} from './normalizer.ts';
import {
  askDirectory,
  askUntil,
  interactiveConflictResolver,
  parseLimit,
  parseShare,
  parseYesNo,
  type Prompter,
} from './prompts.ts';
import { restoreLedger } from './rename-ledger.ts';
import { parseSelection, parseSortKey, selectBooks, sortBooks } from './selection.ts';
import type { Session } from './session.ts';
import { compareDirectories, compareWithinDirectory } from './similarity.ts';
import { compareSizes, sortBySizeKey } from './size-comparator.ts';
import type { RenamePlan, SimilarityPair } from './types.ts';

export interface ActionContext {
  session: Session;
  prompter: Prompter;
  config: ShelfConfig;
  verbose: boolean;
}

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 3)}...` : text;
}

function printList(title: string, items: readonly string[]): void {
  console.log(`\n${title}\n`);
  if (items.length === 0) {
    console.log('N/A');
    return;
  }
  for (const item of items) {
    console.log(item);
  }
}

function formatPair([a, b]: SimilarityPair): string {
  return `'${a}', '${b}'`;
}

async function runBatch(ctx: ActionContext, plans: RenamePlan[], summary: (count: number) => string): Promise<void> {
  const { session } = ctx;

  if (plans.length === 0 && !session.ledger.isEmpty()) {
    console.warn('⚠️  Nothing to rename; the previous undo history is cleared as well.');
  }

  const report = await applyRenames(session.directory, plans, session.ledger, {
    fileOps: session.fileOps,
    resolveConflict: interactiveConflictResolver(ctx.prompter),
    onRenamed: ({ from, to }) => console.log(`✏️  ${from} → ${to}`),
  });
  session.applyRenames(report.renamed);

  if (ctx.verbose) {
    for (const { from } of report.skipped) {
      console.log(`⏭️  Skipped: ${from}`);
    }
  }

  console.log(`\n📈 Process finished. ${summary(report.renamed.length)}`);
}

export async function openDirectory(ctx: ActionContext): Promise<void> {
  const directory = await askDirectory(ctx.prompter, '\nEnter path to directory with books: ');
  await ctx.session.open(directory);
  console.log(`📚 New path: ${ctx.session.directory} (${ctx.session.books.length} books)`);
}

export async function refreshBooks(ctx: ActionContext): Promise<void> {
  await ctx.session.refresh();
  console.log(`🔄 List of books from path ${ctx.session.directory} refreshed (${ctx.session.books.length} books).`);
}

export async function chooseBooks(ctx: ActionContext): Promise<void> {
  const { session, prompter } = ctx;
  const key = await askUntil(
    prompter,
    '\nSort by author (A), title (T), date modified (D) or size descending (S)? A/T/D/S ',
    parseSortKey,
  );
  const sorted = await sortBooks(session.directory, session.books, key, session.fileOps);

  console.log(`\nBooks sorted by ${key}:\n`);
  sorted.books.forEach((book, index) => {
    const number = String(index + 1).padStart(4);
    const detail = sorted.details?.[index];
    console.log(detail === undefined ? `${number} ${book}` : `${number} ${truncate(book, 60).padEnd(60)} ${detail.padStart(19)}`);
  });

  const indices = await askUntil(
    prompter,
    '\nSelect books by individual numbers or ranges (from-to), separated by commas: ',
    answer => parseSelection(answer, sorted.books.length),
  );
  const selected = selectBooks(sorted.books, indices);
  session.select(selected);

  console.log(`\nSelected books (${selected.length}):\n`);
  selected.forEach((book, index) => console.log(`${String(index + 1).padStart(4)} ${book}`));
}

export async function removeMultipleSpacing(ctx: ActionContext): Promise<void> {
  const plans = planSpacingCleanup(ctx.session.books, ctx.config.files.supportedExtensions);
  await runBatch(ctx, plans, n => `Multiple spacing removed from ${n} filenames.`);
}

export async function fixCommaSpacing(ctx: ActionContext): Promise<void> {
  await runBatch(ctx, planCommaCleanup(ctx.session.books), n => `Comma spacing fixed in ${n} filenames.`);
}

export async function fixApostrophes(ctx: ActionContext): Promise<void> {
  await runBatch(ctx, planApostropheRepair(ctx.session.books), n => `Apostrophes fixed in ${n} filenames.`);
}

export async function reportHyphens(ctx: ActionContext): Promise<void> {
  const found = findHyphenWithoutSpacing(ctx.session.books, ctx.config.files.supportedExtensions);
  for (const book of found) {
    console.log(`Hyphen without spacing found in filename: ${book}`);
  }
  console.log(`\n📈 Process finished. Hyphen without spacing found in ${found.length} filenames.`);
}

export async function reportMissingAuthors(ctx: ActionContext): Promise<void> {
  const found = findMissingAuthor(ctx.session.books, ctx.config.files.supportedExtensions);
  for (const book of found) {
    console.log(`Possible missing author at the start found in filename: ${book}`);
  }
  console.log(`\n📈 Process finished. Possible missing authors found in ${found.length} filenames.`);
}

export async function reportCapitalization(ctx: ActionContext): Promise<void> {
  const issues = findMissingCapitalization(ctx.session.books, ctx.config.files.supportedExtensions);
  for (const { name, words } of issues) {
    for (const word of words) {
      console.log(`Possible missing capitalization in word: '${word}' in filename: ${name}`);
    }
  }
  console.log(`\n📈 Process finished. Possible missing capitalization found in ${issues.length} filenames.`);
}

export async function reportSubtitles(ctx: ActionContext): Promise<void> {
  const found = findSubtitles(ctx.session.books, ctx.config.files.supportedExtensions);
  for (const book of found) {
    console.log(`Possible subtitle found in book ${book}`);
  }
  console.log(`\n📈 Process finished. Possible subtitles found in ${found.length} filenames.`);
}

export async function keepTitlesOnly(ctx: ActionContext): Promise<void> {
  const plans = planTitleOnly(ctx.session.books, ctx.config.files.variantMarkers);
  await runBatch(ctx, plans, n => `${n} filenames renamed to titles only.`);
}

export async function cropSubtitles(ctx: ActionContext): Promise<void> {
  const plans = planSubtitleCrop(ctx.session.books, ctx.config.files.variantMarkers);
  await runBatch(ctx, plans, n => `${n} filenames renamed with subtitles removed and authors retained.`);
}

export async function restoreAuthors(ctx: ActionContext): Promise<void> {
  const { session } = ctx;
  const referenceDir = await askDirectory(ctx.prompter, 'Enter path to other directory with books to compare: ');
  const references = await session.fileOps.listBooks(referenceDir);

  const { plans, notFound } = planAuthorRestoration(session.books, references, ctx.config.files.supportedExtensions);
  for (const book of notFound) {
    console.log(`🔍 Author(s) data not found for ${book}`);
  }
  await runBatch(ctx, plans, n => `Author(s) data restored to ${n} filenames.`);
}

export async function removeSubstring(ctx: ActionContext): Promise<void> {
  const substring = await askUntil<string>(ctx.prompter, 'Enter substring to remove from filename(s): ', answer =>
    answer ? { ok: true, value: answer } : { ok: false, error: 'Substring cannot be empty.' },
  );
  const plans = planSubstringRemoval(ctx.session.books, substring);

  if (ctx.verbose) {
    const changed = new Set(plans.map(plan => plan.from));
    for (const book of ctx.session.books.filter(b => !changed.has(b))) {
      console.log(`${book} contains no substring ${substring}`);
    }
  }
  await runBatch(ctx, plans, n => `Substring removed from ${n} filenames.`);
}

export async function restoreFilenames(ctx: ActionContext): Promise<void> {
  const { session } = ctx;
  if (session.ledger.isEmpty()) {
    console.log('No filenames to restore.');
    return;
  }

  const report = await restoreLedger(session.directory, session.ledger, {
    fileOps: session.fileOps,
    resolveConflict: interactiveConflictResolver(ctx.prompter),
  });
  for (const name of report.missing) {
    console.warn(`⚠️  ${name} not found in ${session.directory}`);
  }
  for (const { from, to } of report.renamed) {
    console.log(`↩️  ${from} → ${to}`);
  }
  if (ctx.verbose) {
    for (const { from } of report.skipped) {
      console.log(`⏭️  Skipped: ${from}`);
    }
  }

  session.applyRenames(report.renamed);
  console.log(`\n📈 Process finished. ${report.restored} filenames restored.`);
}

export async function compareWithOtherDirectory(ctx: ActionContext): Promise<void> {
  const { session } = ctx;
  const otherDir = path.resolve(await askDirectory(ctx.prompter, 'Enter path to other directory with books to compare: '));
  const otherBooks = await session.fileOps.listBooks(otherDir);

  const result = compareDirectories(
    session.books,
    otherBooks,
    ctx.config.similarityThreshold,
    ctx.config.files.supportedExtensions,
  );

  printList(`Books found in ${session.directory} and ${otherDir}:`, result.identical);
  printList(`Books in ${session.directory} similar to books in ${otherDir}:`, result.similar.map(formatPair));
  printList(`Books in ${session.directory} not found in ${otherDir}:`, result.missing);
}

export async function compareWithinCurrentDirectory(ctx: ActionContext): Promise<void> {
  const result = compareWithinDirectory(
    ctx.session.books,
    ctx.config.similarityThreshold,
    ctx.config.files.supportedExtensions,
  );

  printList(`Books in ${ctx.session.directory} in more than one format:`, result.identical.map(([name]) => name));
  printList(`Books in ${ctx.session.directory} similar to books:`, result.similar.map(formatPair));
}

export async function compareFileSizes(ctx: ActionContext): Promise<void> {
  const { session, prompter } = ctx;
  const otherDir = await askDirectory(prompter, 'Enter path to other directory with books to compare: ');
  const share = await askUntil(
    prompter,
    'Enter min difference to check between file sizes as a share of file size (0 <= share <= 1): ',
    parseShare,
  );
  const otherBooks = sortBySizeKey(await session.fileOps.listBooks(otherDir));

  const differences = await compareSizes(session.directory, session.books, otherDir, otherBooks, share, session.fileOps);

  console.log('\nFILE SIZE 1  FILE SIZE 2  +%      FILE NAME\n');
  for (const { size1, size2, percent, baseName } of differences) {
    console.log(
      `${size1.toLocaleString('en-US').padStart(11)}  ${size2.toLocaleString('en-US').padStart(11)}  ${`+${percent.toFixed(1)}%`.padStart(6)}  ${baseName}`,
    );
  }
}

export async function checkImageSizes(ctx: ActionContext): Promise<void> {
  const { prompter, config } = ctx;
  const coverThreshold = await askUntil(
    prompter,
    `Enter threshold cover.jpg filesize in bytes, D for default (${config.images.coverThreshold} bytes), or I to ignore checking: `,
    parseLimit(config.images.coverThreshold, true),
  );
  const imagesThreshold = await askUntil(
    prompter,
    `Enter threshold images directory size in bytes, D for default (${config.images.imagesThreshold} bytes), or I to ignore checking: `,
    parseLimit(config.images.imagesThreshold, true),
  );

  if (coverThreshold === null && imagesThreshold === null) {
    console.log('\nNo image checked.');
    return;
  }

  let maxImages = Infinity;
  if (imagesThreshold !== null) {
    maxImages =
      (await askUntil(
        prompter,
        'Enter maximum number of images per book to check or D for default (no limit): ',
        parseLimit(Infinity, false),
      )) ?? Infinity;
  }

  const findings = await findOversizedImages(ctx.session.directory, ctx.session.books, {
    coverThreshold,
    imagesThreshold,
    maxImages,
  });

  console.log('');
  for (const finding of findings) {
    if (finding.kind === 'cover') {
      console.log(
        `🖼️  File cover.jpg in book ${finding.book} larger than ${finding.threshold} bytes -> ${finding.size} bytes (${finding.percent}%).`,
      );
    } else {
      console.log(
        `🖼️  Directory images in book ${finding.book} larger than ${finding.threshold} bytes -> ${finding.size} bytes (${finding.percent}%, ${finding.imageCount} images).`,
      );
    }
  }
}

export async function listImages(ctx: ActionContext): Promise<void> {
  const { covers, images } = await listAllImages(ctx.session.directory, ctx.session.books);

  console.log('');
  for (const { book, size } of covers) {
    console.log(`cover.jp[e]g in ${truncate(book, 54).padEnd(55)} ${String(size).padStart(7)} bytes`);
  }
  console.log('');
  for (const { book, size, count } of images) {
    console.log(`images in ${truncate(book, 57).padEnd(60)} ${String(size).padStart(7)} bytes ${String(count).padStart(6)} images`);
  }
}

async function askKoboDatabase(ctx: ActionContext): Promise<string> {
  const devicePath = await askDirectory(ctx.prompter, 'Enter path to the main directory of Kobo device: ');
  return koboDatabasePath(devicePath, ctx.config.kobo.databasePath);
}

export async function checkCollections(ctx: ActionContext): Promise<void> {
  const client = new KoboClient(await askKoboDatabase(ctx));
  try {
    const stale = client.findStaleEntries(ctx.session.books);
    console.log('');
    for (const entry of stale) {
      console.log(`Entry ${entry.filename} from collection ${entry.shelfName} not found in book filenames on device.`);
    }
    console.log(`\n📈 Process finished. ${stale.length} entries not found in book filenames on device.`);
  } finally {
    client.close();
  }
}

export async function cleanCollections(ctx: ActionContext): Promise<void> {
  const dbPath = await askKoboDatabase(ctx);

  const backup = await askUntil(ctx.prompter, '\nCreate a backup of KoboReader.sqlite database? Y/N ', parseYesNo);
  if (backup) {
    console.log('\n📦 Creating backup of KoboReader.sqlite database...');
    const backupPath = await backupDatabase(dbPath, ctx.config.kobo.backupName);
    console.log(`✅ Backup created: ${backupPath}`);
  }

  const client = new KoboClient(dbPath);
  try {
    const removed = client.removeStaleEntries(ctx.session.books);
    console.log('');
    for (const entry of removed) {
      console.log(`🗑️  Entry ${entry.filename} from collection ${entry.shelfName} removed from database.`);
    }
    console.log(`\n📈 Process finished. ${removed.length} entries removed from collections.`);
  } finally {
    client.close();
  }
}

export async function randomBook(ctx: ActionContext): Promise<void> {
  const book = pickRandom(ctx.session.books);
  console.log(book === undefined ? 'No books in the current list.' : `🎲 ${book}`);
}
