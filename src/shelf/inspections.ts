import { config } from '../config.ts';
import { baseName, hasBookExtension } from './filename-grammar.ts';
import { STOP_WORDS } from './word-tables.ts';
import type { CapitalizationIssue } from './types.ts';

// Read-only checks. None of these rename anything.

const HYPHEN_WITHOUT_SPACING = /\S-\S|\S-\s|\s-\S/;
const AUTHOR_FIRST = /.+,.+-/;
const IGNORED_PUNCTUATION = /[,\-!'_()]/g;

function books(names: readonly string[], extensions: readonly string[]): string[] {
  return names.filter(name => hasBookExtension(name, extensions));
}

/**
 * "Clarke, Arthur-2001" is a typo but "Saint-Exupéry, Antoine de" is not, so
 * these are only reported.
 */
export function findHyphenWithoutSpacing(
  names: readonly string[],
  extensions: readonly string[] = config.files.supportedExtensions,
): string[] {
  return books(names, extensions).filter(name => HYPHEN_WITHOUT_SPACING.test(baseName(name)));
}

/** Names that don't look like "Surname, Name - Title". */
export function findMissingAuthor(
  names: readonly string[],
  extensions: readonly string[] = config.files.supportedExtensions,
): string[] {
  return books(names, extensions).filter(name => !AUTHOR_FIRST.test(baseName(name)));
}

export function findLowercaseWords(name: string, stopWords: ReadonlySet<string> = STOP_WORDS): string[] {
  return baseName(name)
    .replace(IGNORED_PUNCTUATION, '')
    .split(/\s+/)
    .filter(word => {
      const first = word.charAt(0);
      return word !== '' && !stopWords.has(word) && first !== first.toUpperCase();
    });
}

/** Also flags non-English titles whose capitalization rules differ. */
export function findMissingCapitalization(
  names: readonly string[],
  extensions: readonly string[] = config.files.supportedExtensions,
): CapitalizationIssue[] {
  const issues: CapitalizationIssue[] = [];
  for (const name of books(names, extensions)) {
    const words = findLowercaseWords(name);
    if (words.length > 0) {
      issues.push({ name, words });
    }
  }
  return issues;
}

/** An underscore usually marks where a subtitle starts. */
export function findSubtitles(
  names: readonly string[],
  extensions: readonly string[] = config.files.supportedExtensions,
): string[] {
  return books(names, extensions).filter(name => name.includes('_'));
}

export function pickRandom<T>(items: readonly T[], random: () => number = Math.random): T | undefined {
  return items[Math.floor(random() * items.length)];
}
