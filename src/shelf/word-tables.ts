import fs from 'fs';
import type { Article } from './types.ts';

const ARTICLES_BY_LOCALE: Article[] = [
  { token: 'A', locale: 'en' },
  { token: 'An', locale: 'en' },
  { token: 'The', locale: 'en' },
  { token: 'El', locale: 'es' },
  { token: 'La', locale: 'es' },
  { token: 'Los', locale: 'es' },
  { token: 'Las', locale: 'es' },
  { token: 'Un', locale: 'es' },
  { token: 'Una', locale: 'es' },
  { token: 'Unos', locale: 'es' },
  { token: 'Unas', locale: 'es' },
  // French "La" and "Un" are listed under Spanish
  { token: 'Le', locale: 'fr' },
  { token: "L'", locale: 'fr' },
  { token: 'Les', locale: 'fr' },
  { token: 'Une', locale: 'fr' },
  { token: 'Des', locale: 'fr' },
  { token: 'Der', locale: 'de' },
  { token: 'Die', locale: 'de' },
  { token: 'Das', locale: 'de' },
  { token: 'Ein', locale: 'de' },
  { token: 'Eine', locale: 'de' },
];

/**
 * Leading articles, longest token first so that "Una" is tried before "Un".
 * The sort is stable, so locale order is kept among tokens of equal length.
 */
export const ARTICLES: readonly Article[] = [...ARTICLES_BY_LOCALE].sort(
  (a, b) => b.token.length - a.token.length,
);

const ARTICLE_TOKENS = new Set(ARTICLES.map(article => article.token));

export function isArticle(word: string): boolean {
  return ARTICLE_TOKENS.has(word);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function loadStopWords(): ReadonlySet<string> {
  const file = new URL('./data/stop-words.json', import.meta.url);
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));

  if (!isStringArray(parsed)) {
    throw new Error(`Stop word list ${file.pathname} must be a JSON array of strings`);
  }

  return new Set(parsed);
}

/** Lowercase function words that may legitimately start in lowercase. */
export const STOP_WORDS: ReadonlySet<string> = loadStopWords();
