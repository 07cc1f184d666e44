import { config } from '../config.ts';
import { ARTICLES, isArticle } from './word-tables.ts';
import type { Article, ParsedFilename } from './types.ts';

// Books are named "<Authors> - <Title>[_ <Subtitle>][, <Article>].<ext>"
const AUTHOR_PATTERN = /^.+?\s-\s/;
const SUBTITLE_PATTERN = /_+\s.*$/;
const TRAILING_UNDERSCORE_PATTERN = /_+$/;
const EXTENSION_PATTERN = /\.[A-Za-z0-9]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const TRAILING_ARTICLE_PATTERNS: ReadonlyArray<{ article: Article; pattern: RegExp }> = ARTICLES.map(
  article => ({ article, pattern: new RegExp(`,\\s${escapeRegExp(article.token)}$`) }),
);

export function parseFilename(
  filename: string,
  variantMarkers: readonly string[] = config.files.variantMarkers,
): ParsedFilename {
  const extension = filename.match(EXTENSION_PATTERN)?.[0] ?? '';
  let rest = filename.slice(0, filename.length - extension.length);

  let variant = '';
  if (extension) {
    const marker = variantMarkers.find(m => rest.toLowerCase().endsWith(m.toLowerCase()));
    if (marker) {
      variant = rest.slice(rest.length - marker.length);
      rest = rest.slice(0, rest.length - marker.length);
    }
  }

  const authorPrefix = rest.match(AUTHOR_PATTERN)?.[0] ?? null;
  const title = authorPrefix ? rest.slice(authorPrefix.length) : rest;

  return { authorPrefix, title, variant, extension };
}

/**
 * Find a ", <Article>" suffix. Patterns are anchored at the end of the title
 * and tried longest token first.
 */
export function extractTrailingArticle(title: string): { article: string | null; title: string } {
  for (const { article, pattern } of TRAILING_ARTICLE_PATTERNS) {
    const match = pattern.exec(title);
    if (match) {
      return { article: article.token, title: title.slice(0, match.index) };
    }
  }
  return { article: null, title };
}

/** Drop the subtitle and pull a trailing article to the front of the title. */
export function cropTitle(title: string): { article: string | null; title: string } {
  let { article, title: cropped } = extractTrailingArticle(title);
  cropped = cropped.replace(SUBTITLE_PATTERN, '');

  // "Title, The_ Subtitle" only exposes its article once the subtitle is gone
  if (article === null) {
    ({ article, title: cropped } = extractTrailingArticle(cropped));
  }

  return { article, title: cropped.replace(TRAILING_UNDERSCORE_PATTERN, '') };
}

function withArticle(article: string | null, title: string): string {
  return article ? `${article} ${title}` : title;
}

/**
 * "Smith, John - Great War_ A History, The.epub" -> "The Great War.epub"
 */
export function stripToTitle(filename: string, variantMarkers?: readonly string[]): string {
  const parsed = parseFilename(filename, variantMarkers);
  const { article, title } = cropTitle(parsed.title);
  return `${withArticle(article, title)}${parsed.variant}${parsed.extension}`;
}

/**
 * "Smith, John - Great War_ A History, The.epub" -> "Smith, John - The Great War.epub"
 *
 * The author prefix is kept byte for byte. Names without one are cropped as by
 * {@link stripToTitle}.
 */
export function stripSubtitleOnly(filename: string, variantMarkers?: readonly string[]): string {
  const parsed = parseFilename(filename, variantMarkers);
  if (parsed.authorPrefix === null) {
    return stripToTitle(filename, variantMarkers);
  }
  const { article, title } = cropTitle(parsed.title);
  return `${parsed.authorPrefix}${withArticle(article, title)}${parsed.variant}${parsed.extension}`;
}

/** Filename without its extension or container variant marker. */
export function baseName(filename: string, variantMarkers?: readonly string[]): string {
  const { authorPrefix, title } = parseFilename(filename, variantMarkers);
  return `${authorPrefix ?? ''}${title}`;
}

export function hasBookExtension(
  filename: string,
  extensions: readonly string[] = config.files.supportedExtensions,
): boolean {
  const lower = filename.toLowerCase();
  return extensions.some(ext => lower.endsWith(ext.toLowerCase()));
}

/**
 * Sort key for title ordering: authors dropped, lowercased, and a leading
 * article moved behind the title ("The Great War" -> "great war, the").
 */
export function titleSortKey(filename: string, variantMarkers?: readonly string[]): string {
  const { title } = parseFilename(filename, variantMarkers);
  const [first, ...rest] = title.split(/\s+/);

  if (first !== undefined && rest.length > 0 && isArticle(first)) {
    return `${rest.join(' ')}, ${first}`.toLowerCase();
  }
  return title.toLowerCase();
}
