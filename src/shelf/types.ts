export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

export interface FileEntry {
  name: string;
  size: number;
  mtime: Date;
}

export interface ParsedFilename {
  authorPrefix: string | null; // "Smith, John - ", separator included
  title: string;
  variant: string;
  extension: string;
}

export type ArticleLocale = 'en' | 'es' | 'fr' | 'de';

export interface Article {
  token: string;
  locale: ArticleLocale;
}

export interface RenamePlan {
  from: string;
  to: string;
}

export type ConflictResolution = { action: 'rename'; name: string } | { action: 'skip' };

export type ConflictResolver = (plan: RenamePlan) => Promise<ConflictResolution>;

export interface BatchReport {
  renamed: RenamePlan[];
  skipped: RenamePlan[];
}

export interface RestoreReport {
  restored: number;
  renamed: RenamePlan[]; // new name -> name it was restored to
  skipped: RenamePlan[];
  missing: string[];
}

export type SimilarityPair = readonly [string, string];

export interface DirectoryComparison {
  identical: string[];
  similar: SimilarityPair[];
  missing: string[];
}

export interface WithinDirectoryComparison {
  identical: SimilarityPair[];
  similar: SimilarityPair[];
}

export interface SizeMatch {
  name1: string;
  name2: string;
}

export interface SizeDifference {
  size1: number;
  size2: number;
  percent: number;
  baseName: string;
}

export interface AuthorRestorationPlan {
  plans: RenamePlan[];
  notFound: string[];
}

export type SortKey = 'author' | 'title' | 'date' | 'size';

export interface SortedBooks {
  books: string[];
  details: string[] | null;
}

export interface CapitalizationIssue {
  name: string;
  words: string[];
}

export interface ArchiveEntry {
  name: string;
  size: number;
}

export interface ImageSummary {
  coverSize: number;
  imagesSize: number;
  imageCount: number;
}

export interface ImageCheckOptions {
  coverThreshold: number | null; // null disables the check
  imagesThreshold: number | null;
  maxImages: number;
}

export interface ImageFinding {
  book: string;
  kind: 'cover' | 'images';
  size: number;
  threshold: number;
  percent: number;
  imageCount: number;
}

export interface ShelfEntry {
  shelfName: string;
  contentId: string;
  filename: string;
}
