import fs from 'fs/promises';

export interface ShelfConfig {
  files: {
    supportedExtensions: string[];
    readonly variantMarkers: readonly string[];
  };
  similarityThreshold: number;
  images: {
    coverThreshold: number;
    imagesThreshold: number;
  };
  kobo: {
    databasePath: string;
    backupName: string;
  };
}

export const config: ShelfConfig = {
  files: {
    supportedExtensions: ['.epub', '.mobi', '.pdf', '.azw'],
    // Kobo's "Title.kepub.epub"; not overridable from the config file
    variantMarkers: ['.kepub'],
  },

  similarityThreshold: 0.9,

  images: {
    coverThreshold: 100_000,
    imagesThreshold: 1_000_000,
  },

  kobo: {
    databasePath: '.kobo/KoboReader.sqlite',
    backupName: 'KoboReader - Copy.sqlite',
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Merge a parsed JSON document over the defaults. Every problem is collected
 * so the user sees them all at once.
 */
export function validateConfig(raw: unknown, base: ShelfConfig = config): ShelfConfig {
  const errors: string[] = [];
  const result: ShelfConfig = {
    files: { ...base.files },
    similarityThreshold: base.similarityThreshold,
    images: { ...base.images },
    kobo: { ...base.kobo },
  };

  if (!isRecord(raw)) {
    throw new Error('Configuration validation failed:\n  • config file must contain a JSON object');
  }

  if (raw.files !== undefined) {
    if (!isRecord(raw.files)) {
      errors.push('files must be an object');
    } else {
      const { supportedExtensions } = raw.files;
      if (supportedExtensions !== undefined) {
        if (isStringArray(supportedExtensions) && supportedExtensions.every(ext => ext.startsWith('.'))) {
          result.files.supportedExtensions = supportedExtensions.map(ext => ext.toLowerCase());
        } else {
          errors.push('files.supportedExtensions must be a list of extensions starting with "."');
        }
      }
    }
  }

  if (raw.similarityThreshold !== undefined) {
    const threshold = raw.similarityThreshold;
    if (isNonNegativeNumber(threshold) && threshold <= 1) {
      result.similarityThreshold = threshold;
    } else {
      errors.push('similarityThreshold must be a number between 0 and 1');
    }
  }

  if (raw.images !== undefined) {
    if (!isRecord(raw.images)) {
      errors.push('images must be an object');
    } else {
      const { coverThreshold, imagesThreshold } = raw.images;
      if (coverThreshold !== undefined) {
        if (isNonNegativeNumber(coverThreshold)) result.images.coverThreshold = coverThreshold;
        else errors.push('images.coverThreshold must be a non-negative number');
      }
      if (imagesThreshold !== undefined) {
        if (isNonNegativeNumber(imagesThreshold)) result.images.imagesThreshold = imagesThreshold;
        else errors.push('images.imagesThreshold must be a non-negative number');
      }
    }
  }

  if (raw.kobo !== undefined) {
    if (!isRecord(raw.kobo)) {
      errors.push('kobo must be an object');
    } else {
      const { databasePath, backupName } = raw.kobo;
      if (databasePath !== undefined) {
        if (typeof databasePath === 'string' && databasePath) result.kobo.databasePath = databasePath;
        else errors.push('kobo.databasePath must be a non-empty string');
      }
      if (backupName !== undefined) {
        if (typeof backupName === 'string' && backupName) result.kobo.backupName = backupName;
        else errors.push('kobo.backupName must be a non-empty string');
      }
    }
  }

  if (errors.length > 0) {
    throw new Error('Configuration validation failed:\n' + errors.map(e => `  • ${e}`).join('\n'));
  }

  return result;
}

export async function loadConfig(configPath?: string): Promise<ShelfConfig> {
  if (!configPath) {
    return validateConfig({});
  }

  let raw: unknown;
  try {
    const content = await fs.readFile(configPath, 'utf-8');
    raw = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return validateConfig(raw);
}
