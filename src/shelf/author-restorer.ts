import { config } from '../config.ts';
import { hasBookExtension, parseFilename } from './filename-grammar.ts';
import type { AuthorRestorationPlan } from './types.ts';

/**
 * Give title-only filenames back their authors, taken from a reference
 * directory of "<Author> - <Title>" names. Titles must match exactly, case
 * included: "Code" matches "Petzold, Charles - Code" but not
 * "Deibert, Ronald - Black Code". The first reference with a matching title
 * wins, and the target keeps its own extension. Every target without a match
 * is listed in `notFound` once.
 */
export function planAuthorRestoration(
  targets: readonly string[],
  references: readonly string[],
  extensions: readonly string[] = config.files.supportedExtensions,
): AuthorRestorationPlan {
  const referenceByTitle = new Map<string, string>();
  for (const reference of references) {
    if (!hasBookExtension(reference, extensions)) continue;
    const { authorPrefix, title } = parseFilename(reference);
    if (authorPrefix !== null && !referenceByTitle.has(title)) {
      referenceByTitle.set(title, `${authorPrefix}${title}`);
    }
  }

  const result: AuthorRestorationPlan = { plans: [], notFound: [] };

  for (const target of targets) {
    if (!hasBookExtension(target, extensions)) continue;
    const { authorPrefix, title, variant, extension } = parseFilename(target);
    const restored = referenceByTitle.get(`${authorPrefix ?? ''}${title}`);

    if (restored === undefined) {
      result.notFound.push(target);
    } else {
      result.plans.push({ from: target, to: `${restored}${variant}${extension}` });
    }
  }

  return result;
}
