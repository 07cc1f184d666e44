import fs from 'fs/promises';
import * as readline from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { isPlainFilename } from './file-operations.ts';
import type { ConflictResolver, Result } from './types.ts';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private rl = readline.createInterface({ input: stdin, output: stdout });

  ask(question: string): Promise<string> {
    return this.rl.question(question);
  }

  close(): void {
    this.rl.close();
  }
}

/** Ask until `parse` accepts the answer. Rejected answers print the parse error. */
export async function askUntil<T>(
  prompter: Prompter,
  question: string,
  parse: (answer: string) => Result<T> | Promise<Result<T>>,
): Promise<T> {
  for (;;) {
    const result = await parse(await prompter.ask(question));
    if (result.ok) {
      return result.value;
    }
    console.log(`\n⚠️  ${result.error}\n`);
  }
}

export function parseChoice<T extends string>(options: Record<string, T>) {
  return (answer: string): Result<T> => {
    const value = options[answer.trim().toLowerCase()];
    return value !== undefined
      ? { ok: true, value }
      : { ok: false, error: `Enter one of: ${Object.keys(options).map(k => k.toUpperCase()).join(', ')}.` };
  };
}

export const parseYesNo = (answer: string): Result<boolean> => {
  const choice = parseChoice({ y: 'yes', n: 'no' })(answer);
  return choice.ok ? { ok: true, value: choice.value === 'yes' } : choice;
};

export function parseShare(answer: string): Result<number> {
  const trimmed = answer.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value) || value < 0 || value > 1) {
    return { ok: false, error: 'Enter a valid share between 0 and 1.' };
  }
  return { ok: true, value };
}

export function parseNonNegativeInteger(answer: string): Result<number> {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { ok: false, error: 'Enter a non-negative whole number.' };
  }
  return { ok: true, value: Number(trimmed) };
}

/**
 * "D" keeps `fallback`, "I" (when `allowIgnore`) disables the check and gives
 * null, anything else must be a non-negative whole number.
 */
export function parseLimit(fallback: number, allowIgnore: boolean) {
  return (answer: string): Result<number | null> => {
    const trimmed = answer.trim().toLowerCase();
    if (trimmed === 'd') return { ok: true, value: fallback };
    if (allowIgnore && trimmed === 'i') return { ok: true, value: null };
    return parseNonNegativeInteger(trimmed);
  };
}

export async function parseDirectory(answer: string): Promise<Result<string>> {
  const directory = answer.trim();
  if (!directory) {
    return { ok: false, error: 'Enter a directory path.' };
  }
  try {
    const stats = await fs.stat(directory);
    return stats.isDirectory()
      ? { ok: true, value: directory }
      : { ok: false, error: `${directory} is not a directory.` };
  } catch {
    return { ok: false, error: `Directory "${directory}" does not exist.` };
  }
}

export function askDirectory(prompter: Prompter, question: string): Promise<string> {
  return askUntil(prompter, question, parseDirectory);
}

export function parseFilenameAnswer(answer: string): Result<string> {
  const name = answer.trim();
  if (!name) {
    return { ok: false, error: 'Filename cannot be empty.' };
  }
  if (!isPlainFilename(name)) {
    return { ok: false, error: 'Enter a filename only, without a directory path.' };
  }
  return { ok: true, value: name };
}

/** On a name clash, ask for another name or keep the old one. */
export function interactiveConflictResolver(prompter: Prompter): ConflictResolver {
  return async ({ from, to }) => {
    const choice = await askUntil(
      prompter,
      `\nFile with proposed name ${to} already exists. Press N to enter a new filename or O to keep old filename ${from}: `,
      parseChoice({ n: 'new', o: 'old' }),
    );

    if (choice === 'old') {
      console.log(`\n⏭️  File with name ${from} not renamed.\n`);
      return { action: 'skip' };
    }

    const name = await askUntil(prompter, '\nEnter a new filename: ', parseFilenameAnswer);
    return { action: 'rename', name };
  };
}
