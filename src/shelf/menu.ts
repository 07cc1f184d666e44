import * as actions from './actions.ts';
import type { ActionContext } from './actions.ts';
import type { Result } from './types.ts';

interface MenuItem {
  label: string;
  help: string;
  run: (ctx: ActionContext) => Promise<void>;
}

export const MENU: readonly MenuItem[] = [
  {
    label: 'enter new path',
    help: 'Changes the directory with book filenames. Undo history is cleared.',
    run: actions.openDirectory,
  },
  {
    label: 'refresh list of books from path',
    help: 'Reloads the list of books from the current directory, dropping any selection.',
    run: actions.refreshBooks,
  },
  {
    label: 'select individual books for processing',
    help:
      'Sorts the books, then keeps only the ones you pick. Picks are numbers from the sorted list\n' +
      'or inclusive ranges, separated by commas, e.g. 1,5,10-20,50,55-65.',
    run: actions.chooseBooks,
  },
  {
    label: 'remove multiple spacing',
    help: 'Replaces runs of spaces with one space and removes spaces before the extension. Undoable.',
    run: actions.removeMultipleSpacing,
  },
  {
    label: 'fix comma spacing',
    help: 'Turns "a ,b" and "a,b" into "a, b". Commas between digits (10,000) are left alone. Undoable.',
    run: actions.fixCommaSpacing,
  },
  {
    label: 'fix apostrophes',
    help: "Replaces every letter_letter with letter'letter. Undoable.",
    run: actions.fixApostrophes,
  },
  {
    label: 'find hyphen without spacing',
    help: 'Lists names with a hyphen not surrounded by spaces. Nothing is renamed: "Saint-Exupéry" is legitimate.',
    run: actions.reportHyphens,
  },
  {
    label: 'find possible missing authors at the start',
    help: 'Lists names that do not look like "Surname, Name - Title". Nothing is renamed.',
    run: actions.reportMissingAuthors,
  },
  {
    label: 'find possible missing capitalization',
    help: 'Lists lowercase words other than articles and particles (of, von, de, ...). Nothing is renamed.',
    run: actions.reportCapitalization,
  },
  {
    label: 'find books containing possible subtitles',
    help: 'Lists names containing "_", which marks the start of a subtitle.',
    run: actions.reportSubtitles,
  },
  {
    label: 'preserve title(s) only (crop author(s), subtitle(s))',
    help: '"<author(s)> - <title[_ subtitle][, The]>.ext" -> "<[The ]title>.ext". Undoable.',
    run: actions.keepTitlesOnly,
  },
  {
    label: 'preserve author(s) and title(s) (crop subtitle(s))',
    help: '"<author(s)> - <title[_ subtitle][, The]>.ext" -> "<author(s)> - <[The ]title>.ext". Undoable.',
    run: actions.cropSubtitles,
  },
  {
    label: 'restore author(s) data to filename(s) w/o author(s) data',
    help:
      'Looks up each title in another directory of "<author(s)> - <title>" names and copies the authors.\n' +
      'Titles must match exactly: "Code" matches "Petzold, Charles - Code", not "Deibert, Ronald - Black Code". Undoable.',
    run: actions.restoreAuthors,
  },
  {
    label: 'remove substring from filename',
    help: 'Removes the first occurrence of a substring from every name containing it. Undoable.',
    run: actions.removeSubstring,
  },
  {
    label: 'restore filenames after modification',
    help: 'Undoes the most recent renaming action. Only one action can be undone.',
    run: actions.restoreFilenames,
  },
  {
    label: 'compare filenames from two directories',
    help:
      'Lists books found in both directories, similar pairs, and books missing from the other directory.\n' +
      'Run again with the directories swapped to see the other side. Slow for large directories.',
    run: actions.compareWithOtherDirectory,
  },
  {
    label: 'compare filenames within single directory',
    help: 'Lists books present in several formats and pairs of similar names. Slow for large directories.',
    run: actions.compareWithinCurrentDirectory,
  },
  {
    label: 'compare file sizes of identical books',
    help:
      'Lists books larger in this directory than in another one by at least a share of their size:\n' +
      '0 lists every larger book, 0.4 those whose copy is at most 60% of the size, 1 lists nothing.',
    run: actions.compareFileSizes,
  },
  {
    label: 'find image files above threshold size (.epub format only)',
    help: 'Reports cover.jp[e]g files and images/ folders above a size threshold.',
    run: actions.checkImageSizes,
  },
  {
    label: 'list all cover.jp[e]g files and images directories sorted by size (.epub format only)',
    help: 'Lists every cover and images/ folder, largest first.',
    run: actions.listImages,
  },
  {
    label: 'check the database on Kobo device for inaccurate collections data',
    help: 'Lists collection entries in KoboReader.sqlite whose book is not in the current list.',
    run: actions.checkCollections,
  },
  {
    label: 'remove inaccurate collections data from the database on Kobo device',
    help: 'Deletes those collection entries, optionally after backing the database up.',
    run: actions.cleanCollections,
  },
  {
    label: 'choose a book at random',
    help: 'Prints one book from the current list.',
    run: actions.randomBook,
  },
];

export type MenuChoice = { kind: 'exit' } | { kind: 'help'; item: number } | { kind: 'run'; item: number };

export function parseMenuChoice(answer: string, itemCount: number = MENU.length): Result<MenuChoice> {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === 'x') {
    return { ok: true, value: { kind: 'exit' } };
  }

  const match = /^(h)?(\d+)$/.exec(trimmed);
  if (!match?.[2]) {
    return { ok: false, error: 'Enter a valid choice.' };
  }

  const item = Number(match[2]);
  if (item >= itemCount) {
    return { ok: false, error: 'Enter a valid number.' };
  }
  return { ok: true, value: match[1] ? { kind: 'help', item } : { kind: 'run', item } };
}

function menuText(): string {
  const lines = MENU.map((item, index) => `${index}: ${item.label}`);
  return `\n${lines.join('\n')}\n\nEnter number, H+number for help, or X for exit: `;
}

/**
 * Run the menu until the user exits. A failing action prints its error and
 * returns to the menu.
 */
export async function runMenu(ctx: ActionContext): Promise<void> {
  for (;;) {
    const choice = parseMenuChoice(await ctx.prompter.ask(menuText()));

    if (!choice.ok) {
      console.log(`\n⚠️  ${choice.error}`);
      continue;
    }

    const { value } = choice;
    if (value.kind === 'exit') {
      return;
    }

    const item = MENU[value.item];
    if (!item) continue;

    if (value.kind === 'help') {
      console.log(`\n${item.help}`);
      continue;
    }

    console.log('');
    const start = performance.now();
    try {
      await item.run(ctx);
    } catch (error) {
      console.error('❌ Error:', error instanceof Error ? error.message : error);
    }
    if (ctx.verbose) {
      console.log(`\n⏱️  Finished in ${((performance.now() - start) / 1000).toFixed(3)} seconds.`);
    }
  }
}
