import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { config } from '../config.ts';
import type { ActionContext } from './actions.ts';
import { MENU, parseMenuChoice, runMenu } from './menu.ts';
import type { Prompter } from './prompts.ts';
import { Session } from './session.ts';

class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No answer scripted for: ${question}`);
    }
    return answer;
  }

  close(): void {}
}

describe('parseMenuChoice', () => {
  it('parses exit, help and actions', () => {
    expect(parseMenuChoice('X')).toEqual({ ok: true, value: { kind: 'exit' } });
    expect(parseMenuChoice('h3')).toEqual({ ok: true, value: { kind: 'help', item: 3 } });
    expect(parseMenuChoice(' 22 ')).toEqual({ ok: true, value: { kind: 'run', item: 22 } });
  });

  it('rejects unknown choices', () => {
    expect(parseMenuChoice('23')).toEqual({ ok: false, error: 'Enter a valid number.' });
    expect(parseMenuChoice('help')).toEqual({ ok: false, error: 'Enter a valid choice.' });
  });

  it('has an entry for every menu number', () => {
    expect(MENU).toHaveLength(23);
  });
});

describe('runMenu', () => {
  let dir: string;
  let session: Session;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'menu-'));
    await fs.writeFile(path.join(dir, 'Emma  .epub'), 'book');
    session = new Session(config);
    await session.open(dir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  function context(prompter: Prompter): ActionContext {
    return { session, prompter, config, verbose: false };
  }

  it('renames and restores through menu choices', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    await runMenu(context(new ScriptedPrompter(['3', 'x'])));
    expect(await fs.readdir(dir)).toEqual(['Emma.epub']);
    expect(session.books).toEqual(['Emma.epub']);

    await runMenu(context(new ScriptedPrompter(['14', 'x'])));
    expect(await fs.readdir(dir)).toEqual(['Emma  .epub']);
    expect(session.books).toEqual(['Emma  .epub']);
  });

  it('prints help and warnings without running anything', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await runMenu(context(new ScriptedPrompter(['H22', '99', 'x'])));
    expect(log).toHaveBeenCalledWith('\nPrints one book from the current list.');
    expect(log).toHaveBeenCalledWith('\n⚠️  Enter a valid number.');
    expect(await fs.readdir(dir)).toEqual(['Emma  .epub']);
  });

  it('reports a failing action and returns to the menu', async () => {
    await fs.rm(dir, { recursive: true, force: true });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const prompter = new ScriptedPrompter(['1', 'x']);

    await runMenu(context(prompter));

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[0]).toBe('❌ Error:');
    expect(prompter.questions).toHaveLength(2);
  });
});
