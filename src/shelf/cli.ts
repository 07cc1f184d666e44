import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs/promises';
import { config as defaults, loadConfig } from '../config.ts';
import { runMenu } from './menu.ts';
import { askDirectory, parseShare, ReadlinePrompter } from './prompts.ts';
import { Session } from './session.ts';

interface RunOptions {
  dir?: string;
  config?: string;
  threshold?: number;
  verbose: boolean;
}

function parseThreshold(value: string): number {
  const share = parseShare(value);
  if (!share.ok) {
    throw new InvalidArgumentError('Threshold must be a number between 0 and 1.');
  }
  return share.value;
}

const program = new Command();

program
  .name('bookshelf-tidy')
  .description('Normalize, compare and organize e-book filenames interactively')
  .version('1.0.0')
  .option('-d, --dir <path>', 'Directory with books (prompted for when omitted)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-t, --threshold <ratio>', 'Similarity threshold for name comparisons', parseThreshold)
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (options: RunOptions) => {
    const prompter = new ReadlinePrompter();
    try {
      const config = await loadConfig(options.config);
      if (options.threshold !== undefined) config.similarityThreshold = options.threshold;

      const session = new Session(config);
      const directory = options.dir ?? (await askDirectory(prompter, 'Enter directory with books: '));
      await session.open(directory);

      console.log(`📚 ${session.books.length} books in ${session.directory}`);
      await runMenu({ session, prompter, config, verbose: options.verbose });
      console.log('👋 Bye!');
    } catch (error) {
      console.error('❌ Error:', error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    } finally {
      prompter.close();
    }
  });

program
  .command('config')
  .description('Generate a sample configuration file')
  .option('-o, --output <path>', 'Output path for config file', 'bookshelf-tidy.json')
  .action(async (options: { output: string }) => {
    const sampleConfig = {
      files: { supportedExtensions: defaults.files.supportedExtensions },
      similarityThreshold: defaults.similarityThreshold,
      images: defaults.images,
      kobo: defaults.kobo,
    };

    try {
      await fs.writeFile(options.output, JSON.stringify(sampleConfig, null, 2));
      console.log(`✅ Sample configuration written to: ${options.output}`);
      console.log('📝 Edit the file, then pass it with --config.');
    } catch (error) {
      console.error('❌ Failed to write config file:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

export { program };
