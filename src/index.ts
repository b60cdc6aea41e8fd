#!/usr/bin/env node
import { Command, Option } from 'commander';
import { runFind } from './commands/find';
import { runCount } from './commands/count';
import { runMkdir } from './commands/mkdir';
import { runChecksum } from './commands/checksum';
import { showError } from './reporters/consoleReporter';
import { describeError } from './errors';
import { CHECKSUM_ALGORITHMS, ChecksumAlgorithm, CreationState } from './types';

function isChecksumAlgorithm(value: string): value is ChecksumAlgorithm {
  return CHECKSUM_ALGORITHMS.some(algorithm => algorithm === value);
}

async function guarded(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    showError(describeError(error));
    process.exit(1);
  }
}

const program = new Command();

program
  .name('treesift')
  .description('Search directory trees, create directories and inspect files')
  .version('0.1.0');

program
  .command('find')
  .description('List files below a directory that match a wildcard or extension set')
  .argument('[directory]', 'Directory to search', '.')
  .option('--pattern <wildcard>', 'File name wildcard, e.g. "*.txt" or "file?.log"')
  .option('--ext <extensions...>', 'File extensions, matched case-insensitively')
  .option('--exclude <names...>', 'Entry names to prune from the walk')
  .option('--no-recursive', 'Only look at direct children')
  .option('--include-dirs', 'List directories as well as files', false)
  .option('--strict', 'Fail on directories that cannot be listed', false)
  .addOption(new Option('--format <format>', 'Output format').choices(['console', 'json']).default('console'))
  .action(async (directory: string, options: { pattern?: string; ext?: string[]; exclude?: string[]; recursive: boolean; includeDirs: boolean; strict: boolean; format: string }) => {
    await guarded(() => runFind({
      directory,
      pattern: options.pattern,
      ext: options.ext,
      exclude: options.exclude,
      recursive: options.recursive,
      includeDirs: options.includeDirs,
      strict: options.strict,
      format: options.format === 'json' ? 'json' : 'console',
    }));
  });

program
  .command('count')
  .description('Count files (and optionally directories) below a directory')
  .argument('[directory]', 'Directory to count', '.')
  .option('--include-dirs', 'Count directories too', false)
  .action(async (directory: string, options: { includeDirs: boolean }) => {
    await guarded(() => runCount({ directory, includeDirs: options.includeDirs }));
  });

program
  .command('mkdir')
  .description('Create directories and report the outcome for each one')
  .argument('<directories...>', 'Directories to create')
  .option('-p, --parents', 'Create missing parent directories', false)
  .option('--interactive', 'Ask before creating missing parents', false)
  .action(async (directories: string[], options: { parents: boolean; interactive: boolean }) => {
    await guarded(async () => {
      const results = await runMkdir({ directories, parents: options.parents, interactive: options.interactive });
      if (results.some(result => result.state === CreationState.FAILED)) {
        process.exitCode = 1;
      }
    });
  });

program
  .command('checksum')
  .description('Print the checksum of a file')
  .argument('<file>', 'File to hash')
  .addOption(new Option('--algorithm <name>', 'Hash algorithm').choices([...CHECKSUM_ALGORITHMS]).default('md5'))
  .action(async (file: string, options: { algorithm: string }) => {
    await guarded(async () => {
      if (!isChecksumAlgorithm(options.algorithm)) {
        throw new Error(`Unsupported algorithm: ${options.algorithm}`);
      }
      await runChecksum({ file, algorithm: options.algorithm });
    });
  });

program.parseAsync().catch((error: unknown) => {
  showError(describeError(error));
  process.exit(1);
});
