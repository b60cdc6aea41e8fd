import * as path from 'path';
import * as fs from 'fs';
import { CountOptions } from '../types';
import { loadSearchConfig } from '../config';
import { countNodes } from '../search/aggregators';
import { createSpinner, showCount, showHeader } from '../reporters/consoleReporter';

export async function runCount(options: CountOptions): Promise<void> {
  const targetDir = path.resolve(options.directory);

  if (!fs.existsSync(targetDir)) {
    throw new Error(`Directory does not exist: ${targetDir}`);
  }

  const config = loadSearchConfig(targetDir);

  showHeader();
  const spinner = createSpinner(`Counting entries in ${targetDir}...`);
  spinner.start();
  const count = countNodes(targetDir, options.includeDirs, {
    excludeDirs: config.excludeDirs,
    excludeHiddenDirs: config.excludeHiddenDirs,
  });
  spinner.succeed('Count complete');
  console.log('');
  showCount(count, targetDir, options.includeDirs);
}
