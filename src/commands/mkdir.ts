import * as path from 'path';
import * as fs from 'fs';
import { confirm } from '@inquirer/prompts';
import { DirectoryCreation, MkdirOptions } from '../types';
import { ensureDirectories, ensureDirectory, ensureDirectoryWithAncestors } from '../create/directoryFactory';
import { showCreationResults, showHeader } from '../reporters/consoleReporter';

async function createInteractively(directories: string[]): Promise<DirectoryCreation[]> {
  const results: DirectoryCreation[] = [];
  for (const dir of directories) {
    const target = path.resolve(dir);
    let parents = false;
    if (!fs.existsSync(path.dirname(target))) {
      parents = await confirm({
        message: `Parent of ${target} does not exist. Create missing parents?`,
        default: true,
      });
    }
    results.push({ path: target, state: parents ? ensureDirectoryWithAncestors(target) : ensureDirectory(target) });
  }
  return results;
}

/** Returns one outcome per requested directory, in the order given. */
export async function runMkdir(options: MkdirOptions): Promise<DirectoryCreation[]> {
  showHeader();

  const results = options.interactive && !options.parents
    ? await createInteractively(options.directories)
    : ensureDirectories(options.directories, { parents: options.parents });

  showCreationResults(results);
  return results;
}
