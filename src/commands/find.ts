import * as path from 'path';
import * as fs from 'fs';
import { FindOptions, NodePredicate, SearchConfig, WalkOptions } from '../types';
import { loadSearchConfig } from '../config';
import { byExtensions, byName, byWildcard } from '../shared/filters';
import { collectPaths, sortPaths } from '../search/aggregators';
import { createSpinner, showHeader, showPaths } from '../reporters/consoleReporter';

/**
 * Turns CLI flags plus the project config into walk options.
 * `--pattern` and `--ext` must both hold when given together.
 */
export function buildWalkOptions(options: FindOptions, config: SearchConfig): WalkOptions {
  const conditions: NodePredicate[] = [];
  if (options.pattern) conditions.push(byWildcard(options.pattern));
  if (options.ext?.length) conditions.push(byExtensions(options.ext));

  const excludeFilters: NodePredicate[] = [];
  if (options.exclude?.length) excludeFilters.push(byName(options.exclude));

  return {
    recursive: options.recursive,
    includeDirectories: options.includeDirs,
    matcher: conditions.length > 0 ? node => conditions.every(test => test(node)) : undefined,
    excludeFilters,
    excludeDirs: config.excludeDirs,
    excludeHiddenDirs: config.excludeHiddenDirs,
    strict: options.strict,
  };
}

export async function runFind(options: FindOptions): Promise<void> {
  const targetDir = path.resolve(options.directory);

  if (!fs.existsSync(targetDir)) {
    throw new Error(`Directory does not exist: ${targetDir}`);
  }

  const walk = buildWalkOptions(options, loadSearchConfig(targetDir));

  if (options.format === 'json') {
    console.log(JSON.stringify(sortPaths(collectPaths(targetDir, walk)), null, 2));
    return;
  }

  showHeader();
  const spinner = createSpinner(`Searching ${targetDir}...`);
  spinner.start();
  let paths: string[];
  try {
    paths = sortPaths(collectPaths(targetDir, walk));
  } catch (error) {
    spinner.fail('Search aborted');
    throw error;
  }
  spinner.succeed('Search complete');
  console.log('');
  showPaths(paths, targetDir);
}
