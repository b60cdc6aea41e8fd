import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { CreationState, DirectoryCreation } from '../types';

export function showHeader(): void {
  console.log('');
  console.log(chalk.bold.cyan('  treesift') + chalk.gray(' — file-system search and directory toolkit'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

export function showPaths(paths: string[], root: string): void {
  if (paths.length === 0) {
    console.log(`  ${chalk.yellow('!')} No matches below ${chalk.white(root)}`);
    console.log('');
    return;
  }
  for (const p of paths) {
    console.log(`    ${chalk.gray('→')} ${chalk.white(p)}`);
  }
  console.log('');
  console.log(`  ${chalk.green('✓')} ${paths.length} ${paths.length === 1 ? 'match' : 'matches'}`);
  console.log('');
}

export function showCount(count: number, root: string, includeDirectories: boolean): void {
  const what = includeDirectories ? 'files and directories' : 'files';
  console.log(`  ${chalk.green('✓')} ${count} ${what} below ${chalk.white(root)}`);
  console.log('');
}

const stateColors: Record<CreationState, (s: string) => string> = {
  [CreationState.CREATED]: chalk.green,
  [CreationState.ALREADY_EXISTS]: chalk.blue,
  [CreationState.FAILED]: chalk.red,
  [CreationState.PENDING]: chalk.gray,
};

export function showCreationResults(results: readonly DirectoryCreation[]): void {
  for (const { path: dir, state } of results) {
    console.log(`  ${stateColors[state](state.padEnd(14))} ${chalk.white(dir)}`);
  }
  console.log('');
}

export function showChecksum(file: string, algorithm: string, checksum: string): void {
  console.log(`  ${chalk.gray(`${algorithm}:`)} ${chalk.white(checksum)}  ${file}`);
}

export function showError(message: string): void {
  console.error(chalk.red(`\nError: ${message}`));
}

export function createSpinner(text: string): Ora {
  return ora({
    text,
    indent: 2,
  });
}
