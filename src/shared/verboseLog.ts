import chalk from 'chalk';

const TRUTHY = ['1', 'true', 'yes', 'on'];

export function isVerboseEnabled(): boolean {
  const value = process.env.TREESIFT_VERBOSE;
  if (!value) return false;
  return TRUTHY.includes(value.trim().toLowerCase());
}

/** Trace line on stderr, only when TREESIFT_VERBOSE is set. */
export function verboseLog(message: string): void {
  if (!isVerboseEnabled()) return;
  console.error(chalk.dim(`[treesift] ${message}`));
}
