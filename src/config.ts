import * as path from 'path';
import * as fs from 'fs';
import { CONFIG_FILE_NAME, DEFAULT_EXCLUDE_DIRS, SearchConfig } from './types';
import { verboseLog } from './shared/verboseLog';

/**
 * Load per-project search settings from .treesift.json.
 * User excludes are additive: they extend DEFAULT_EXCLUDE_DIRS, never replace.
 */
export function loadSearchConfig(targetDir: string): SearchConfig {
  const defaults: SearchConfig = { excludeDirs: [...DEFAULT_EXCLUDE_DIRS], excludeHiddenDirs: false };
  const configPath = path.join(targetDir, CONFIG_FILE_NAME);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch {
    // no config or malformed — use defaults
    return defaults;
  }
  if (typeof raw !== 'object' || raw === null) return defaults;

  const config = { ...defaults };
  if ('excludeDirs' in raw && Array.isArray(raw.excludeDirs)) {
    const extra = raw.excludeDirs.filter((d: unknown): d is string => typeof d === 'string');
    config.excludeDirs = [...new Set([...DEFAULT_EXCLUDE_DIRS, ...extra])];
  }
  if ('excludeHiddenDirs' in raw && typeof raw.excludeHiddenDirs === 'boolean') {
    config.excludeHiddenDirs = raw.excludeHiddenDirs;
  }
  verboseLog(`Loaded ${configPath}`);
  return config;
}
