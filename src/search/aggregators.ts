import * as fs from 'fs';
import { describeError } from '../errors';
import { FileNode, WalkOptions } from '../types';
import { walkDirectory } from '../shared/walkDirectory';
import { verboseLog } from '../shared/verboseLog';

/** Deduplicated absolute paths. */
export function collectSet(root: string, options: WalkOptions = {}): Set<string> {
  const results = new Set<string>();
  for (const node of walkDirectory(root, options)) results.add(node.absolutePath);
  return results;
}

/** Nodes in visit order. */
export function collectList(root: string, options: WalkOptions = {}): FileNode[] {
  return Array.from(walkDirectory(root, options));
}

export function collectPaths(root: string, options: WalkOptions = {}): string[] {
  return collectList(root, options).map(node => node.absolutePath);
}

/**
 * Counts visited files, plus every directory entered when `includeDirectories`
 * is set. That flag belongs to the count and overrides the walk's own.
 */
export function countNodes(root: string, includeDirectories: boolean, options: WalkOptions = {}): number {
  let count = 0;
  for (const _node of walkDirectory(root, { ...options, includeDirectories, matchDirectories: false })) {
    count++;
  }
  return count;
}

/**
 * Capacity in bytes of the volume holding `target`. This is the whole
 * volume's size, not the size of the files below `target`. Returns 0 when
 * the path cannot be queried.
 */
export function totalSpace(target: string): number {
  try {
    const stats = fs.statfsSync(target);
    return stats.blocks * stats.bsize;
  } catch (error) {
    verboseLog(`Cannot query volume of ${target}: ${describeError(error)}`);
    return 0;
  }
}

export function sortPaths(paths: Iterable<string>): string[] {
  return Array.from(paths).sort();
}
