import * as path from 'path';
import * as fs from 'fs';
import { TraversalError } from '../errors';
import { FileNode, ListingResult, ListingStatus, NodePredicate, WalkOptions } from '../types';
import { directoriesNamed, hiddenDirectories, toPredicate } from './filters';
import { verboseLog } from './verboseLog';

interface ResolvedWalk {
  recursive: boolean;
  includeDirectories: boolean;
  matches: NodePredicate;
  matchDirectories: boolean;
  exclude: NodePredicate[];
  maxDepth?: number;
  strict: boolean;
}

const matchAll: NodePredicate = () => true;

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function classifyListingError(error: unknown): Exclude<ListingStatus, 'ok' | 'empty'> {
  switch (errorCode(error)) {
    case 'ENOENT': return 'not-found';
    case 'ENOTDIR': return 'not-a-directory';
    case 'EACCES':
    case 'EPERM': return 'permission-denied';
    default: return 'error';
  }
}

/**
 * Lists the immediate children of `dir`, telling an empty directory apart
 * from one that could not be listed.
 */
export function listChildren(dir: string): ListingResult {
  let entries: fs.Dirent[];
  try { entries = fs.readdirSync(dir, { withFileTypes: true }); }
  catch (error) { return { status: classifyListingError(error), error }; }
  return entries.length === 0 ? { status: 'empty' } : { status: 'ok', entries };
}

export function toFileNode(dir: string, entry: fs.Dirent): FileNode {
  return {
    name: entry.name,
    absolutePath: path.join(dir, entry.name),
    // Symlinks report false here and are never followed.
    isDirectory: entry.isDirectory(),
  };
}

function resolveWalk(options: WalkOptions): ResolvedWalk {
  const exclude = (options.excludeFilters ?? []).map(toPredicate);
  if (options.excludeDirs?.length) exclude.push(directoriesNamed(options.excludeDirs));
  if (options.excludeHiddenDirs) exclude.push(hiddenDirectories);

  return {
    recursive: options.recursive ?? true,
    includeDirectories: options.includeDirectories ?? false,
    matches: options.matcher ? toPredicate(options.matcher) : matchAll,
    matchDirectories: options.matchDirectories ?? false,
    exclude,
    maxDepth: options.maxDepth,
    strict: options.strict ?? false,
  };
}

function* walkLevel(dir: string, walk: ResolvedWalk, depth: number): Generator<FileNode, void, undefined> {
  if (walk.maxDepth !== undefined && depth > walk.maxDepth) return;

  const listing = listChildren(dir);
  if (listing.status === 'empty') return;
  if (listing.status !== 'ok') {
    if (walk.strict) throw new TraversalError(dir, listing.status, listing.error);
    verboseLog(`Skipping ${dir} (${listing.status})`);
    return;
  }

  const children = listing.entries.map(entry => toFileNode(dir, entry));

  // Exclusion is settled for the whole level before anything is yielded.
  const excluded = new Set<string>();
  for (const filter of walk.exclude) {
    for (const child of children) {
      if (filter(child)) excluded.add(child.absolutePath);
    }
  }

  for (const node of children) {
    if (excluded.has(node.absolutePath)) continue;
    if (node.isDirectory) {
      if (walk.includeDirectories && (!walk.matchDirectories || walk.matches(node))) yield node;
      if (walk.recursive) yield* walkLevel(node.absolutePath, walk, depth + 1);
    } else if (walk.matches(node)) {
      yield node;
    }
  }
}

/**
 * Lazy depth-first pre-order walk below `root`. The root itself is never
 * yielded. Matching only gates what is yielded; exclusion filters prune.
 * Child order is whatever the host listing returns.
 */
export function walkDirectory(root: string, options: WalkOptions = {}): Generator<FileNode, void, undefined> {
  return walkLevel(path.resolve(root), resolveWalk(options), 0);
}
