import * as path from 'path';
import { NodeMatcher, NodePredicate } from '../types';
import { compileExtensions, compileRegex, compileWildcard, escapeRegExp } from '../shared/pathMatcher';
import { filesOnly } from '../shared/filters';
import { listChildren, walkDirectory } from '../shared/walkDirectory';
import { readLinesInList } from '../io/readFile';
import { collectPaths, collectSet, countNodes, totalSpace } from './aggregators';

/**
 * Direct children of `dir` whose name matches the wildcard. Not recursive.
 */
export function findFiles(dir: string, wildcard: string): string[] {
  return collectPaths(dir, { recursive: false, matcher: compileWildcard(wildcard) });
}

export function findFilesRecursive(dir: string, wildcard: string, includeDirectories = false): string[] {
  return collectPaths(dir, { includeDirectories, matcher: compileWildcard(wildcard) });
}

/** Recursive search with a regular expression that must match the whole name. */
export function findAllFiles(dir: string, regex: string): string[] {
  return collectPaths(dir, { matcher: compileRegex(regex) });
}

export function findFilesWithExtensions(dir: string, extensions: readonly string[]): string[] {
  return collectPaths(dir, { matcher: compileExtensions(extensions) });
}

/**
 * The predicate is applied to files and directories alike. Only direct
 * children of `dir` are tested.
 */
export function findFilesByPredicate(dir: string, predicate: NodePredicate): Set<string> {
  return collectSet(dir, { recursive: false, includeDirectories: true, matchDirectories: true, matcher: predicate });
}

export function findFilesByPredicateRecursive(dir: string, predicate: NodePredicate): Set<string> {
  return collectSet(dir, { includeDirectories: true, matchDirectories: true, matcher: predicate });
}

/** All files below `dir`, pruning every entry any filter matches. */
export function findFilesExcluding(dir: string, ...excludeFilters: NodeMatcher[]): Set<string> {
  return collectSet(dir, { excludeFilters });
}

export function findFilesWithPrefixAndExtension(
  dir: string,
  prefix: string,
  extension: string,
  recursive = false,
): string[] {
  const source = `${escapeRegExp(prefix)}.*\\.${escapeRegExp(extension)}`;
  return collectPaths(dir, { recursive, matcher: compileRegex(source) });
}

export function getAllFilesFromDir(dir: string): string[] {
  return collectPaths(dir, { recursive: false });
}

export function getAllFilesFromDirRecursive(dir: string, includeDirectories = false): string[] {
  return collectPaths(dir, { includeDirectories });
}

export function listDirs(dir: string): string[] {
  return collectPaths(dir, { recursive: false, includeDirectories: true, excludeFilters: [filesOnly] });
}

export function countAllFiles(dir: string, includeDirectories = false): number {
  return countNodes(dir, includeDirectories);
}

/** True if `name` is a direct child of `parent`. */
export function containsFile(parent: string, name: string): boolean {
  const listing = listChildren(parent);
  if (listing.status !== 'ok') return false;
  return listing.entries.some(entry => entry.name === name);
}

/** Stops at the first hit. */
export function containsFileRecursive(parent: string, target: string): boolean {
  const wanted = path.resolve(target);
  for (const node of walkDirectory(parent, { includeDirectories: true })) {
    if (node.absolutePath === wanted) return true;
  }
  return false;
}

export function getRootDirectory(target: string): string {
  return path.parse(path.resolve(target)).root;
}

/**
 * Zero-based index of the first line starting with `prefix`, -1 if none.
 * Read errors propagate.
 */
export function findLineIndex(file: string, prefix: string): number {
  return readLinesInList(file).findIndex(line => line.startsWith(prefix));
}

export function getTotalSpaceInKilobytes(target: string): number {
  return Math.floor(totalSpace(target) / 1024);
}

export function getTotalSpaceInMegabytes(target: string): number {
  return Math.floor(getTotalSpaceInKilobytes(target) / 1024);
}
