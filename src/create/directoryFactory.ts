import * as path from 'path';
import * as fs from 'fs';
import { DirectoryPreconditionError, describeError, quietly } from '../errors';
import { CreationState, DirectoryCreation, EnsureDirectoriesOptions } from '../types';
import { verboseLog } from '../shared/verboseLog';

function attemptCreation(target: string, recursive: boolean): CreationState {
  if (fs.existsSync(target)) return CreationState.ALREADY_EXISTS;
  try {
    fs.mkdirSync(target, { recursive });
    return CreationState.CREATED;
  } catch (error) {
    verboseLog(`Cannot create ${target}: ${describeError(error)}`);
    return CreationState.FAILED;
  }
}

/**
 * Creates exactly `target`; its parent has to exist already.
 * Anything already present at `target`, directory or not, is left alone.
 */
export function ensureDirectory(target: string): CreationState {
  return attemptCreation(path.resolve(target), false);
}

export function ensureDirectoryWithAncestors(target: string): CreationState {
  return attemptCreation(path.resolve(target), true);
}

/**
 * Checks `parent` before touching the file system and throws
 * DirectoryPreconditionError when it is missing or not a directory.
 */
export function createDirectoryIn(parent: string, name: string): DirectoryCreation {
  const absoluteParent = path.resolve(parent);
  const stats = fs.statSync(absoluteParent, { throwIfNoEntry: false });
  if (!stats) throw new DirectoryPreconditionError(absoluteParent, 'parent-missing');
  if (!stats.isDirectory()) throw new DirectoryPreconditionError(absoluteParent, 'parent-not-directory');

  const target = path.join(absoluteParent, name);
  return { path: target, state: ensureDirectory(target) };
}

/**
 * One outcome per requested target, in request order; a target listed twice
 * is attempted twice. A failure never stops the batch.
 */
export function ensureDirectories(
  targets: Iterable<string>,
  options: EnsureDirectoriesOptions = {},
): DirectoryCreation[] {
  const create = options.parents ? ensureDirectoryWithAncestors : ensureDirectory;
  const results: DirectoryCreation[] = [];
  for (const target of targets) {
    results.push({ path: path.resolve(target), state: create(target) });
  }
  return results;
}

/** State of the last directory processed, PENDING for an empty batch. */
export function lastCreationState(results: Iterable<DirectoryCreation>): CreationState {
  let state = CreationState.PENDING;
  for (const result of results) state = result.state;
  return state;
}

/** True when the parent directory of `file` exists once this returns. */
export function ensureParentDirectories(file: string): boolean {
  const parent = path.dirname(path.resolve(file));
  const stats = fs.statSync(parent, { throwIfNoEntry: false });
  if (stats) return stats.isDirectory();
  return ensureDirectoryWithAncestors(parent) === CreationState.CREATED;
}

export function newDirectoryQuietly(target: string): string {
  const absolute = path.resolve(target);
  return quietly(() => {
    fs.mkdirSync(absolute);
    return absolute;
  }, `Creating directory ${absolute}`);
}

/** Like newDirectoryQuietly, creating missing ancestors too. */
export function newDirectoriesQuietly(target: string): string {
  const absolute = path.resolve(target);
  return quietly(() => {
    fs.mkdirSync(absolute, { recursive: true });
    return absolute;
  }, `Creating directories ${absolute}`);
}
