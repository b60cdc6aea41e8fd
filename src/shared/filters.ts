import { CompiledPattern, FileNode, NodeMatcher, NodePredicate } from '../types';
import { compileExtensions, compileWildcard, isCompiledPattern } from './pathMatcher';

export function toPredicate(matcher: NodeMatcher): NodePredicate {
  if (isCompiledPattern(matcher)) return byPattern(matcher);
  return matcher;
}

export function byPattern(pattern: CompiledPattern): NodePredicate {
  return (node: FileNode) => pattern.regex.test(node.name);
}

export function byWildcard(pattern: string): NodePredicate {
  return byPattern(compileWildcard(pattern));
}

export function byExtensions(extensions: readonly string[]): NodePredicate {
  return byPattern(compileExtensions(extensions));
}

/** Exact entry names, files and directories alike. */
export function byName(names: readonly string[]): NodePredicate {
  const set = new Set(names);
  return (node: FileNode) => set.has(node.name);
}

export function directoriesNamed(names: readonly string[]): NodePredicate {
  const set = new Set(names);
  return (node: FileNode) => node.isDirectory && set.has(node.name);
}

export const hiddenDirectories: NodePredicate = node => node.isDirectory && node.name.startsWith('.');

export const filesOnly: NodePredicate = node => !node.isDirectory;

export function anyOf(filters: readonly NodePredicate[]): NodePredicate {
  return (node: FileNode) => filters.some(filter => filter(node));
}
