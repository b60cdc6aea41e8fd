export * from './types';
export * from './errors';
export { loadSearchConfig } from './config';
export {
  compileWildcard, compileExtensions, compileRegex,
  escapeRegExp, isCompiledPattern, matchesName, matchesSuffix,
} from './shared/pathMatcher';
export {
  toPredicate, byPattern, byWildcard, byExtensions, byName,
  directoriesNamed, hiddenDirectories, filesOnly, anyOf,
} from './shared/filters';
export { walkDirectory, listChildren, toFileNode } from './shared/walkDirectory';
export { collectSet, collectList, collectPaths, countNodes, totalSpace, sortPaths } from './search/aggregators';
export * from './search/fileSearch';
export * from './create/directoryFactory';
export * from './io/readFile';
export * from './io/writeFile';
export * from './io/writeFileQuietly';
export * from './io/modifyFile';
export * from './io/checksum';
export * from './io/fileContentInfo';
