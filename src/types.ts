import type { Dirent } from 'fs';

// === Nodes ===

/** A read-only view over one file-system entry, valid only as a query result. */
export interface FileNode {
  name: string;
  absolutePath: string;
  isDirectory: boolean;
}

export type NodePredicate = (node: FileNode) => boolean;

// === Patterns ===

export type PatternKind = 'wildcard' | 'extensions' | 'regex';

export interface CompiledPattern {
  readonly kind: PatternKind;
  /** Regular expression source; '' for the empty extension set. */
  readonly source: string;
  readonly regex: RegExp;
}

export type NodeMatcher = CompiledPattern | NodePredicate;

// === Traversal ===

export interface WalkOptions {
  recursive?: boolean;
  includeDirectories?: boolean;
  matcher?: NodeMatcher;
  /** Test directories against `matcher` before yielding them. Never prunes. */
  matchDirectories?: boolean;
  /** Compiled patterns test the entry name; predicates see the whole node. */
  excludeFilters?: NodeMatcher[];
  excludeDirs?: string[];
  excludeHiddenDirs?: boolean;
  maxDepth?: number;
  strict?: boolean;
}

export type ListingStatus =
  | 'ok'
  | 'empty'
  | 'not-found'
  | 'not-a-directory'
  | 'permission-denied'
  | 'error';

export type ListingResult =
  | { status: 'ok'; entries: Dirent[] }
  | { status: 'empty' }
  | { status: Exclude<ListingStatus, 'ok' | 'empty'>; error: unknown };

// === Directory creation ===

export enum CreationState {
  PENDING = 'PENDING',
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  FAILED = 'FAILED',
  CREATED = 'CREATED',
}

export interface DirectoryCreation {
  path: string;
  state: CreationState;
}

export interface EnsureDirectoriesOptions {
  /** Create missing ancestors of every target. */
  parents?: boolean;
}

// === File content ===

export type ChecksumAlgorithm = 'md5' | 'sha1' | 'sha256' | 'sha512';

export const CHECKSUM_ALGORITHMS: readonly ChecksumAlgorithm[] = ['md5', 'sha1', 'sha256', 'sha512'];

export interface FileContentInfo {
  name: string;
  /** Absolute path of the containing directory. */
  path: string;
  content: Buffer;
  checksum: string;
  size: number;
}

export type LineTransform = (lineIndex: number, line: string) => string;

// === Configuration ===

export interface SearchConfig {
  excludeDirs: string[];
  excludeHiddenDirs: boolean;
}

export const DEFAULT_EXCLUDE_DIRS = [
  'node_modules', '.git', '.hg', '.svn',
  'dist', 'build', 'coverage', '__pycache__',
];

export const CONFIG_FILE_NAME = '.treesift.json';

// === CLI ===

export interface FindOptions {
  directory: string;
  pattern?: string;
  ext?: string[];
  exclude?: string[];
  recursive: boolean;
  includeDirs: boolean;
  strict: boolean;
  format: 'console' | 'json';
}

export interface CountOptions {
  directory: string;
  includeDirs: boolean;
}

export interface MkdirOptions {
  directories: string[];
  parents: boolean;
  interactive: boolean;
}

export interface ChecksumOptions {
  file: string;
  algorithm: ChecksumAlgorithm;
}
