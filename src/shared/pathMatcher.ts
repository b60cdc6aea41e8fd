import { InvalidPatternError } from '../errors';
import { CompiledPattern, PatternKind } from '../types';

const REGEX_METACHARACTERS = /[.*+?^${}()|[\]\\/]/g;

export function escapeRegExp(value: string): string {
  return value.replace(REGEX_METACHARACTERS, '\\$&');
}

function freeze(kind: PatternKind, source: string, regex: RegExp): CompiledPattern {
  return Object.freeze({ kind, source, regex });
}

/**
 * Translates a `*` / `?` wildcard into a regex anchored on the whole file name.
 * Everything else is matched literally, so no input is rejected.
 */
export function compileWildcard(pattern: string): CompiledPattern {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') source += '.*';
    else if (ch === '?') source += '.';
    else source += escapeRegExp(ch);
  }
  source = `^${source}$`;
  // Unicode mode so `?` consumes a whole code point, astral ones included.
  return freeze('wildcard', source, new RegExp(source, 'su'));
}

/**
 * Case-insensitive suffix match on any of the given extensions.
 * A leading dot is optional. The empty set matches nothing.
 */
export function compileExtensions(extensions: readonly string[]): CompiledPattern {
  const cleaned = extensions
    .map(ext => (ext.startsWith('.') ? ext.slice(1) : ext))
    .filter(ext => ext.length > 0);
  if (cleaned.length === 0) {
    return freeze('extensions', '', /(?!)/);
  }
  const source = `[^\\s]+\\.(${cleaned.map(escapeRegExp).join('|')})$`;
  return freeze('extensions', source, new RegExp(source, 'i'));
}

/** Whole-name regular expression. The only compile step that can throw. */
export function compileRegex(pattern: string): CompiledPattern {
  const source = `^(?:${pattern})$`;
  let regex: RegExp;
  try {
    regex = new RegExp(source);
  } catch (error) {
    throw new InvalidPatternError(pattern, error);
  }
  return freeze('regex', source, regex);
}

export function isCompiledPattern(value: unknown): value is CompiledPattern {
  return typeof value === 'object'
    && value !== null
    && 'regex' in value
    && value.regex instanceof RegExp;
}

export function matchesName(pattern: CompiledPattern, name: string): boolean {
  return pattern.regex.test(name);
}

/** Plain case-insensitive suffix test, no regex involved. */
export function matchesSuffix(name: string, suffixes: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return suffixes.some(suffix => lower.length >= suffix.length && lower.endsWith(suffix.toLowerCase()));
}
