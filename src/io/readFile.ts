import * as fs from 'fs';

export function readFileToBytes(file: string): Buffer {
  return fs.readFileSync(file);
}

export function readFromFile(file: string, encoding: BufferEncoding = 'utf8'): string {
  return fs.readFileSync(file, encoding);
}

/** Lines without terminators; a trailing newline does not add an empty line. */
export function readLinesInList(file: string, encoding: BufferEncoding = 'utf8'): string[] {
  return splitLines(readFromFile(file, encoding));
}

export function splitLines(content: string): string[] {
  if (content.length === 0) return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Parses `key=value` and `key: value` lines. Lines starting with `#` or `!`
 * and blank lines are skipped; a line without separator maps to ''.
 */
export function parseProperties(content: string): Map<string, string> {
  const properties = new Map<string, string>();
  for (const raw of splitLines(content)) {
    const line = raw.trim();
    if (!line || line.startsWith('#') || line.startsWith('!')) continue;
    const separator = line.search(/[=:]/);
    if (separator === -1) {
      properties.set(line, '');
      continue;
    }
    properties.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
  }
  return properties;
}

export function readPropertiesFromFile(file: string): Map<string, string> {
  return parseProperties(readFromFile(file));
}
