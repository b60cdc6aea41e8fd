import * as fs from 'fs';

export function writeStringToFile(file: string, content: string, encoding: BufferEncoding = 'utf8'): void {
  fs.writeFileSync(file, content, encoding);
}

/** Each line is followed by `\n`. */
export function writeLinesToFile(lines: readonly string[], file: string, encoding: BufferEncoding = 'utf8'): void {
  const content = lines.map(line => `${line}\n`).join('');
  fs.writeFileSync(file, content, encoding);
}

export function storeByteArrayToFile(bytes: Uint8Array, file: string): void {
  fs.writeFileSync(file, bytes);
}

/** Overwrites `destination` with the bytes of `source`. */
export function copyFileContent(source: string, destination: string): void {
  fs.writeFileSync(destination, fs.readFileSync(source));
}

export function formatProperties(properties: ReadonlyMap<string, string>): string {
  let content = '';
  for (const [key, value] of properties) content += `${key}=${value}\n`;
  return content;
}

export function writePropertiesToFile(file: string, properties: ReadonlyMap<string, string>): void {
  fs.writeFileSync(file, formatProperties(properties), 'utf8');
}
