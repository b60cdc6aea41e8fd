import { quietly } from '../errors';
import {
  copyFileContent, storeByteArrayToFile, writeLinesToFile,
  writePropertiesToFile, writeStringToFile,
} from './writeFile';

// Best-effort variants: every failure surfaces as QuietOperationError.

export function writeStringToFileQuietly(file: string, content: string, encoding: BufferEncoding = 'utf8'): void {
  quietly(() => writeStringToFile(file, content, encoding), `Writing ${file}`);
}

export function writeLinesToFileQuietly(lines: readonly string[], file: string, encoding: BufferEncoding = 'utf8'): void {
  quietly(() => writeLinesToFile(lines, file, encoding), `Writing ${file}`);
}

export function storeByteArrayToFileQuietly(bytes: Uint8Array, file: string): void {
  quietly(() => storeByteArrayToFile(bytes, file), `Writing ${file}`);
}

export function copyFileContentQuietly(source: string, destination: string): void {
  quietly(() => copyFileContent(source, destination), `Copying ${source} to ${destination}`);
}

export function writePropertiesToFileQuietly(file: string, properties: ReadonlyMap<string, string>): void {
  quietly(() => writePropertiesToFile(file, properties), `Writing ${file}`);
}
