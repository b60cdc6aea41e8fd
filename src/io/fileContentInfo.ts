import * as path from 'path';
import * as fs from 'fs';
import { TreesiftError } from '../errors';
import { FileContentInfo } from '../types';
import { ensureParentDirectories } from '../create/directoryFactory';
import { getChecksum } from './checksum';

/** Snapshot of a file: name, parent directory, bytes and their md5. */
export function toFileContentInfo(file: string): FileContentInfo {
  const absolute = path.resolve(file);
  const content = fs.readFileSync(absolute);
  return {
    name: path.basename(absolute),
    path: path.dirname(absolute),
    content,
    checksum: getChecksum(content, 'md5'),
    size: content.length,
  };
}

/**
 * Writes the snapshot back, creating its directory if needed, and returns
 * the file path. The content has to match the recorded checksum.
 */
export function fromFileContentInfo(info: FileContentInfo): string {
  const target = path.join(info.path, info.name);
  if (getChecksum(info.content, 'md5') !== info.checksum) {
    throw new TreesiftError(`Checksum mismatch for ${target}`);
  }
  if (!ensureParentDirectories(target)) {
    throw new TreesiftError(`Cannot create directory for ${target}`);
  }
  fs.writeFileSync(target, info.content);
  return target;
}
