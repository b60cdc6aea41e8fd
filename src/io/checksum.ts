import * as crypto from 'crypto';
import * as fs from 'fs';
import { ChecksumAlgorithm } from '../types';

export function getChecksum(bytes: Uint8Array, algorithm: ChecksumAlgorithm = 'md5'): string {
  return crypto.createHash(algorithm).update(bytes).digest('hex');
}

export function getFileChecksum(file: string, algorithm: ChecksumAlgorithm = 'md5'): string {
  return getChecksum(fs.readFileSync(file), algorithm);
}
