import * as path from 'path';
import { ChecksumOptions } from '../types';
import { getFileChecksum } from '../io/checksum';
import { showChecksum } from '../reporters/consoleReporter';

export async function runChecksum(options: ChecksumOptions): Promise<void> {
  const file = path.resolve(options.file);
  showChecksum(file, options.algorithm, getFileChecksum(file, options.algorithm));
}
