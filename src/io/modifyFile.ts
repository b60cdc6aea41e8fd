import * as fs from 'fs';
import { LineTransform } from '../types';
import { splitLines } from './readFile';

/**
 * Rewrites `input` line by line into `output`, each transformed line
 * followed by `\n`. The input is read fully first, so both may be the same file.
 */
export function modifyFile(input: string, output: string, transform: LineTransform): void {
  const lines = splitLines(fs.readFileSync(input, 'utf8'));
  const content = lines.map((line, index) => `${transform(index, line)}\n`).join('');
  fs.writeFileSync(output, content, 'utf8');
}
