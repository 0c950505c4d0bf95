/**
 * Reading and writing dotenv files on disk.
 */
import fs from 'node:fs';
import type { DotenvDocument } from './document.js';
import { parseDocument } from './parse.js';
import { atomicWriteFileSync } from '../utils/fs.js';

/**
 * Load and parse a dotenv file.
 * Returns undefined when the file does not exist.
 */
export function loadDotenvFile(filePath: string): DotenvDocument | undefined {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  const source = fs.readFileSync(filePath, 'utf-8');
  const stat = fs.statSync(filePath);
  return parseDocument(source, { file: filePath }).withLastModified(stat.mtime);
}

/**
 * Write dotenv text to disk, optionally stamping its modification time.
 */
export function writeDotenvFile(filePath: string, content: string, modified?: Date): void {
  atomicWriteFileSync(filePath, content, modified);
}
