import fs from 'node:fs';
import path from 'node:path';
import { randomBytes } from 'node:crypto';

/**
 * Write a file atomically using a temp file + rename.
 * Prevents partial reads if the process is interrupted mid-write.
 * When `modified` is given, the file's access and modification times are set to it.
 */
export function atomicWriteFileSync(
  targetPath: string,
  content: string | Buffer,
  modified?: Date,
): void {
  const dir = path.dirname(targetPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const tmpFile = targetPath + '.tmp.' + randomBytes(4).toString('hex');
  fs.writeFileSync(tmpFile, content);
  if (modified) {
    fs.utimesSync(tmpFile, modified, modified);
  }
  fs.renameSync(tmpFile, targetPath);
}

