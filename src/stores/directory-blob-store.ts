/**
 * Blob store backed by a local directory, one file per blob.
 * A blob's modification time is its file's mtime.
 */
import fs from 'node:fs';
import path from 'node:path';
import { TransportError } from '../sync/errors.js';
import type { BlobStore, RemoteBlob } from '../sync/types.js';
import { atomicWriteFileSync } from '../utils/fs.js';

export class DirectoryBlobStore implements BlobStore {
  readonly location: string;

  constructor(root: string) {
    this.location = path.resolve(root);
  }

  async getBlob(name: string): Promise<RemoteBlob | undefined> {
    const blobPath = this.blobPath(name);
    if (!fs.existsSync(blobPath)) {
      return undefined;
    }
    const stat = fs.statSync(blobPath);
    if (!stat.isFile()) {
      throw new TransportError(name, `Blob ${name} is not a file`);
    }
    return { name, content: fs.readFileSync(blobPath), modified: stat.mtime };
  }

  async putBlob(name: string, content: Buffer, modified: Date): Promise<void> {
    atomicWriteFileSync(this.blobPath(name), content, modified);
  }

  private blobPath(name: string): string {
    const blobPath = path.resolve(this.location, name);
    const relative = path.relative(this.location, blobPath);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new TransportError(name, `Blob name ${JSON.stringify(name)} is outside ${this.location}`);
    }
    return blobPath;
  }
}
