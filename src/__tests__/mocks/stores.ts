import type { BlobStore, RemoteBlob, RemoteSecret, SecretStore } from '../../sync/types.js';

/**
 * In-memory secret store for tests.
 */
export class MemorySecretStore implements SecretStore {
  readonly location = 'memory://secrets';
  readonly secrets = new Map<string, RemoteSecret>();
  reads: string[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  add(name: string, value: string, modified?: Date): this {
    this.secrets.set(name, { name, value, modified });
    return this;
  }

  async getSecret(name: string): Promise<RemoteSecret | undefined> {
    this.reads.push(name);
    return this.secrets.get(name);
  }

  async setSecret(name: string, value: string): Promise<void> {
    this.secrets.set(name, { name, value, modified: this.now() });
  }
}

/**
 * In-memory blob store for tests.
 */
export class MemoryBlobStore implements BlobStore {
  readonly location = 'memory://blobs';
  readonly blobs = new Map<string, RemoteBlob>();
  reads: string[] = [];

  add(name: string, content: string, modified: Date): this {
    this.blobs.set(name, { name, content: Buffer.from(content), modified });
    return this;
  }

  async getBlob(name: string): Promise<RemoteBlob | undefined> {
    this.reads.push(name);
    return this.blobs.get(name);
  }

  async putBlob(name: string, content: Buffer, modified: Date): Promise<void> {
    this.blobs.set(name, { name, content, modified });
  }
}
