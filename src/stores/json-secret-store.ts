/**
 * Secret store backed by a JSON file.
 *
 * The file maps each secret name to its value and the time it was last set:
 *
 *   { "API_KEY": { "value": "test-secret", "updated": "2025-06-15T10:00:00.000Z" } }
 */
import fs from 'node:fs';
import path from 'node:path';
import { TimeError, TransportError } from '../sync/errors.js';
import type { RemoteSecret, SecretStore } from '../sync/types.js';
import { atomicWriteFileSync } from '../utils/fs.js';

export interface StoredSecret {
  value: string;
  /** ISO 8601 timestamp of the last write */
  updated?: string;
}

export class JsonSecretStore implements SecretStore {
  readonly location: string;

  constructor(
    filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.location = path.resolve(filePath);
  }

  async getSecret(name: string): Promise<RemoteSecret | undefined> {
    const secrets = this.read();
    if (!Object.hasOwn(secrets, name)) {
      return undefined;
    }
    const stored = secrets[name];
    return { name, value: stored.value, modified: parseUpdated(name, stored.updated) };
  }

  async setSecret(name: string, value: string): Promise<void> {
    // Read and write without yielding so concurrent sets don't lose updates
    const secrets = this.read();
    secrets[name] = { value, updated: this.now().toISOString() };
    atomicWriteFileSync(this.location, JSON.stringify(secrets, null, 2) + '\n');
  }

  private read(): Record<string, StoredSecret> {
    if (!fs.existsSync(this.location)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.location, 'utf-8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(this.location, `Failed to read secrets from ${this.location}: ${message}`, { cause: err });
    }

    if (!isRecord(parsed)) {
      throw new TransportError(this.location, `Secrets file ${this.location} must contain a JSON object`);
    }

    const secrets: Record<string, StoredSecret> = {};
    for (const [name, entry] of Object.entries(parsed)) {
      if (!isRecord(entry) || typeof entry.value !== 'string') {
        throw new TransportError(name, `Secret ${name} in ${this.location} has no string value`);
      }
      secrets[name] = {
        value: entry.value,
        updated: typeof entry.updated === 'string' ? entry.updated : undefined,
      };
    }
    return secrets;
  }
}

function parseUpdated(name: string, updated: string | undefined): Date | undefined {
  if (updated === undefined) {
    return undefined;
  }
  const date = new Date(updated);
  if (Number.isNaN(date.getTime())) {
    throw new TimeError(name, `Secret ${name} has an invalid modification time: ${updated}`);
  }
  return date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
