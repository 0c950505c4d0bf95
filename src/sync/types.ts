/**
 * Type definitions for the sync engine.
 */

export const SYNC_MODES = ['sync', 'push', 'pull', 'push-always', 'pull-always'] as const;

/**
 * Which directions a sync may move data in.
 * - sync: push if local is newer, pull if remote is newer
 * - push / pull: only that direction, only if newer
 * - push-always / pull-always: always that direction, regardless of age
 */
export type SyncMode = (typeof SYNC_MODES)[number];

export type SkipReason =
  | 'unchanged'
  | 'pull disabled'
  | 'push disabled'
  | 'nothing to pull'
  | 'nothing to push'
  | 'not found';

/**
 * Outcome of reconciling one unit (a variable or a file).
 * Each variant carries a caller-chosen payload.
 */
export type SyncDecision<Push, Pull, Skip> =
  | { type: 'push'; data: Push }
  | { type: 'pull'; data: Pull }
  | { type: 'skip'; reason: SkipReason; data: Skip };

/**
 * A secret as held by a remote store.
 */
export interface RemoteSecret {
  name: string;
  value: string;
  /** When the secret was last set, if the store knows */
  modified?: Date;
}

/**
 * Remote key/value storage for dotenv variables.
 */
export interface SecretStore {
  /** Human-readable location, used in messages */
  readonly location: string;
  /** Resolves undefined when the secret does not exist */
  getSecret(name: string): Promise<RemoteSecret | undefined>;
  setSecret(name: string, value: string): Promise<void>;
}

/**
 * A blob as held by a remote store.
 */
export interface RemoteBlob {
  name: string;
  content: Buffer;
  modified: Date;
}

/**
 * Remote storage for whole files.
 */
export interface BlobStore {
  readonly location: string;
  /** Resolves undefined when the blob does not exist */
  getBlob(name: string): Promise<RemoteBlob | undefined>;
  /** Stores `content`, recording `modified` as the blob's modification time */
  putBlob(name: string, content: Buffer, modified: Date): Promise<void>;
}

export interface SyncResult {
  pushed: number;
  pulled: number;
  skipped: number;
}

export function isSyncMode(value: string): value is SyncMode {
  return SYNC_MODES.some(mode => mode === value);
}

/**
 * Parse a sync mode from user input.
 */
export function parseSyncMode(value: string): SyncMode {
  if (!isSyncMode(value)) {
    throw new Error(`Invalid sync mode "${value}" (expected one of: ${SYNC_MODES.join(', ')})`);
  }
  return value;
}
