/**
 * Synchronizes whole files with a blob store.
 */
import fs from 'node:fs';
import path from 'node:path';
import { decide } from './decide.js';
import { asTransportError } from './errors.js';
import { sortActions } from './report.js';
import type { BlobStore, RemoteBlob, SyncDecision, SyncMode, SyncResult } from './types.js';
import { atomicWriteFileSync } from '../utils/fs.js';

export const DEFAULT_BLOB_NAME = '#name#';

export interface FileTarget {
  /** Absolute path of the local file */
  localPath: string;
  blobName: string;
}

export interface PushFile {
  target: FileTarget;
  content: Buffer;
  /** Recorded as the blob's modification time */
  modified: Date;
}

export interface PullFile {
  target: FileTarget;
  content: Buffer;
  /** Stamped on the local file */
  modified: Date;
}

export type FileAction = SyncDecision<PushFile, PullFile, FileTarget>;

/**
 * Format a blob name from a template.
 *
 * Text between pairs of `#` is a placeholder: `#name#` is the file name,
 * `#stem#` the name without its extension and `#ext#` the extension.
 */
export function formatBlobName(template: string, localPath: string): string {
  const parts = template.split('#');
  if (parts.length % 2 === 0) {
    throw new Error('Blob name is malformed (invalid number of #s)');
  }

  const name = path.basename(localPath);
  const ext = path.extname(name);

  return parts
    .map((part, i) => {
      if (i % 2 === 0) return part;
      switch (part) {
        case 'name':
          return name;
        case 'stem':
          return path.basename(name, ext);
        case 'ext':
          if (!ext) {
            throw new Error(`No file extension: ${localPath}`);
          }
          return ext.slice(1);
        default:
          throw new Error(`Invalid placeholder: ${JSON.stringify(part)}`);
      }
    })
    .join('');
}

/**
 * Turn the given paths into sync targets.
 *
 * The same file given twice is synced once. Two files that would share a
 * blob name are an error.
 */
export function resolveFileTargets(
  paths: readonly string[],
  template: string = DEFAULT_BLOB_NAME,
): FileTarget[] {
  const unique = new Set(paths.map(p => canonicalPath(p)));
  const targets: FileTarget[] = [];
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const localPath of unique) {
    const blobName = formatBlobName(template, localPath);
    if (seen.has(blobName)) {
      duplicates.add(blobName);
    } else {
      seen.add(blobName);
      targets.push({ localPath, blobName });
    }
  }

  if (duplicates.size > 0) {
    throw new Error(`Duplicate blob names: ${[...duplicates].join(', ')}`);
  }
  return targets;
}

function canonicalPath(filePath: string): string {
  // Files that don't exist yet can't be resolved through symlinks
  return fs.existsSync(filePath) ? fs.realpathSync(filePath) : path.resolve(filePath);
}

export interface FileSyncPlanOptions {
  targets: readonly FileTarget[];
  store: BlobStore;
  mode: SyncMode;
  toleranceMs?: number;
}

/**
 * Work out what to do with each file. Nothing is changed.
 */
export async function planFileSync(options: FileSyncPlanOptions): Promise<FileAction[]> {
  const { targets, store, mode, toleranceMs } = options;
  const actions = await Promise.all(
    targets.map(target => planFile(target, store, mode, toleranceMs)),
  );
  return sortActions(actions, fileActionLabel);
}

/**
 * The blob name an action concerns.
 */
export function fileActionLabel(action: FileAction): string {
  return action.type === 'skip' ? action.data.blobName : action.data.target.blobName;
}

async function planFile(
  target: FileTarget,
  store: BlobStore,
  mode: SyncMode,
  toleranceMs: number | undefined,
): Promise<FileAction> {
  const local = readLocal(target.localPath);
  const remote = mode === 'push-always' ? undefined : await readRemote(store, target.blobName);

  if (local && remote && local.content.equals(remote.content)) {
    return { type: 'skip', reason: 'unchanged', data: target };
  }

  return decide({
    mode,
    localModified: local?.modified,
    remoteModified: remote?.modified,
    seed: target,
    toleranceMs,
    push: (modified, seed) => ({ target: seed, content: local?.content ?? Buffer.alloc(0), modified }),
    pull: (modified, seed) => ({ target: seed, content: remote?.content ?? Buffer.alloc(0), modified }),
    skip: seed => seed,
  });
}

function readLocal(localPath: string): { content: Buffer; modified: Date } | undefined {
  if (!fs.existsSync(localPath)) {
    return undefined;
  }
  const stat = fs.statSync(localPath);
  if (!stat.isFile()) {
    throw new Error(`Not a file: ${localPath}`);
  }
  return { content: fs.readFileSync(localPath), modified: stat.mtime };
}

async function readRemote(store: BlobStore, blobName: string): Promise<RemoteBlob | undefined> {
  try {
    return await store.getBlob(blobName);
  } catch (err) {
    throw asTransportError(blobName, 'read blob', err);
  }
}

/**
 * Apply a plan. Transfers run concurrently; the first failure rejects and
 * completed transfers are kept.
 */
export async function executeFileSync(
  actions: readonly FileAction[],
  store: BlobStore,
): Promise<SyncResult> {
  const result: SyncResult = { pushed: 0, pulled: 0, skipped: 0 };

  await Promise.all(actions.map(async action => {
    switch (action.type) {
      case 'push': {
        const { target, content, modified } = action.data;
        try {
          await store.putBlob(target.blobName, content, modified);
        } catch (err) {
          throw asTransportError(target.blobName, 'upload blob', err);
        }
        result.pushed++;
        break;
      }
      case 'pull': {
        const { target, content, modified } = action.data;
        try {
          atomicWriteFileSync(target.localPath, content, modified);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          throw new Error(`Failed to write ${target.localPath}: ${message}`, { cause: err });
        }
        result.pulled++;
        break;
      }
      case 'skip':
        result.skipped++;
        break;
    }
  }));

  return result;
}
