/**
 * Synchronizes the variables of a dotenv file with a secret store.
 */
import { DotenvDocument, writeDotenvFile } from '../dotenv/index.js';
import { decide } from './decide.js';
import { asTransportError, TimeError } from './errors.js';
import { sortActions } from './report.js';
import type { RemoteSecret, SecretStore, SyncDecision, SyncMode, SyncResult } from './types.js';

export interface VarTarget {
  name: string;
}

export interface PushVar {
  name: string;
  value: string;
}

export interface PullVar {
  name: string;
  value: string;
  modified: Date;
}

export type VarAction = SyncDecision<PushVar, PullVar, VarTarget>;

export interface DotenvSyncPlanOptions {
  /** The local dotenv file, if it exists */
  document: DotenvDocument | undefined;
  /** When given, only its variable names are synchronized */
  template?: DotenvDocument;
  store: SecretStore;
  mode: SyncMode;
  toleranceMs?: number;
}

/**
 * The variable names a sync covers: the template's if there is one,
 * otherwise the dotenv file's own.
 */
export function variablesToSync(
  document: DotenvDocument | undefined,
  template: DotenvDocument | undefined,
): string[] {
  const source = template ?? document;
  if (!source) {
    throw new Error('Cannot synchronize without a dotenv or dotenv template file');
  }
  return source.names;
}

/**
 * Read the named secrets concurrently.
 * Missing secrets are left out of the result.
 */
export async function fetchRemoteSecrets(
  store: SecretStore,
  names: readonly string[],
): Promise<Map<string, RemoteSecret>> {
  const secrets = await Promise.all(
    names.map(async name => {
      try {
        return await store.getSecret(name);
      } catch (err) {
        throw asTransportError(name, 'read secret', err);
      }
    }),
  );

  const remote = new Map<string, RemoteSecret>();
  secrets.forEach((secret, i) => {
    if (secret) {
      remote.set(names[i], secret);
    }
  });
  return remote;
}

/**
 * Work out what to do with each variable. Nothing is changed.
 */
export async function planDotenvSync(options: DotenvSyncPlanOptions): Promise<VarAction[]> {
  const { document, template, store, mode, toleranceMs } = options;
  const names = variablesToSync(document, template);

  // push-always overwrites regardless, so the remote side is never read
  const remote = mode === 'push-always'
    ? new Map<string, RemoteSecret>()
    : await fetchRemoteSecrets(store, names);

  const actions = names.map((name): VarAction => {
    const localValue = document?.get(name);
    const secret = remote.get(name);

    if (localValue !== undefined && secret && localValue === secret.value) {
      return { type: 'skip', reason: 'unchanged', data: { name } };
    }

    if (secret && !secret.modified) {
      throw new TimeError(name, `Unable to determine when secret ${name} was modified`);
    }

    const localModified = localValue === undefined
      ? undefined
      : document?.lastModified ?? new Date(0);

    return decide({
      mode,
      localModified,
      remoteModified: secret?.modified,
      seed: name,
      toleranceMs,
      push: (_modified, varName) => ({ name: varName, value: localValue ?? '' }),
      pull: (modified, varName) => ({ name: varName, value: secret?.value ?? '', modified }),
      skip: varName => ({ name: varName }),
    });
  });

  return sortActions(actions, action => action.data.name);
}

export interface DotenvSyncExecuteOptions {
  /** Where the dotenv file is written */
  path: string;
  document: DotenvDocument | undefined;
  actions: readonly VarAction[];
  store: SecretStore;
}

/**
 * Apply a plan: pushes go to the store, pulls are written to the dotenv
 * file in a single write once all of them are known.
 *
 * Transfers run concurrently. The first failure rejects; transfers that
 * already completed are not undone.
 */
export async function executeDotenvSync(options: DotenvSyncExecuteOptions): Promise<SyncResult> {
  const { path, document, actions, store } = options;
  const pulls = new Map<string, string>();
  const pushes: PushVar[] = [];
  let newestPull: Date | undefined;
  let skipped = 0;

  for (const action of actions) {
    switch (action.type) {
      case 'push':
        pushes.push(action.data);
        break;
      case 'pull':
        pulls.set(action.data.name, action.data.value);
        if (!newestPull || action.data.modified > newestPull) {
          newestPull = action.data.modified;
        }
        break;
      case 'skip':
        skipped++;
        break;
    }
  }

  const writeLocal = async (): Promise<void> => {
    if (pulls.size === 0) return;
    const base = document ?? DotenvDocument.empty();
    writeDotenvFile(path, base.replace(pulls), newer(base.lastModified, newestPull));
  };

  await Promise.all([
    ...pushes.map(async ({ name, value }) => {
      try {
        await store.setSecret(name, value);
      } catch (err) {
        throw asTransportError(name, 'write secret', err);
      }
    }),
    writeLocal(),
  ]);

  return { pushed: pushes.length, pulled: pulls.size, skipped };
}

function newer(a: Date | undefined, b: Date | undefined): Date | undefined {
  if (!a) return b;
  if (!b) return a;
  return a > b ? a : b;
}
