/**
 * Push/pull/skip policy for one synchronized unit.
 */
import type { SkipReason, SyncDecision, SyncMode } from './types.js';

/** Timestamps closer than this are considered the same revision. */
export const DEFAULT_TOLERANCE_MS = 60_000;

export interface DecideOptions<T, Push, Pull, Skip> {
  mode: SyncMode;
  localModified: Date | undefined;
  remoteModified: Date | undefined;
  /** Passed to whichever builder is invoked */
  seed: T;
  /** Builds the push payload from the local timestamp */
  push(modified: Date, seed: T): Push;
  /** Builds the pull payload from the timestamp being pulled */
  pull(modified: Date, seed: T): Pull;
  skip(seed: T): Skip;
  toleranceMs?: number;
}

/**
 * Decide whether to push, pull or skip based on when each side was last modified.
 *
 * The `-always` modes never skip because both sides look the same age; they
 * transfer in their direction whenever there is something to transfer.
 */
export function decide<T, Push, Pull, Skip>(
  options: DecideOptions<T, Push, Pull, Skip>,
): SyncDecision<Push, Pull, Skip> {
  const { mode, localModified: local, remoteModified: remote, seed } = options;
  const tolerance = options.toleranceMs ?? DEFAULT_TOLERANCE_MS;

  const push = (modified: Date): SyncDecision<Push, Pull, Skip> => ({
    type: 'push',
    data: options.push(modified, seed),
  });
  const pull = (modified: Date): SyncDecision<Push, Pull, Skip> => ({
    type: 'pull',
    data: options.pull(modified, seed),
  });
  const skip = (reason: SkipReason): SyncDecision<Push, Pull, Skip> => ({
    type: 'skip',
    reason,
    data: options.skip(seed),
  });

  if (local && remote) {
    const delta = local.getTime() - remote.getTime();

    if (Math.abs(delta) < tolerance) {
      switch (mode) {
        case 'push-always':
          return push(local);
        case 'pull-always':
          return pull(local);
        default:
          return skip('unchanged');
      }
    }

    if (delta > 0) {
      // Local is newer
      switch (mode) {
        case 'pull':
          return skip('pull disabled');
        case 'pull-always':
          return pull(remote);
        default:
          return push(local);
      }
    }

    // Remote is newer
    switch (mode) {
      case 'push':
        return skip('push disabled');
      case 'push-always':
        return push(local);
      default:
        return pull(remote);
    }
  }

  if (local) {
    switch (mode) {
      case 'pull':
        return skip('pull disabled');
      case 'pull-always':
        return skip('nothing to pull');
      default:
        return push(local);
    }
  }

  if (remote) {
    switch (mode) {
      case 'push':
        return skip('push disabled');
      case 'push-always':
        return skip('nothing to push');
      default:
        return pull(remote);
    }
  }

  return skip('not found');
}
