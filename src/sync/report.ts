/**
 * Human-readable reporting of planned sync actions.
 */
import type { SyncDecision } from './types.js';

export interface ActionRecord extends Record<string, unknown> {
  action: 'push' | 'pull' | 'skip';
  name: string;
  reason?: string;
}

/**
 * Format one action as a report line.
 */
export function formatAction<Push, Pull, Skip>(
  action: SyncDecision<Push, Pull, Skip>,
  label: string,
): string {
  return formatRecord(toActionRecord(action, label));
}

export function formatRecord(record: ActionRecord): string {
  switch (record.action) {
    case 'push':
      return `<- PUSH: ${record.name}`;
    case 'pull':
      return `-> PULL: ${record.name}`;
    case 'skip':
      return `   SKIP: ${record.name} (${record.reason ?? 'skipped'})`;
  }
}

/**
 * Format a list of actions, one line each.
 */
export function formatActions<Push, Pull, Skip>(
  actions: ReadonlyArray<SyncDecision<Push, Pull, Skip>>,
  labelOf: (action: SyncDecision<Push, Pull, Skip>) => string,
): string {
  return actions.map(action => formatAction(action, labelOf(action))).join('\n');
}

/**
 * Flatten an action into a record for JSON output.
 */
export function toActionRecord<Push, Pull, Skip>(
  action: SyncDecision<Push, Pull, Skip>,
  label: string,
): ActionRecord {
  if (action.type === 'skip') {
    return { action: action.type, name: label, reason: action.reason };
  }
  return { action: action.type, name: label };
}

/**
 * True when every action is a skip, i.e. both sides are already in sync.
 */
export function isUpToDate<Push, Pull, Skip>(
  actions: ReadonlyArray<SyncDecision<Push, Pull, Skip>>,
): boolean {
  return actions.every(action => action.type === 'skip');
}

const ORDER = { push: 0, pull: 1, skip: 2 } as const;

/**
 * Sort actions: pushes, then pulls, then skips, each by label.
 */
export function sortActions<A extends SyncDecision<unknown, unknown, unknown>>(
  actions: A[],
  labelOf: (action: A) => string,
): A[] {
  return actions.sort((a, b) => ORDER[a.type] - ORDER[b.type] || compare(labelOf(a), labelOf(b)));
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
