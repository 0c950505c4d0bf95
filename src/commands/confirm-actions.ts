import { Option, type Command } from 'commander';
import chalk from 'chalk';
import { confirm } from '../lib/prompt.js';
import { formatRecord, isUpToDate, toActionRecord } from '../sync/report.js';
import { SYNC_MODES, type SyncDecision } from '../sync/types.js';
import type { Output } from '../utils/output.js';

/**
 * Options shared by every command that synchronizes something.
 */
export function addSyncOptions(cmd: Command): Command {
  return cmd
    .addOption(new Option('-m, --sync-mode <mode>', 'How to synchronize').choices(SYNC_MODES).default('sync'))
    .option('-c, --check-only', 'Only report what is out of sync (exit code 1 if anything is)')
    .option('-y, --yes', 'Do not ask for confirmation before making changes');
}

export interface ConfirmOptions {
  /** Report only; never change anything */
  checkOnly: boolean;
  /** Skip the confirmation prompt */
  yes: boolean;
}

/**
 * Print the planned actions and decide whether to carry them out.
 *
 * Returns false when there is nothing to do, when only checking (setting
 * exit code 1 if anything is out of sync), or when the user declines.
 */
export async function confirmActions<A extends SyncDecision<unknown, unknown, unknown>>(
  out: Output,
  actions: A[],
  labelOf: (action: A) => string,
  options: ConfirmOptions,
): Promise<boolean> {
  if (out.flags.output === 'text') {
    out.status(chalk.bold('Actions:'));
  }
  out.list(actions.map(action => toActionRecord(action, labelOf(action))), {
    textFn: formatRecord,
    columns: [
      { key: 'action', header: 'Action' },
      { key: 'name', header: 'Name' },
      { key: 'reason', header: 'Reason' },
    ],
    emptyMessage: 'Nothing to synchronize.',
  });

  if (isUpToDate(actions)) {
    out.succeedSpinner('Everything is up to date');
    return false;
  }

  if (options.checkOnly || out.flags.dryRun) {
    out.warn('Out of sync. No changes were made.');
    process.exitCode = 1;
    return false;
  }

  if (!options.yes) {
    out.status('');
    if (!(await confirm())) {
      out.warn('Aborted');
      process.exitCode = 1;
      return false;
    }
  }

  return true;
}

export function syncOptions(opts: Record<string, unknown>): ConfirmOptions {
  return {
    checkOnly: opts.checkOnly === true,
    yes: opts.yes === true,
  };
}
