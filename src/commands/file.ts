import type { Command } from 'commander';
import { loadConfig, toleranceMs } from '../config.js';
import { loadDotenvFile } from '../dotenv/index.js';
import { DirectoryBlobStore } from '../stores/directory-blob-store.js';
import { resolveEnvReference } from '../sync/env-ref.js';
import {
  DEFAULT_BLOB_NAME,
  executeFileSync,
  fileActionLabel,
  planFileSync,
  resolveFileTargets,
} from '../sync/file-sync.js';
import { parseSyncMode } from '../sync/types.js';
import { addGlobalFlags, resolveFlags, stringOption } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';
import { addSyncOptions, confirmActions, syncOptions } from './confirm-actions.js';

export function registerFileCommand(program: Command): void {
  addGlobalFlags(addSyncOptions(program.command('file')
    .description('Synchronize files with a blob store')
    .argument('<paths...>', 'Files to synchronize (name files that do not exist yet literally)')
    .option('--blob-name <template>', 'Remote blob name; #name#, #stem# and #ext# are replaced per file', DEFAULT_BLOB_NAME)
    .option('--blobs <location>', 'Blob directory, or env:NAME to read its location from a variable')
    .option('-e, --env-file <path>', 'Dotenv file used to resolve env:NAME values (default: .env)')
    .option('--no-env-file', 'Only resolve env:NAME values from the process environment')
    .addHelpText('after', `
EXAMPLES
  envsync file config.json --blobs ./remote
  envsync file settings.json --blob-name 'dev/#stem#.#ext#' -m pull
  envsync file *.json --check-only`)))
    .action(async (paths: string[], opts: Record<string, unknown>) => {
      const flags = resolveFlags(opts);
      const out = createOutput(flags);
      try {
        const config = loadConfig();
        const mode = parseSyncMode(stringOption(opts, 'syncMode') ?? 'sync');
        const document = opts.envFile === false
          ? undefined
          : loadDotenvFile(stringOption(opts, 'envFile') ?? config.envFile);

        const targets = resolveFileTargets(paths, stringOption(opts, 'blobName') ?? DEFAULT_BLOB_NAME);
        const location = resolveEnvReference(stringOption(opts, 'blobs') ?? config.blobsStore, document);
        const store = new DirectoryBlobStore(location);
        out.debug(`Blob store: ${store.location}`);
        for (const target of targets) {
          out.debug(`${target.blobName} <-> ${target.localPath}`);
        }

        out.startSpinner('Reading blobs...');
        const actions = await planFileSync({ targets, store, mode, toleranceMs: toleranceMs(config) });
        out.stopSpinner();

        if (!(await confirmActions(out, actions, fileActionLabel, syncOptions(opts)))) {
          return;
        }

        out.startSpinner('Synchronizing...');
        const result = await executeFileSync(actions, store);
        out.success(
          `Synchronized ${targets.length} file(s): ${result.pushed} pushed, ${result.pulled} pulled`,
          { ...result },
        );
      } catch (err) {
        handleError(out, err, 'Failed to synchronize files');
      }
    });
}
