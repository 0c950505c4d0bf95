import path from 'node:path';
import type { Command } from 'commander';
import { loadConfig, toleranceMs } from '../config.js';
import { loadDotenvFile } from '../dotenv/index.js';
import { JsonSecretStore } from '../stores/json-secret-store.js';
import { executeDotenvSync, planDotenvSync } from '../sync/dotenv-sync.js';
import { resolveEnvReference } from '../sync/env-ref.js';
import { parseSyncMode } from '../sync/types.js';
import { addGlobalFlags, resolveFlags, stringOption } from '../utils/flags.js';
import { createOutput, handleError } from '../utils/output.js';
import { addSyncOptions, confirmActions, syncOptions } from './confirm-actions.js';

export function registerDotenvCommand(program: Command): void {
  addGlobalFlags(addSyncOptions(program.command('dotenv')
    .description('Synchronize the variables of a dotenv file with a secrets store')
    .option('-e, --env-file <path>', 'Dotenv file to synchronize (default: .env)')
    .option('-t, --template-file <path>', 'Template listing the variables to synchronize (default: .env.example)')
    .option('--no-template', 'Ignore the template and synchronize every variable in the dotenv file')
    .option('--secrets <location>', 'Secrets file, or env:NAME to read its location from a variable')
    .addHelpText('after', `
SYNC MODES
  sync          Push if the local value is newer, pull if the remote one is
  push          Only push, and only newer values
  pull          Only pull, and only newer values
  push-always   Push every local value, overwriting the remote one
  pull-always   Pull every remote value, overwriting the local one

EXAMPLES
  envsync dotenv --check-only
  envsync dotenv -m pull --secrets ./secrets.json
  envsync dotenv --no-template -y`)))
    .action(async (opts: Record<string, unknown>) => {
      const flags = resolveFlags(opts);
      const out = createOutput(flags);
      try {
        const config = loadConfig();
        const envFile = stringOption(opts, 'envFile') ?? config.envFile;
        const templateFile = stringOption(opts, 'templateFile') ?? config.templateFile;
        const mode = parseSyncMode(stringOption(opts, 'syncMode') ?? 'sync');

        const document = loadDotenvFile(envFile);
        const template = opts.template === false ? undefined : loadDotenvFile(templateFile);
        out.debug(`Dotenv file: ${path.resolve(envFile)}${document ? '' : ' (not found)'}`);
        if (template) {
          out.debug(`Template: ${path.resolve(templateFile)} (${template.names.length} variables)`);
        }

        const location = resolveEnvReference(stringOption(opts, 'secrets') ?? config.secretsStore, document);
        const store = new JsonSecretStore(location);
        out.debug(`Secrets store: ${store.location}`);

        out.startSpinner('Reading secrets...');
        const actions = await planDotenvSync({
          document,
          template,
          store,
          mode,
          toleranceMs: toleranceMs(config),
        });
        out.stopSpinner();

        if (!(await confirmActions(out, actions, action => action.data.name, syncOptions(opts)))) {
          return;
        }

        out.startSpinner('Synchronizing...');
        const result = await executeDotenvSync({ path: envFile, document, actions, store });
        out.success(
          `Synchronized ${envFile}: ${result.pushed} pushed, ${result.pulled} pulled`,
          { ...result },
        );
      } catch (err) {
        handleError(out, err, 'Failed to synchronize dotenv file');
      }
    });
}
