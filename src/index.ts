#!/usr/bin/env node
import { Command } from 'commander';
import { registerConfigCommands } from './commands/config.js';
import { registerDotenvCommand } from './commands/dotenv.js';
import { registerFileCommand } from './commands/file.js';

const program = new Command();
program
  .name('envsync')
  .description('Keep dotenv variables and configuration files in sync with remote stores')
  .version('0.1.0')
  .addHelpText('after', `
GETTING STARTED
  envsync config set secretsStore <path>     Where secrets are kept
  envsync config set blobsStore <dir>        Where files are kept

COMMON WORKFLOWS
  envsync dotenv --check-only                Report variables that are out of sync
  envsync dotenv                             Synchronize .env with the secrets store
  envsync file config.json                   Synchronize a file with the blob store

LEARN MORE
  envsync <command> --help                   Show help for a command`);

registerDotenvCommand(program);
registerFileCommand(program);
registerConfigCommands(program);

await program.parseAsync();
