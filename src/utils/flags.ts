import { Option, type Command } from 'commander';
import chalk from 'chalk';

export const OUTPUT_FORMATS = ['text', 'json', 'table'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface GlobalFlags {
  output: OutputFormat;
  verbose: boolean;
  quiet: boolean;
  noColor: boolean;
  dryRun: boolean;
}

/**
 * Add universal flags to a command.
 * Call this on each leaf command (action command) to register the flags.
 */
export function addGlobalFlags(cmd: Command): Command {
  return cmd
    .addOption(new Option('-o, --output <format>', 'Output format (default: text on a TTY, json otherwise)').choices(OUTPUT_FORMATS))
    .option('-v, --verbose', 'Verbose output (debug info)')
    .option('-q, --quiet', 'Minimal output (errors only)')
    .option('--no-color', 'Disable colored output')
    .option('--dry-run', 'Show what would change without changing anything');
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Resolve global flags from parsed options, applying TTY detection defaults.
 */
export function resolveFlags(opts: Record<string, unknown>): GlobalFlags {
  const isTTY = process.stdout.isTTY ?? false;
  const noColor = opts.noColor === true || opts.color === false;

  const output: OutputFormat = isOutputFormat(opts.output) ? opts.output : isTTY ? 'text' : 'json';

  if (noColor) {
    chalk.level = 0;
  }

  return {
    output,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    noColor,
    dryRun: opts.dryRun === true,
  };
}

/**
 * Read a string-valued option, ignoring negated (`--no-*`) and missing values.
 */
export function stringOption(opts: Record<string, unknown>, key: string): string | undefined {
  const value = opts[key];
  return typeof value === 'string' ? value : undefined;
}
