import chalk from 'chalk';
import ora from 'ora';
import type { GlobalFlags } from './flags.js';

/**
 * Column definition for table output.
 */
export interface TableColumn {
  key: string;
  header: string;
  width?: number;
}

/**
 * Output helper that centralizes formatting for text, json, and table modes.
 * Status messages go to stderr so stdout stays clean for piping.
 */
export class Output {
  private spinner: ReturnType<typeof ora> | null = null;

  constructor(readonly flags: GlobalFlags) {}

  /**
   * Start a spinner (only shown in text mode, non-quiet, TTY).
   */
  startSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.text = message;
      return;
    }
    if (this.flags.output === 'text' && !this.flags.quiet && process.stderr.isTTY) {
      this.spinner = ora({ text: message, stream: process.stderr }).start();
    }
  }

  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  /**
   * Stop the spinner with a success message.
   */
  succeedSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else if (this.flags.output === 'text' && !this.flags.quiet) {
      process.stderr.write(chalk.green('✓') + ' ' + message + '\n');
    }
  }

  /**
   * Stop the spinner with a failure message.
   */
  failSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    } else {
      process.stderr.write(chalk.red('✖') + ' ' + message + '\n');
    }
  }

  /**
   * Print a status/info message to stderr (never captured by piping).
   */
  status(message: string): void {
    if (!this.flags.quiet) {
      process.stderr.write(message + '\n');
    }
  }

  debug(message: string): void {
    if (this.flags.verbose) {
      process.stderr.write(chalk.dim('[debug] ' + message) + '\n');
    }
  }

  error(message: string): void {
    process.stderr.write(chalk.red(message) + '\n');
  }

  warn(message: string): void {
    if (!this.flags.quiet) {
      process.stderr.write(chalk.yellow(message) + '\n');
    }
  }

  /**
   * Output a list of records based on the format.
   * - text: prints each item using textFn
   * - json: prints one JSON object per line (JSON Lines)
   * - table: prints an ASCII table
   */
  list<T extends Record<string, unknown>>(
    data: T[],
    options: {
      textFn: (item: T) => string;
      columns?: TableColumn[];
      emptyMessage?: string;
    },
  ): void {
    if (data.length === 0) {
      if (this.flags.output !== 'json' && options.emptyMessage) {
        this.status(options.emptyMessage);
      }
      return;
    }

    switch (this.flags.output) {
      case 'json':
        for (const item of data) {
          process.stdout.write(JSON.stringify(item) + '\n');
        }
        break;
      case 'table':
        this.table(data, options.columns);
        break;
      case 'text':
        for (const item of data) {
          process.stdout.write(options.textFn(item) + '\n');
        }
        break;
    }
  }

  /**
   * Print a success result. In json mode the data is written to stdout instead.
   */
  success(message: string, data?: Record<string, unknown>): void {
    if (this.flags.output === 'json' && data) {
      process.stdout.write(JSON.stringify(data) + '\n');
    } else if (!this.flags.quiet) {
      this.succeedSpinner(message);
    }
  }

  private table(data: Record<string, unknown>[], columns?: TableColumn[]): void {
    const cols: TableColumn[] = columns ?? Object.keys(data[0]).map(key => ({
      key,
      header: key.charAt(0).toUpperCase() + key.slice(1),
    }));

    const widths = cols.map(col => col.width ?? Math.max(
      col.header.length,
      ...data.map(row => String(row[col.key] ?? '').length),
    ));

    const line = (left: string, join: string, right: string): string =>
      left + widths.map(w => '─'.repeat(w + 2)).join(join) + right;
    const row = (cells: string[]): string =>
      '│' + cells.map((cell, i) => ' ' + cell.padEnd(widths[i]) + ' ').join('│') + '│';

    const lines = [
      line('┌', '┬', '┐'),
      row(cols.map(col => col.header)),
      line('├', '┼', '┤'),
      ...data.map(item => row(cols.map(col => String(item[col.key] ?? '')))),
      line('└', '┴', '┘'),
    ];
    process.stdout.write(lines.join('\n') + '\n');
  }
}

/**
 * Create an Output instance from global flags.
 */
export function createOutput(flags: GlobalFlags): Output {
  return new Output(flags);
}

/**
 * Standard error handler for commands.
 * Prints the error (and, when verbose, its causes) to stderr and sets the exit code.
 */
export function handleError(out: Output, err: unknown, spinnerMessage?: string): void {
  if (spinnerMessage) {
    out.failSpinner(spinnerMessage);
  }
  const message = err instanceof Error ? err.message : String(err);
  out.error(message);

  let cause = err instanceof Error ? err.cause : undefined;
  while (cause !== undefined) {
    out.debug(`caused by: ${cause instanceof Error ? cause.message : String(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  process.exitCode = 1;
}
