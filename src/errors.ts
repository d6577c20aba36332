import chalk from 'chalk';
import type { Command } from 'commander';
import { resolveSettings } from './config.js';

export type OutputStream = 'stdout' | 'stderr';

export class ExtractStatsError extends Error {
  constructor(
    public type: string,
    message: string,
    public stream: OutputStream = 'stderr'
  ) {
    super(message);
  }

  display(): string {
    return chalk.red(this.message);
  }

  get exitCode(): number { return 1; }
}

export class UsageError extends ExtractStatsError {
  constructor(public usage: string) {
    super('usage_error', 'Missing result directory', 'stdout');
  }

  display(): string {
    return this.usage.trimEnd();
  }
}

export class NoLogsFoundError extends ExtractStatsError {
  constructor(public resultDir: string) {
    super('no_logs_found', 'No worker logs found');
  }
}

export class NoTimingsExtractedError extends ExtractStatsError {
  constructor(public resultDir: string) {
    super('no_timings_extracted', 'No timings extracted');
  }
}

export interface ErrorReportOptions {
  json?: boolean;
  debug?: boolean;
}

/** Prints `err` the way the CLI reports failures and returns the exit code to use. */
export function reportError(err: unknown, opts: ErrorReportOptions = {}): number {
  if (err instanceof ExtractStatsError) {
    const write = err.stream === 'stdout' ? console.log : console.error;
    if (opts.json && !(err instanceof UsageError)) {
      write(JSON.stringify({ error: true, type: err.type, message: err.message }));
    } else {
      write(err.display());
    }
    return err.exitCode;
  }

  if (err instanceof Error) {
    if (opts.json) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: err.message }));
    } else {
      console.error(chalk.red(`Error: ${err.message}`));
      if (opts.debug) {
        console.error(err.stack);
      }
    }
  } else if (opts.json) {
    console.error(JSON.stringify({ error: true, type: 'unknown_error', message: 'An unexpected error occurred' }));
  } else {
    console.error(chalk.red('An unexpected error occurred'));
  }
  return 1;
}

/**
 * Global handler for the bin: reports `err` using the program's parsed
 * `--json`/`--debug` flags and ends the process with the matching exit code.
 */
export function createErrorHandler(
  program: Command,
  exit: (code: number) => never = (code) => process.exit(code)
): (err: unknown) => never {
  return (err) => {
    const opts = program.opts<{ json?: boolean; debug?: boolean }>();
    const settings = resolveSettings({ debug: opts.debug });
    return exit(reportError(err, { json: opts.json, debug: settings.debug }));
  };
}
