import { Command } from 'commander';
import { resolveSettings } from '../config.js';
import { createDebugLog } from '../debug.js';
import { UsageError } from '../errors.js';
import { appendSummaryRow, detectFormat, formatSummaryRow, outputSummary, type OutputFormat } from '../output.js';
import { summarizeResultDir } from '../summary.js';

type ExtractOptions = {
  json?: boolean;
  table?: boolean;
  header?: boolean;
  append?: string;
  unset?: string;
  debug?: boolean;
};

export function register(program: Command): void {
  program
    .argument('[result-dir]', 'Benchmark result directory holding worker_*.log files')
    .option('--json', 'Print the summary as JSON')
    .option('--table', 'Print the summary as a table')
    .option('--header', 'Print the CSV header before the row')
    .option('--append <file>', 'Also append the CSV row to a summary file')
    .option('--unset <token>', 'Text printed for a node count or message size missing from the path')
    .option('--debug', 'Print discovery and extraction details to stderr')
    .action(function (this: Command, resultDir: string | undefined) {
      const opts = this.opts<ExtractOptions>();
      if (resultDir === undefined) {
        throw new UsageError(this.helpInformation());
      }

      const settings = resolveSettings(opts);
      const log = createDebugLog(settings.debug);
      const format: OutputFormat = detectFormat(opts);

      const summary = summarizeResultDir(resultDir, { log });
      outputSummary(summary, { format, header: opts.header, unsetToken: settings.unsetToken });

      if (opts.append) {
        appendSummaryRow(opts.append, formatSummaryRow(summary, settings.unsetToken));
        log(`Appended row to ${opts.append}`);
      }
    });
}
