import chalk from 'chalk';
import Table from 'cli-table3';
import { appendFileSync, existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { SampleStats, Summary } from './types.js';

export type OutputFormat = 'csv' | 'json' | 'table';

export const SUMMARY_COLUMNS = [
  'node_count',
  'msgsize',
  'time_only_min',
  'time_only_max',
  'time_only_avg',
  'time_only_stddev',
  'time_with_barrier_min',
  'time_with_barrier_max',
  'time_with_barrier_avg',
  'time_with_barrier_stddev',
] as const;

export function detectFormat(opts: { json?: boolean; table?: boolean }): OutputFormat {
  if (opts.json) return 'json';
  if (opts.table) return 'table';
  return 'csv';
}

/**
 * Fixed-point with one decimal. Exact ties (x.x5 held exactly in binary,
 * e.g. 0.25) round to even, and -0 keeps its sign.
 */
export function formatFixed(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (Object.is(value, -0)) return '-0.0';
  if (Math.abs(value) >= 1e21) return `${BigInt(value)}.0`;

  if (Number.isInteger(value * 4) && !Number.isInteger(value * 2)) {
    const floor = Math.floor(value * 10);
    const even = floor % 2 === 0 ? floor : floor + 1;
    return (even / 10).toFixed(1);
  }
  return value.toFixed(1);
}

/** JSON has no literal for inf/nan; spell them the way the CSV row does instead of letting them become null. */
function jsonNumber(_key: string, value: unknown): unknown {
  return typeof value === 'number' && !Number.isFinite(value) ? formatFixed(value) : value;
}

export function formatSummaryJson(summary: Summary): string {
  return JSON.stringify(summary, jsonNumber, 2);
}

function statFields(stats: SampleStats): string[] {
  return [stats.min, stats.max, stats.avg, stats.stddev].map(formatFixed);
}

export function summaryFields(summary: Summary, unsetToken = ''): string[] {
  return [
    summary.nodeCount === null ? unsetToken : String(summary.nodeCount),
    summary.msgsize === null ? unsetToken : String(summary.msgsize),
    ...statFields(summary.timeOnly),
    ...statFields(summary.timeWithBarrier),
  ];
}

export function formatSummaryRow(summary: Summary, unsetToken = ''): string {
  return summaryFields(summary, unsetToken).join(',');
}

export function formatSummaryHeader(): string {
  return SUMMARY_COLUMNS.join(',');
}

export function outputSummary(summary: Summary, opts: {
  format: OutputFormat;
  header?: boolean;
  unsetToken?: string;
}): void {
  if (opts.format === 'json') {
    console.log(formatSummaryJson(summary));
    return;
  }

  if (opts.format === 'table') {
    const fields = summaryFields(summary, opts.unsetToken);
    const table = new Table({ style: { head: [], border: [] } });
    SUMMARY_COLUMNS.forEach((column, i) => {
      table.push({ [chalk.cyan(column)]: fields[i] });
    });
    console.log(table.toString());
    return;
  }

  if (opts.header) console.log(formatSummaryHeader());
  console.log(formatSummaryRow(summary, opts.unsetToken));
}

/** Appends `row` to a summary CSV, starting the file with the header row when it does not exist. */
export function appendSummaryRow(csvFile: string, row: string): void {
  if (!existsSync(csvFile)) {
    mkdirSync(dirname(csvFile), { recursive: true });
    writeFileSync(csvFile, `${formatSummaryHeader()}\n`);
  }
  appendFileSync(csvFile, `${row}\n`);
}
