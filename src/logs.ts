import { readFileSync } from 'fs';
import { join } from 'path';
import { globSync } from 'glob';
import type { TimingSamples } from './types.js';

export const WORKER_LOG_PATTERN = 'worker_*.log';

const TIMING_RECORD = /time_only:([0-9.e+-]+);time_with_barrier:([0-9.e+-]+);/;
const NUMERIC_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/;

export interface TimingRecord {
  timeOnly: number;
  timeWithBarrier: number;
}

/** Worker logs directly inside `resultDir` (the working directory when empty), sorted by file name. */
export function discoverWorkerLogs(resultDir: string): string[] {
  const names = globSync(WORKER_LOG_PATTERN, { cwd: resultDir || '.', nodir: true });
  return names.sort().map((name) => join(resultDir, name));
}

export function parseTimingValue(token: string): number | null {
  if (!NUMERIC_LITERAL.test(token)) return null;
  return Number(token);
}

/**
 * Pulls one `time_only:X;time_with_barrier:Y;` record out of a log line.
 * Returns null unless both values parse.
 */
export function parseTimingLine(line: string): TimingRecord | null {
  const text = line.trim();
  if (!text.includes('time_only:') || !text.includes('time_with_barrier:')) return null;

  const match = TIMING_RECORD.exec(text);
  if (!match) return null;

  const timeOnly = parseTimingValue(match[1]);
  const timeWithBarrier = parseTimingValue(match[2]);
  if (timeOnly === null || timeWithBarrier === null) return null;

  return { timeOnly, timeWithBarrier };
}

function readLogText(logFile: string): string {
  try {
    return readFileSync(logFile, 'utf-8');
  } catch (err) {
    // A worker may not have written its log yet.
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return '';
    throw err;
  }
}

export function extractTimings(logFile: string): TimingSamples {
  const samples: TimingSamples = { timeOnly: [], timeWithBarrier: [] };

  for (const line of readLogText(logFile).split(/\r\n|\r|\n/)) {
    const record = parseTimingLine(line);
    if (!record) continue;
    samples.timeOnly.push(record.timeOnly);
    samples.timeWithBarrier.push(record.timeWithBarrier);
  }

  return samples;
}
