import { basename } from 'path';
import type { DebugLog } from './debug.js';
import { NoLogsFoundError, NoTimingsExtractedError } from './errors.js';
import { discoverWorkerLogs, extractTimings } from './logs.js';
import { extractRunParams } from './params.js';
import { computeStats } from './stats.js';
import type { Summary, TimingSamples } from './types.js';

export interface SummarizeOptions {
  log?: DebugLog;
}

/**
 * Pools the timing records of every worker log in `resultDir` (file name
 * order, then line order) and reduces each metric to summary statistics.
 *
 * Throws NoLogsFoundError when the directory holds no worker logs and
 * NoTimingsExtractedError when either metric ends up without samples.
 */
export function summarizeResultDir(resultDir: string, opts: SummarizeOptions = {}): Summary {
  const log = opts.log ?? (() => undefined);

  const logFiles = discoverWorkerLogs(resultDir);
  log(`Found ${logFiles.length} worker log(s) in ${resultDir}`);
  if (logFiles.length === 0) {
    throw new NoLogsFoundError(resultDir);
  }

  let pooled: TimingSamples = { timeOnly: [], timeWithBarrier: [] };
  for (const logFile of logFiles) {
    const samples = extractTimings(logFile);
    log(`  ${basename(logFile)}: ${samples.timeOnly.length} record(s)`);
    pooled = {
      timeOnly: pooled.timeOnly.concat(samples.timeOnly),
      timeWithBarrier: pooled.timeWithBarrier.concat(samples.timeWithBarrier),
    };
  }

  const timeOnly = computeStats(pooled.timeOnly);
  const timeWithBarrier = computeStats(pooled.timeWithBarrier);
  if (!timeOnly || !timeWithBarrier) {
    throw new NoTimingsExtractedError(resultDir);
  }
  log(`Pooled ${timeOnly.count} time_only and ${timeWithBarrier.count} time_with_barrier sample(s)`);

  return { ...extractRunParams(resultDir), timeOnly, timeWithBarrier };
}
