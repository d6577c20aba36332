#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { createErrorHandler } from '../src/errors.js';
import { register as registerExtract } from '../src/commands/extract.js';

function loadCliVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
    if (
      typeof packageJson === 'object' && packageJson !== null &&
      'version' in packageJson && typeof packageJson.version === 'string' && packageJson.version.length > 0
    ) {
      return packageJson.version;
    }
  } catch {
    // Fall through to static default.
  }
  return '0.1.0';
}

program
  .name('extract-stats')
  .version(loadCliVersion())
  .description('Summarize time_only / time_with_barrier latencies from allreduce benchmark worker logs.');

registerExtract(program);

// Global error handler
const handleError = createErrorHandler(program);

// Parse and run
program.parseAsync(process.argv).catch(handleError);

process.on('uncaughtException', handleError);
process.on('unhandledRejection', handleError);
