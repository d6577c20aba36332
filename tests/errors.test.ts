import assert from 'node:assert/strict';
import test from 'node:test';
import chalk from 'chalk';
import { register as registerExtract } from '../src/commands/extract.ts';
import {
  createErrorHandler,
  NoLogsFoundError,
  NoTimingsExtractedError,
  reportError,
  UsageError,
} from '../src/errors.ts';
import { captureConsole, createProgram, createTempTree, runCli } from './cli-test-helpers.ts';

class ExitCalled extends Error {
  constructor(public code: number) {
    super(`exit ${code}`);
  }
}

function recordExit(code: number): never {
  throw new ExitCalled(code);
}

function exitCodeOf(fn: () => void): number {
  try {
    fn();
  } catch (err) {
    if (err instanceof ExitCalled) return err.code;
    throw err;
  }
  throw new Error('exit was not called');
}

chalk.level = 0;

test('reportError prints missing logs to stderr', () => {
  const { stdout, stderr, result } = captureConsole(() => reportError(new NoLogsFoundError('/runs/empty')));
  assert.equal(result, 1);
  assert.deepEqual(stdout, []);
  assert.deepEqual(stderr, ['No worker logs found']);
});

test('reportError prints missing timings to stderr', () => {
  const { stderr, result } = captureConsole(() => reportError(new NoTimingsExtractedError('/runs/bad')));
  assert.equal(result, 1);
  assert.deepEqual(stderr, ['No timings extracted']);
});

test('reportError prints usage to stdout', () => {
  const usage = 'Usage: extract-stats [options] [result-dir]\n';
  const { stdout, stderr, result } = captureConsole(() => reportError(new UsageError(usage), { json: true }));
  assert.equal(result, 1);
  assert.deepEqual(stdout, ['Usage: extract-stats [options] [result-dir]']);
  assert.deepEqual(stderr, []);
});

test('reportError emits a JSON error object in json mode', () => {
  const { stderr } = captureConsole(() => reportError(new NoLogsFoundError('/runs/empty'), { json: true }));
  assert.deepEqual(stderr, ['{"error":true,"type":"no_logs_found","message":"No worker logs found"}']);
});

test('reportError reports unexpected errors with exit code 1', () => {
  const err = new Error('EACCES: permission denied');
  const plain = captureConsole(() => reportError(err));
  assert.equal(plain.result, 1);
  assert.deepEqual(plain.stderr, ['Error: EACCES: permission denied']);

  const debug = captureConsole(() => reportError(err, { debug: true }));
  assert.deepEqual(debug.stderr, ['Error: EACCES: permission denied', String(err.stack)]);
});

test('reportError handles thrown non-errors', () => {
  const { stderr, result } = captureConsole(() => reportError('boom'));
  assert.equal(result, 1);
  assert.deepEqual(stderr, ['An unexpected error occurred']);
});

test('error handler exits 1 after printing a failed run to stderr', async (t) => {
  const tree = createTempTree();
  t.after(() => tree.cleanup());
  const dir = tree.resultDir('node_4/msgsize_16MiB');
  const program = createProgram([registerExtract]);
  const run = await runCli(program, [dir]);
  const handleError = createErrorHandler(program, recordExit);

  const { stdout, stderr, result } = captureConsole(() => exitCodeOf(() => handleError(run.error)));

  assert.equal(result, 1);
  assert.deepEqual(stdout, []);
  assert.deepEqual(stderr, ['No worker logs found']);
});

test('error handler follows the parsed --json flag', async (t) => {
  const tree = createTempTree();
  t.after(() => tree.cleanup());
  const dir = tree.resultDir('node_4/msgsize_16MiB', { 'worker_0.log': 'nothing\n' });
  const program = createProgram([registerExtract]);
  const run = await runCli(program, ['--json', dir]);
  const handleError = createErrorHandler(program, recordExit);

  const { stderr, result } = captureConsole(() => exitCodeOf(() => handleError(run.error)));

  assert.equal(result, 1);
  assert.deepEqual(stderr, ['{"error":true,"type":"no_timings_extracted","message":"No timings extracted"}']);
});

test('error handler prints usage to stdout and exits 1 when the directory is missing', async () => {
  const program = createProgram([registerExtract]);
  const run = await runCli(program, []);
  const handleError = createErrorHandler(program, recordExit);

  const { stdout, stderr, result } = captureConsole(() => exitCodeOf(() => handleError(run.error)));

  assert.equal(result, 1);
  assert.equal(stdout.length, 1);
  assert.ok(stdout[0].startsWith('Usage: extract-stats [options] [result-dir]'));
  assert.deepEqual(stderr, []);
});
