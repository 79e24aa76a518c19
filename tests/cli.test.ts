import { test, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { flagsToSettings, main, parseArgs, type CliArgs } from '../src/cli';
import { memoryLogger } from './helpers';

const NO_ARGS: CliArgs = {
  config: null,
  verbose: null,
  maxDepth: null,
  minDepth: null,
  maxWait: null,
  minWait: null,
  seed: null,
  help: false,
};

// ---------------------------------------------------------------------------
// parseArgs
// ---------------------------------------------------------------------------

test('parseArgs: returns nulls when no flags are given', () => {
  assert.deepEqual(parseArgs([]), NO_ARGS);
});

test('parseArgs: parses every flag', () => {
  const args = parseArgs([
    '--config', 'traffic.yaml',
    '--verbose',
    '--max-depth', '8',
    '--min-depth', '2',
    '--max-wait', '15',
    '--min-wait', '4',
    '--seed', '42',
  ]);
  assert.deepEqual(args, {
    config: 'traffic.yaml',
    verbose: true,
    maxDepth: 8,
    minDepth: 2,
    maxWait: 15,
    minWait: 4,
    seed: 42,
    help: false,
  });
});

test('parseArgs: parses --help and -h', () => {
  assert.equal(parseArgs(['--help']).help, true);
  assert.equal(parseArgs(['-h']).help, true);
});

test('parseArgs: ignores unknown arguments', () => {
  assert.deepEqual(parseArgs(['--colour', 'blue']), NO_ARGS);
});

test('parseArgs: throws on non-numeric values', () => {
  assert.throws(() => parseArgs(['--max-wait', 'abc']), /--max-wait requires a non-negative integer, got: abc/);
  assert.throws(() => parseArgs(['--min-depth', '-1']), /--min-depth requires a non-negative integer, got: -1/);
});

test('parseArgs: throws when a value is missing', () => {
  assert.throws(() => parseArgs(['--max-depth']), /--max-depth requires a non-negative integer, got: \(nothing\)/);
  assert.throws(() => parseArgs(['--config']), /--config requires a file path/);
});

// ---------------------------------------------------------------------------
// flagsToSettings
// ---------------------------------------------------------------------------

test('flagsToSettings: maps only the flags that were given', () => {
  assert.deepEqual(flagsToSettings({ ...NO_ARGS, maxDepth: 8, verbose: true, seed: 7 }), {
    max_depth: 8,
    verbose: true,
  });
  assert.deepEqual(flagsToSettings(NO_ARGS), {});
});

// ---------------------------------------------------------------------------
// main() entry point
// ---------------------------------------------------------------------------

let emptyDir: string;

before(() => {
  emptyDir = fs.mkdtempSync(path.join(os.tmpdir(), 'webtraffic-cli-'));
});

after(() => {
  fs.rmSync(emptyDir, { recursive: true, force: true });
});

test('main(): --help resolves without loading any configuration', async () => {
  const { logger, lines } = memoryLogger();
  await main({ args: { ...NO_ARGS, help: true }, env: {}, cwd: emptyDir, home: emptyDir, logger });
  assert.deepEqual(lines, []);
});

test('main(): rejects when no root URL is configured', async () => {
  const { logger } = memoryLogger();
  await assert.rejects(
    () => main({ args: NO_ARGS, env: {}, cwd: emptyDir, home: emptyDir, logger }),
    /root_urls must list at least one URL/
  );
});

test('main(): rejects when the flags invert the depth range', async () => {
  const { logger } = memoryLogger();
  await assert.rejects(
    () =>
      main({
        args: { ...NO_ARGS, minDepth: 9, maxDepth: 1 },
        env: { ROOT_URLS: 'https://a.example/' },
        cwd: emptyDir,
        home: emptyDir,
        logger,
      }),
    /min_depth \(9\) must not exceed max_depth \(1\)/
  );
});
