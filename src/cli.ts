#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import { TrafficCounters } from './counters';
import { drive } from './driver';
import { HttpFetcher } from './fetcher';
import { hrBytes } from './format';
import { Logger, LogLevel } from './logger';
import { mathRandom, seededRandom } from './random';
import ConfigStore from './store';
import { sleep } from './time';
import type { Settings } from './types';

export const USAGE = `Usage: webtraffic [options]

Generates human-paced web traffic by following random links from the configured root URLs.
Runs until interrupted (Ctrl+C).

Options:
  --config <file>    config file (default is $PWD/.webtraffic.yaml followed by $HOME/.webtraffic.yaml)
  --verbose          enable verbose logging
  --max-depth <n>    maximum depth for recursive browsing (default 10)
  --min-depth <n>    minimum depth for recursive browsing (default 3)
  --max-wait <n>     maximum wait in seconds between requests (default 10)
  --min-wait <n>     minimum wait in seconds between requests (default 5)
  --seed <n>         seed the random choices for a reproducible run
  --help             show this help`;

/** Parsed CLI arguments. null means the flag was not given. */
export interface CliArgs {
  config: string | null;
  verbose: boolean | null;
  maxDepth: number | null;
  minDepth: number | null;
  maxWait: number | null;
  minWait: number | null;
  seed: number | null;
  help: boolean;
}

function parseCount(flag: string, raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new Error(`${flag} requires a non-negative integer, got: ${raw ?? '(nothing)'}`);
  }
  return parseInt(raw, 10);
}

/**
 * Parses CLI flags from an args array (pass process.argv.slice(2)).
 * Unknown arguments are ignored.
 * Throws with a descriptive message if a numeric flag receives anything else.
 * @param argv - Raw CLI argument strings.
 * @returns Parsed flag values.
 */
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    config: null,
    verbose: null,
    maxDepth: null,
    minDepth: null,
    maxWait: null,
    minWait: null,
    seed: null,
    help: false,
  };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--config') {
      const value = argv[++i];
      if (value === undefined) throw new Error('--config requires a file path');
      result.config = value;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--max-depth') {
      result.maxDepth = parseCount(arg, argv[++i]);
    } else if (arg === '--min-depth') {
      result.minDepth = parseCount(arg, argv[++i]);
    } else if (arg === '--max-wait') {
      result.maxWait = parseCount(arg, argv[++i]);
    } else if (arg === '--min-wait') {
      result.minWait = parseCount(arg, argv[++i]);
    } else if (arg === '--seed') {
      result.seed = parseCount(arg, argv[++i]);
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    }
  }
  return result;
}

/**
 * Maps the flags that were given onto setting keys, the top layer of loadConfig().
 */
export function flagsToSettings(args: CliArgs): Partial<Settings> {
  const flags: Partial<Settings> = {};
  if (args.verbose !== null) flags.verbose = args.verbose;
  if (args.maxDepth !== null) flags.max_depth = args.maxDepth;
  if (args.minDepth !== null) flags.min_depth = args.minDepth;
  if (args.maxWait !== null) flags.max_wait = args.maxWait;
  if (args.minWait !== null) flags.min_wait = args.minWait;
  return flags;
}

/** Options passed to main(). */
export interface MainOptions {
  args?: CliArgs;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
  logger?: Logger;
}

/**
 * Main entry point. Loads settings, wires the components and drives forever.
 * Throws on invalid arguments or configuration rather than calling process.exit().
 * @param opts - Optional pre-parsed args and environment (useful for tests).
 * @returns Resolves only when --help was requested.
 */
export async function main(opts: MainOptions = {}): Promise<void> {
  const args = opts.args ?? parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const logger = opts.logger ?? new Logger();
  const loaded = loadConfig({
    configFile: args.config,
    flags: flagsToSettings(args),
    env: opts.env,
    cwd: opts.cwd,
    home: opts.home,
  });

  if (loaded.fileError) {
    logger.error('Failed to read config file', loaded.fileError, { config_file: loaded.configFile ?? '' });
  } else if (loaded.configFile) {
    logger.info(`Using config file: ${loaded.configFile}`);
  }

  if (loaded.settings.verbose) {
    logger.setLevel(LogLevel.DEBUG);
    logger.debug('Verbose logging enabled.');
  } else {
    logger.setLevel(LogLevel.INFO);
  }

  const store = new ConfigStore(loaded.settings);
  const counters = new TrafficCounters();
  const random = args.seed !== null ? seededRandom(args.seed) : mathRandom;
  const fetcher = new HttpFetcher({ store, counters, logger, sleep });

  process.once('SIGINT', () => {
    const totals = counters.snapshot();
    logger.info('Interrupted, final traffic totals', {
      goodRequests: totals.goodRequests,
      badRequests: totals.badRequests,
      dataMeter: hrBytes(totals.dataMeter),
      blacklisted: store.get('blacklist').length,
    });
    process.exit(130);
  });

  await drive({ store, fetcher, random, sleep, logger, counters });
}

if (require.main === module) {
  dotenv.config();
  main().catch((err: unknown) => {
    console.error('Fatal error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
