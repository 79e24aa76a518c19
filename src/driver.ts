import { browse, type BrowseContext } from './browse';
import type { TrafficCounters } from './counters';
import { isBlacklisted } from './links';
import { pick } from './random';
import type { BranchResult } from './types';

/** Fixed pause between two root traversals. */
export const ROOT_PAUSE_MS = 10000;

export interface DriverContext extends BrowseContext {
  counters: TrafficCounters;
}

export interface DriveOptions {
  /** Checked between iterations. Without one the loop never returns. */
  signal?: AbortSignal;
}

/**
 * Runs one iteration: pick a root that is not blacklisted, draw a depth in
 * [min_depth, max_depth] and browse from there.
 * @returns The branch result, or null when every root is blacklisted.
 */
export async function browseFromRandomRoot(ctx: DriverContext): Promise<BranchResult | null> {
  const { store, random, logger, counters } = ctx;

  const blacklist = store.get('blacklist');
  const roots = store.get('root_urls').filter((url) => !isBlacklisted(url, blacklist));
  if (roots.length === 0) {
    logger.warn('Every root URL is blacklisted, nothing to browse');
    return null;
  }

  const root = pick(random, roots);
  logger.info(`Randomly selected ${root} as the Root URL for recursive browsing.`);

  const depth = random.int(store.get('min_depth'), store.get('max_depth'));
  logger.debug('Randomly selected depth', { depth });

  const result = await browse(ctx, root, depth);
  logger.info('Finished browsing branch', {
    root,
    end: result.end,
    pages: result.fetched.length,
    ...counters.snapshot(),
  });
  return result;
}

/**
 * The outer loop: browse from a random root, pause, repeat.
 * Branch failures are handled inside browse(), so the loop itself keeps going
 * until the process is terminated (or the optional signal is aborted).
 */
export async function drive(ctx: DriverContext, options: DriveOptions = {}): Promise<void> {
  const { store, logger, sleep } = ctx;

  logger.info('This webtraffic command will now run indefinitely, use Ctrl+C to abort.');
  logger.debug('Configuration', {
    minDepth: store.get('min_depth'),
    maxDepth: store.get('max_depth'),
    minWait: store.get('min_wait'),
    maxWait: store.get('max_wait'),
  });

  while (!options.signal?.aborted) {
    await browseFromRandomRoot(ctx);
    logger.info(`Pausing ${ROOT_PAUSE_MS / 1000}s before choosing another Root URL.`);
    await sleep(ROOT_PAUSE_MS);
  }
}
