import { extractLinks, filterLinks } from './links';
import type { Logger } from './logger';
import { pick } from './random';
import type ConfigStore from './store';
import { seconds } from './time';
import type { BranchResult, PageFetcher, Random, Sleep } from './types';

/** Everything a traversal reads from or writes to. */
export interface BrowseContext {
  store: ConfigStore;
  fetcher: PageFetcher;
  random: Random;
  sleep: Sleep;
  logger: Logger;
}

/**
 * Follows random links from `url` for `depth` hops.
 *
 * At depth 0 the page is fetched once and the branch ends. Otherwise a failed
 * fetch, or a page with no link left after blacklist filtering, blacklists the
 * URL and ends the branch. When links remain, the loop sleeps a random number
 * of seconds in [min_wait, max_wait], picks one and goes one level deeper.
 * At most depth + 1 fetches happen per call.
 * @param ctx - Shared settings, fetcher and injected randomness/sleep.
 * @param url - First page of the branch.
 * @param depth - Hops to follow; a non-negative integer.
 * @returns The URLs fetched, in order, and why the branch stopped.
 */
export async function browse(ctx: BrowseContext, url: string, depth: number): Promise<BranchResult> {
  if (!Number.isInteger(depth) || depth < 0) {
    throw new RangeError(`depth must be a non-negative integer, got ${depth}`);
  }

  const { store, fetcher, random, sleep, logger } = ctx;
  const fetched: string[] = [];
  let current = url;
  let remaining = depth;

  for (;;) {
    logger.info('Recursively browsing', { url: current, depth: remaining });

    const result = await fetcher.fetch(current);
    fetched.push(current);

    if (remaining === 0) {
      return { fetched, end: 'leaf' };
    }

    if (!result.ok) {
      logger.warn('Stopping and blacklisting: page error', { url: current, error: result.error.message });
      store.appendToBlacklist(current);
      return { fetched, end: 'error' };
    }

    const validLinks = filterLinks(extractLinks(result.body), store.get('blacklist'));
    logger.debug('Valid links found', { linkCount: validLinks.length });

    if (validLinks.length === 0) {
      logger.warn('Stopping and blacklisting: no links', { url: current });
      store.appendToBlacklist(current);
      return { fetched, end: 'dead-end' };
    }

    // Read after the fetch so a 429 on this page already lengthens this pause.
    const sleepTime = random.int(store.get('min_wait'), store.get('max_wait'));
    logger.debug('Pausing', { sleepTime: `${sleepTime}s` });
    await sleep(seconds(sleepTime));

    current = pick(random, validLinks);
    remaining--;
  }
}
