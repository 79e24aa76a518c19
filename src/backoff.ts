import type ConfigStore from './store';

/** Seconds added to both wait bounds for every rate-limited response. */
export const BACKOFF_STEP_SECONDS = 10;

export interface WaitBounds {
  minWait: number;
  maxWait: number;
}

/**
 * Slows down the rest of the run after a 429.
 * Raises min_wait and max_wait together so min <= max still holds.
 * The increase is cumulative and never undone.
 * @param store - Live settings to update.
 * @param step - Seconds to add to each bound.
 * @returns The bounds now in effect.
 */
export function ratchetWaitBounds(store: ConfigStore, step: number = BACKOFF_STEP_SECONDS): WaitBounds {
  const minWait = store.get('min_wait') + step;
  const maxWait = store.get('max_wait') + step;
  store.set('min_wait', minWait);
  store.set('max_wait', maxWait);
  return { minWait, maxWait };
}
