/**
 * Live session settings held by the ConfigStore, populated by loadConfig().
 * Keys match the YAML config file so they can be read and written by name.
 */
export interface Settings {
  verbose: boolean;
  max_depth: number;
  min_depth: number;
  /** Upper bound of the pause between hops, in seconds. Raised on HTTP 429. */
  max_wait: number;
  /** Lower bound of the pause between hops, in seconds. Raised on HTTP 429. */
  min_wait: number;
  root_urls: readonly string[];
  /** URL substrings that are never followed. Only ever grows during a run. */
  blacklist: readonly string[];
  user_agent: string;
}

export type SettingKey = keyof Settings;
/** Keys set() may replace. The blacklist only grows, through appendToBlacklist(). */
export type WritableSettingKey = Exclude<SettingKey, 'blacklist'>;

/**
 * Outcome of a single page request.
 * A non-200 response is still `ok`: its body may carry links worth following.
 */
export type FetchResult =
  | { ok: true; status: number; body: Buffer }
  | { ok: false; error: Error };

/** Anything that can fetch a page for the traversal engine. */
export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
}

/** Source of uniform random integers. */
export interface Random {
  /** Returns an integer in [min, max], both ends inclusive. */
  int(min: number, max: number): number;
}

export type Sleep = (ms: number) => Promise<void>;

/** Process-wide request totals. */
export interface CounterSnapshot {
  goodRequests: number;
  badRequests: number;
  /** Bytes of response body read so far. */
  dataMeter: number;
}

/**
 * How a branch stopped:
 * `leaf` when depth ran out, `error` on a transport failure,
 * `dead-end` when a page had nothing left to follow.
 */
export type BranchEnd = 'leaf' | 'error' | 'dead-end';

/** Summary of one root-to-leaf traversal. */
export interface BranchResult {
  /** Every URL requested, in order. */
  fetched: string[];
  end: BranchEnd;
}
