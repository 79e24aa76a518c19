import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { ratchetWaitBounds } from './backoff';
import type { TrafficCounters } from './counters';
import { hrBytes } from './format';
import type { Logger } from './logger';
import type ConfigStore from './store';
import { sleep as realSleep } from './time';
import type { FetchResult, PageFetcher, Sleep } from './types';

export const REQUEST_TIMEOUT_MS = 5000;
/** Fixed pause after a transport failure, separate from the configurable hop wait. */
export const TRANSPORT_PENALTY_MS = 30000;

/** A request that never produced a response: timeout, DNS, refused connection. */
export class TransportError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`request to ${url} failed: ${reason}`, { cause });
    this.name = 'TransportError';
    this.url = url;
  }
}

export interface HttpFetcherOptions {
  store: ConfigStore;
  counters: TrafficCounters;
  logger: Logger;
  sleep?: Sleep;
  /** Defaults to the shared axios instance. */
  client?: AxiosInstance;
  timeoutMs?: number;
  penaltyMs?: number;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(new Uint8Array(data));
  if (typeof data === 'string') return Buffer.from(data);
  return Buffer.alloc(0);
}

/**
 * Performs one GET per call and keeps the process-wide traffic counters.
 * Never throws: transport failures come back as `{ ok: false }` after the
 * penalty pause, and every HTTP status (404, 500, 429...) comes back as `ok`.
 */
export class HttpFetcher implements PageFetcher {
  private readonly store: ConfigStore;
  private readonly counters: TrafficCounters;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly penaltyMs: number;

  constructor(options: HttpFetcherOptions) {
    this.store = options.store;
    this.counters = options.counters;
    this.logger = options.logger;
    this.sleep = options.sleep ?? realSleep;
    this.client = options.client ?? axios;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.penaltyMs = options.penaltyMs ?? TRANSPORT_PENALTY_MS;
  }

  async fetch(url: string): Promise<FetchResult> {
    this.logger.debug('Requesting page...', { url });

    // Nothing was sent for a URL that does not parse, so no penalty applies.
    try {
      new URL(url);
    } catch (err) {
      return { ok: false, error: new TransportError(url, err) };
    }

    // axios's timeout only covers idle time; the deadline covers the whole exchange.
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), this.timeoutMs);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(url, {
        timeout: this.timeoutMs,
        signal: deadline.signal,
        headers: { 'User-Agent': this.store.get('user_agent') },
        responseType: 'arraybuffer',
        validateStatus: null,
      }).finally(() => clearTimeout(timer));
    } catch (err) {
      const cause = deadline.signal.aborted
        ? new Error(`timed out after ${this.timeoutMs}ms`, { cause: err })
        : err;
      const error = new TransportError(url, cause);
      this.logger.warn('Request failed, pausing before moving on', {
        url,
        error: error.message,
        penaltyMs: this.penaltyMs,
      });
      await this.sleep(this.penaltyMs);
      return { ok: false, error };
    }

    const body = toBuffer(response.data);
    const status = response.status;
    this.counters.recordResponse(status, body.length);
    const totals = this.counters.snapshot();

    this.logger.debug('Page size and data meter', {
      pageSize: hrBytes(body.length),
      dataMeter: hrBytes(totals.dataMeter),
    });

    if (status !== 200) {
      this.logger.warn('Non-200 response status', { url, status });
      if (status === 429) {
        const bounds = ratchetWaitBounds(this.store);
        this.logger.warn("We're making requests too frequently... sleeping longer...", {
          minWait: bounds.minWait,
          maxWait: bounds.maxWait,
        });
      }
    }

    this.logger.debug('Request counters', {
      goodRequests: totals.goodRequests,
      badRequests: totals.badRequests,
    });

    return { ok: true, status, body };
  }
}
