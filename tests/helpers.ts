import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { DEFAULT_SETTINGS } from '../src/config';
import { Logger, LogLevel } from '../src/logger';
import type { FetchResult, PageFetcher, Random, Settings, Sleep } from '../src/types';

/** Fixed clock for log assertions: 2024-01-02 03:04:05 local time. */
export const LOG_TIME = new Date(2024, 0, 2, 3, 4, 5);
export const LOG_PREFIX = 'time="2024-01-02 03:04:05"';

export function makeSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    ...DEFAULT_SETTINGS,
    root_urls: ['https://a.example/'],
    min_wait: 1,
    max_wait: 2,
    user_agent: 'test-agent',
    ...overrides,
  };
}

/**
 * Random that returns pre-recorded values in order and remembers every range it was asked for.
 * Falls back to `min` once the script runs out; throws if a value is outside the requested range.
 */
export class ScriptedRandom implements Random {
  readonly calls: [number, number][] = [];
  private readonly values: number[];

  constructor(values: number[] = []) {
    this.values = [...values];
  }

  int(min: number, max: number): number {
    this.calls.push([min, max]);
    const next = this.values.shift();
    if (next === undefined) return min;
    if (next < min || next > max) {
      throw new RangeError(`scripted value ${next} outside [${min}, ${max}]`);
    }
    return next;
  }
}

export function recordingSleep(): { sleep: Sleep; calls: number[] } {
  const calls: number[] = [];
  return {
    calls,
    sleep: async (ms: number) => {
      calls.push(ms);
    },
  };
}

export function memoryLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ level, write: (line) => lines.push(line), now: () => LOG_TIME });
  return { logger, lines };
}

/** HTML snippet with one anchor per link. */
export function html(...links: string[]): string {
  return `<html><body>${links.map((link) => `<a href="${link}">${link}</a>`).join('\n')}</body></html>`;
}

/** Successful fetch result carrying the given links. */
export function page(...links: string[]): FetchResult {
  return { ok: true, status: 200, body: Buffer.from(html(...links)) };
}

/** PageFetcher backed by a fixed map; unknown URLs fail like a refused connection. */
export class FakeFetcher implements PageFetcher {
  readonly calls: string[] = [];
  private readonly pages: Record<string, FetchResult>;

  constructor(pages: Record<string, FetchResult>) {
    this.pages = pages;
  }

  async fetch(url: string): Promise<FetchResult> {
    this.calls.push(url);
    return this.pages[url] ?? { ok: false, error: new Error(`connect ECONNREFUSED ${url}`) };
  }
}

export type StubRoute = { status: number; body: string } | 'fail';

export interface StubRequest {
  url: string;
  userAgent: unknown;
  timeout: number | undefined;
}

/**
 * axios instance whose adapter answers from `routes` instead of the network.
 * Routes marked 'fail' (and unknown URLs) reject like a refused connection.
 */
export function stubHttp(routes: Record<string, StubRoute>): { client: AxiosInstance; requests: StubRequest[] } {
  const requests: StubRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const url = config.url ?? '';
    requests.push({ url, userAgent: config.headers.get('User-Agent'), timeout: config.timeout });
    const route = routes[url];
    if (route === undefined || route === 'fail') {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    }
    return {
      data: Buffer.from(route.body),
      status: route.status,
      statusText: String(route.status),
      headers: {},
      config,
    };
  };
  return { client: axios.create({ adapter }), requests };
}
