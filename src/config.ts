import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import * as yaml from 'js-yaml';
import type { Settings } from './types';

export const CONFIG_FILE_NAME = '.webtraffic.yaml';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const DEFAULT_SETTINGS: Settings = {
  verbose: false,
  max_depth: 10,
  min_depth: 3,
  max_wait: 10,
  min_wait: 5,
  root_urls: [],
  blacklist: [],
  user_agent: DEFAULT_USER_AGENT,
};

/** Environment variable read for each setting. */
const ENV_KEYS: Record<keyof Settings, string> = {
  verbose: 'VERBOSE',
  max_depth: 'MAX_DEPTH',
  min_depth: 'MIN_DEPTH',
  max_wait: 'MAX_WAIT',
  min_wait: 'MIN_WAIT',
  root_urls: 'ROOT_URLS',
  blacklist: 'BLACKLIST',
  user_agent: 'USER_AGENT',
};

/** Invalid or incomplete configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Value readers, shared by the file and environment layers
// ---------------------------------------------------------------------------

function readInteger(value: unknown, key: string, source: string): number {
  const n = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${key} must be a non-negative integer in ${source}, got: ${String(value)}`);
  }
  return n;
}

function readBoolean(value: unknown, key: string, source: string): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const v = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'y'].includes(v)) return true;
    if (['0', 'false', 'no', 'n'].includes(v)) return false;
  }
  throw new ConfigError(`${key} must be a boolean in ${source}, got: ${String(value)}`);
}

function readString(value: unknown, key: string, source: string): string {
  if (typeof value !== 'string') {
    throw new ConfigError(`${key} must be a string in ${source}, got: ${String(value)}`);
  }
  return value;
}

// Blank items are dropped: an empty blacklist entry would match every URL.
function readStringList(value: unknown, key: string, source: string): string[] {
  const items = typeof value === 'string' ? value.split(',') : value;
  if (!Array.isArray(items) || !items.every((item) => typeof item === 'string')) {
    throw new ConfigError(`${key} must be a list of strings in ${source}`);
  }
  return items.map((item: string) => item.trim()).filter(Boolean);
}

/**
 * Converts raw key/value pairs (YAML mapping or environment strings) into settings.
 * Keys that are absent or null are left out so lower layers still apply.
 */
function readLayer(get: (key: keyof Settings) => unknown, source: string): Partial<Settings> {
  const layer: Partial<Settings> = {};
  const present = (key: keyof Settings): unknown => {
    const value = get(key);
    return value === null ? undefined : value;
  };

  const verbose = present('verbose');
  if (verbose !== undefined) layer.verbose = readBoolean(verbose, 'verbose', source);
  for (const key of ['max_depth', 'min_depth', 'max_wait', 'min_wait'] as const) {
    const value = present(key);
    if (value !== undefined) layer[key] = readInteger(value, key, source);
  }
  for (const key of ['root_urls', 'blacklist'] as const) {
    const value = present(key);
    if (value !== undefined) layer[key] = readStringList(value, key, source);
  }
  const userAgent = present('user_agent');
  if (userAgent !== undefined) layer.user_agent = readString(userAgent, 'user_agent', source);

  return layer;
}

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

/**
 * Parses the YAML config file. Unknown keys are ignored and an empty file is an empty layer.
 * @param text - File contents.
 * @param source - File path, used in error messages.
 * @returns Settings present in the file.
 */
export function parseConfigFile(text: string, source: string): Partial<Settings> {
  let doc: unknown;
  try {
    doc = yaml.load(text, { filename: source });
  } catch (err) {
    throw new ConfigError(`invalid YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (doc === undefined || doc === null) return {};
  if (typeof doc !== 'object' || Array.isArray(doc)) {
    throw new ConfigError(`${source} must contain a mapping of settings`);
  }
  const entries = new Map(Object.entries(doc));
  return readLayer((key) => entries.get(key), source);
}

/**
 * Reads settings from environment variables (VERBOSE, MAX_DEPTH, ROOT_URLS, ...).
 * Lists are comma-separated.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): Partial<Settings> {
  return readLayer((key) => {
    const value = env[ENV_KEYS[key]];
    return value === '' ? undefined : value;
  }, 'environment');
}

/**
 * Locations searched for the config file, in order.
 */
export function configSearchPaths(cwd: string, home: string): string[] {
  return [path.join(cwd, CONFIG_FILE_NAME), path.join(home, CONFIG_FILE_NAME)];
}

/**
 * Merges layers over the defaults; later layers win key by key.
 */
export function resolveSettings(...layers: Partial<Settings>[]): Settings {
  return layers.reduce<Settings>((merged, layer) => ({ ...merged, ...layer }), { ...DEFAULT_SETTINGS });
}

/**
 * Checks the invariants the browsing engine relies on.
 * Throws a ConfigError describing the first violation.
 * @param settings - Merged settings.
 * @returns The same settings, for chaining.
 */
export function validateSettings(settings: Settings): Settings {
  for (const key of ['max_depth', 'min_depth', 'max_wait', 'min_wait'] as const) {
    readInteger(settings[key], key, 'settings');
  }
  if (settings.min_depth > settings.max_depth) {
    throw new ConfigError(`min_depth (${settings.min_depth}) must not exceed max_depth (${settings.max_depth})`);
  }
  if (settings.min_wait > settings.max_wait) {
    throw new ConfigError(`min_wait (${settings.min_wait}) must not exceed max_wait (${settings.max_wait})`);
  }
  if (settings.root_urls.length === 0) {
    throw new ConfigError('root_urls must list at least one URL');
  }
  for (const url of settings.root_urls) {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ConfigError(`root_urls contains an invalid URL: ${url}`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ConfigError(`root_urls must be http(s) URLs, got: ${url}`);
    }
  }
  return settings;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Explicit --config path; skips the search when set. */
  configFile?: string | null;
  /** Settings given as command-line flags. */
  flags?: Partial<Settings>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
}

export interface LoadedConfig {
  settings: Settings;
  /** The config file that was used (or attempted), if any. */
  configFile: string | null;
  /** Why the config file could not be used. Loading continues without it. */
  fileError: Error | null;
}

/**
 * Builds the run's settings: defaults < config file < environment < flags.
 * A config file that is missing, unreadable or malformed is reported through
 * `fileError` rather than thrown; invalid merged settings throw a ConfigError.
 * @param options - Sources to read; each falls back to the real process.
 * @returns Validated settings plus what happened with the config file.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? os.homedir();

  let configFile: string | null = options.configFile ?? null;
  if (configFile === null) {
    configFile = configSearchPaths(cwd, home).find((candidate) => fs.existsSync(candidate)) ?? null;
  }

  let fileLayer: Partial<Settings> = {};
  let fileError: Error | null = null;
  if (configFile !== null) {
    try {
      fileLayer = parseConfigFile(fs.readFileSync(configFile, 'utf8'), configFile);
    } catch (err) {
      fileError = err instanceof Error ? err : new Error(String(err));
    }
  }

  const settings = validateSettings(resolveSettings(fileLayer, settingsFromEnv(env), options.flags ?? {}));
  return { settings, configFile, fileError };
}
