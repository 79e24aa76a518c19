import type { Settings, SettingKey, WritableSettingKey } from '../types';

/**
 * Holds the live session settings for one run.
 * One instance per process. Every component reads it at each decision point,
 * and the traversal engine and fetcher write the blacklist and wait bounds back.
 * Nothing here is persisted.
 */
class ConfigStore {
  private values: Settings;

  /**
   * @param initial - Validated settings, usually from loadConfig().
   */
  constructor(initial: Settings) {
    this.values = {
      ...initial,
      root_urls: [...initial.root_urls],
      blacklist: [...initial.blacklist],
    };
  }

  /**
   * Reads one setting. List values are read-only views.
   * @param key - Setting name, e.g. 'min_wait'.
   * @returns The current value.
   */
  get<K extends SettingKey>(key: K): Settings[K] {
    return this.values[key];
  }

  /**
   * Replaces one setting for the rest of the run.
   * @param key - Setting name. Not 'blacklist', see appendToBlacklist().
   * @param value - New value.
   */
  set<K extends WritableSettingKey>(key: K, value: Settings[K]): void {
    this.values[key] = value;
  }

  /**
   * Adds a URL to the blacklist unless it is already an entry.
   * The blacklist only grows; there is no way to remove an entry.
   * @param url - URL to stop following.
   * @returns true if the entry was added, false if it was already present.
   */
  appendToBlacklist(url: string): boolean {
    const blacklist = this.values.blacklist;
    if (blacklist.includes(url)) return false;
    this.values.blacklist = [...blacklist, url];
    return true;
  }

  /**
   * Returns a copy of every setting as it stands right now.
   */
  snapshot(): Settings {
    return {
      ...this.values,
      root_urls: [...this.values.root_urls],
      blacklist: [...this.values.blacklist],
    };
  }
}

export default ConfigStore;
