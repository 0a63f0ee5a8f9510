import type { ResolvedConfig } from './config-merger.js'
import type { LocatedConfig } from './types.js'

export interface ConfigCacheStats {
  walks: number // directory walks performed
  loads: number // configs parsed and merged
  hits: number // lookups served from the cache or an in-flight entry
}

/**
 * Per-run cache of config locations (by start directory) and resolved
 * configs (by project root). An entry is published as a pending promise
 * before its work starts, so a second lookup for the same key while the
 * first is still running waits for that result instead of repeating the
 * walk or parse. Failed entries are evicted so a later lookup can retry.
 */
export class ConfigCache {
  private locations = new Map<string, Promise<LocatedConfig>>()
  private configs = new Map<string, Promise<ResolvedConfig>>()
  private counters: ConfigCacheStats = { walks: 0, loads: 0, hits: 0 }

  locate(startDir: string, walk: () => LocatedConfig | Promise<LocatedConfig>): Promise<LocatedConfig> {
    return this.memo(this.locations, startDir, walk, 'walks')
  }

  resolve(
    located: LocatedConfig,
    load: () => ResolvedConfig | Promise<ResolvedConfig>,
  ): Promise<ResolvedConfig> {
    return this.memo(this.configs, ConfigCache.rootKey(located), load, 'loads')
  }

  stats(): ConfigCacheStats {
    return { ...this.counters }
  }

  clear(): void {
    this.locations.clear()
    this.configs.clear()
    this.counters = { walks: 0, loads: 0, hits: 0 }
  }

  static rootKey(located: LocatedConfig): string {
    return `${located.projectRoot}\u0000${located.configPath ?? ''}`
  }

  private memo<T>(
    entries: Map<string, Promise<T>>,
    key: string,
    compute: () => T | Promise<T>,
    counter: 'walks' | 'loads',
  ): Promise<T> {
    const existing = entries.get(key)
    if (existing) {
      this.counters.hits++
      return existing
    }

    this.counters[counter]++
    const pending = Promise.resolve().then(compute)
    entries.set(key, pending)
    void pending.catch(() => {
      if (entries.get(key) === pending) entries.delete(key)
    })
    return pending
  }
}
