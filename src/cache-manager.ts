import { createHash } from 'node:crypto'
import { mkdirSync, readFileSync, statSync, unlinkSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { systemErrorCode } from './errors.js'
import { type Logger, silentLogger } from './logger.js'
import type { CacheEntry, CacheStore, FilePlan, LineRange, UnmatchedPausePolicy } from './types.js'

type CachedPlan = CacheEntry['plan']

/**
 * Remembers the plan computed for a file so an unchanged file under an
 * unchanged config is not rescanned.
 */
export class CacheManager {
  private cacheStore: CacheStore
  private cacheFilePath: string

  constructor(
    private cacheDir: string,
    private logger: Logger = silentLogger,
  ) {
    this.cacheFilePath = join(cacheDir, 'regions.json')
    this.cacheStore = { version: 1, entries: {} }
  }

  /**
   * Load cache from disk. If the file doesn't exist, start with empty store.
   */
  load(): void {
    let content: string

    try {
      content = readFileSync(this.cacheFilePath, 'utf-8')
    } catch (error) {
      // Missing cache file is expected for first run
      if (systemErrorCode(error) !== 'ENOENT') {
        this.logger.warn(
          `Failed to read cache file "${this.cacheFilePath}". Starting with empty cache.`,
        )
      }
      this.cacheStore = { version: 1, entries: {} }
      return
    }

    try {
      const parsed: unknown = JSON.parse(content)
      this.cacheStore = CacheManager.isStore(parsed) ? parsed : { version: 1, entries: {} }
    } catch {
      this.logger.warn(
        `Cache file "${this.cacheFilePath}" is invalid JSON. Starting with empty cache.`,
      )
      this.cacheStore = { version: 1, entries: {} }
    }
  }

  /**
   * Write cache to disk. Creates directory if it doesn't exist.
   */
  save(): void {
    mkdirSync(this.cacheDir, { recursive: true })
    writeFileSync(this.cacheFilePath, JSON.stringify(this.cacheStore, null, 2), 'utf-8')
  }

  /**
   * Lookup the plan for a file. Returns null unless content, config and
   * plan key (requested ranges, directive policy) all match what was stored.
   */
  lookup(filePath: string, fileHash: string, configHash: string, planKey: string): CachedPlan | null {
    const entry = this.cacheStore.entries[filePath]

    if (!entry) {
      return null
    }

    if (
      entry.file_hash !== fileHash ||
      entry.config_hash !== configHash ||
      entry.plan_key !== planKey
    ) {
      return null
    }

    return entry.plan
  }

  store(
    filePath: string,
    fileHash: string,
    configHash: string,
    planKey: string,
    plan: FilePlan,
  ): void {
    const entry: CacheEntry = {
      file_hash: fileHash,
      config_hash: configHash,
      plan_key: planKey,
      plan: {
        lineCount: plan.lineCount,
        spans: plan.spans,
        regions: plan.regions,
        diagnostics: plan.diagnostics,
      },
      timestamp: new Date().toISOString(),
    }
    this.cacheStore.entries[filePath] = entry
  }

  /**
   * Delete the cache file from disk.
   */
  clear(): void {
    try {
      unlinkSync(this.cacheFilePath)
    } catch (error) {
      if (systemErrorCode(error) !== 'ENOENT') throw error
    }
    this.cacheStore = { version: 1, entries: {} }
  }

  /**
   * Get cache statistics.
   */
  status(): { entries: number; sizeBytes: number; path: string } {
    const entries = Object.keys(this.cacheStore.entries).length
    let sizeBytes = 0

    try {
      sizeBytes = statSync(this.cacheFilePath).size
    } catch (error) {
      if (systemErrorCode(error) !== 'ENOENT') throw error
    }

    return { entries, sizeBytes, path: this.cacheFilePath }
  }

  /**
   * Compute SHA-256 hash of a string.
   */
  static hash(content: string): string {
    return createHash('sha256').update(content, 'utf-8').digest('hex')
  }

  static rangesKey(ranges: readonly LineRange[]): string {
    return ranges.map((range) => `${range.start}-${range.end}`).join(',')
  }

  /**
   * A plan scanned under one unmatched-pause policy is not reused under the
   * other: a strict run must still fail on an unterminated pause.
   */
  static planKey(ranges: readonly LineRange[], unmatchedPause: UnmatchedPausePolicy): string {
    return `${CacheManager.rangesKey(ranges)};${unmatchedPause}`
  }

  private static isStore(value: unknown): value is CacheStore {
    return (
      typeof value === 'object' &&
      value !== null &&
      'version' in value &&
      value.version === 1 &&
      'entries' in value &&
      typeof value.entries === 'object' &&
      value.entries !== null
    )
  }
}
