import fs from 'node:fs'
import path from 'node:path'
import { globalConfigPath } from './environment.js'
import { ConfigurationError, PathError, errorMessage, systemErrorCode } from './errors.js'
import type { LocatedConfig } from './types.js'

export const PROJECT_CONFIG_NAMES = ['spanfmt.yml', '.spanfmt.yml', '.spanfmt.yaml'] as const

export interface ConfigLocatorOptions {
  cwd?: string
  /** Path reported by the caller for content read from stdin (`-`). */
  stdinFilename?: string
  /** Resolves the user-level fallback; defaults to the platform location. */
  globalConfig?: () => string
}

type EntryKind = 'file' | 'directory' | 'other' | 'missing'

/**
 * Finds the configuration that governs a set of input paths.
 *
 * Starting from the deepest directory shared by all inputs, the locator walks
 * towards the filesystem root. The first directory holding a project config
 * file wins. A `.git` or `.hg` marker ends the search at that directory
 * without a project config, as does the filesystem root or a directory that
 * cannot be read. Without a project config the user-level config is used when
 * it exists.
 */
export class ConfigLocator {
  private cwd: string
  private stdinFilename?: string
  private globalConfig: () => string

  constructor(options: ConfigLocatorOptions = {}) {
    this.cwd = options.cwd ?? process.cwd()
    this.stdinFilename = options.stdinFilename
    this.globalConfig = options.globalConfig ?? (() => globalConfigPath())
  }

  /**
   * Locate config for the given inputs. An explicit path skips the search.
   */
  locate(inputs: readonly string[], explicitConfig?: string): LocatedConfig {
    if (explicitConfig !== undefined) {
      return this.useExplicit(explicitConfig)
    }
    return this.search(this.commonBase(inputs))
  }

  /**
   * Walk upward from a directory. Exposed for per-directory memoisation.
   */
  search(startDir: string): LocatedConfig {
    let directory = startDir

    for (;;) {
      let configFile: string | null
      let marker: string | null
      try {
        configFile = this.findConfigFile(directory)
        marker = configFile ? null : this.findVcsMarker(directory)
      } catch {
        return this.fallback(directory, 'unreadable directory')
      }

      if (configFile) {
        return {
          projectRoot: directory,
          rootReason: 'config file',
          configPath: configFile,
          configKind: 'project',
        }
      }
      if (marker) {
        return this.fallback(directory, marker)
      }

      const parent = path.dirname(directory)
      if (parent === directory) {
        return this.fallback(directory, 'file system root')
      }
      directory = parent
    }
  }

  /**
   * Deepest directory containing every input. A directory input contributes
   * itself; anything else (file, missing path) contributes its parents.
   */
  commonBase(inputs: readonly string[]): string {
    const sources = inputs
      .map((input) => (input === '-' && this.stdinFilename ? this.stdinFilename : input))
      .filter((input) => input !== '-')

    if (sources.length === 0) {
      return this.realpath(this.cwd)
    }

    const chains = sources.map((source) => {
      const resolved = this.realpath(path.resolve(this.cwd, source))
      const start = this.kindOf(resolved) === 'directory' ? resolved : path.dirname(resolved)
      return this.ancestors(start)
    })

    // Chains run root-first, so the common base is the longest shared prefix
    const [first, ...rest] = chains
    let depth = first.length
    for (const chain of rest) {
      let shared = 0
      while (shared < depth && shared < chain.length && chain[shared] === first[shared]) {
        shared++
      }
      depth = shared
    }
    return first[Math.max(depth, 1) - 1]
  }

  private ancestors(directory: string): string[] {
    const chain = [directory]
    let current = directory
    while (path.dirname(current) !== current) {
      current = path.dirname(current)
      chain.unshift(current)
    }
    return chain
  }

  private useExplicit(configPath: string): LocatedConfig {
    const resolved = path.resolve(this.cwd, configPath)
    try {
      fs.accessSync(resolved, fs.constants.R_OK)
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read config file ${configPath}: ${errorMessage(error)}`,
        'file',
        undefined,
        resolved,
      )
    }
    if (this.kindOf(resolved) !== 'file') {
      throw new ConfigurationError(`Config path ${configPath} is not a file`, 'file', undefined, resolved)
    }
    return {
      projectRoot: path.dirname(resolved),
      rootReason: 'explicit config',
      configPath: resolved,
      configKind: 'explicit',
    }
  }

  private fallback(projectRoot: string, rootReason: string): LocatedConfig {
    const globalPath = this.globalConfig()
    if (this.kindOf(globalPath) === 'file') {
      return { projectRoot, rootReason, configPath: globalPath, configKind: 'global' }
    }
    return { projectRoot, rootReason, configPath: null, configKind: 'none' }
  }

  private findConfigFile(directory: string): string | null {
    for (const name of PROJECT_CONFIG_NAMES) {
      const candidate = path.join(directory, name)
      if (this.kindOfStrict(candidate) === 'file') {
        return candidate
      }
    }
    return null
  }

  private findVcsMarker(directory: string): string | null {
    if (this.kindOfStrict(path.join(directory, '.git')) !== 'missing') {
      return '.git directory'
    }
    if (this.kindOfStrict(path.join(directory, '.hg')) === 'directory') {
      return '.hg directory'
    }
    return null
  }

  /**
   * Stat without following errors into a crash: anything unreadable is missing.
   */
  private kindOf(target: string): EntryKind {
    try {
      return this.kindOfStrict(target)
    } catch {
      return 'missing'
    }
  }

  /**
   * Stat that throws on permission errors so the walk can stop there.
   */
  private kindOfStrict(target: string): EntryKind {
    try {
      const stats = fs.statSync(target)
      if (stats.isFile()) return 'file'
      if (stats.isDirectory()) return 'directory'
      return 'other'
    } catch (error) {
      const code = systemErrorCode(error)
      if (code === 'ENOENT' || code === 'ENOTDIR') return 'missing'
      throw error
    }
  }

  private realpath(target: string): string {
    try {
      return fs.realpathSync(target)
    } catch (error) {
      const code = systemErrorCode(error)
      if (code === 'ELOOP') {
        throw new PathError(`Symlink loop while resolving ${target}`, target, code)
      }
      // Missing inputs still locate config through their parents
      const parent = path.dirname(target)
      return parent === target ? target : path.join(this.realpath(parent), path.basename(target))
    }
  }
}
