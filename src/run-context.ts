import { ConfigCache } from './config-cache.js'
import { ConfigLoader } from './config-loader.js'
import { ConfigLocator } from './config-locator.js'
import { ConfigMerger, type ResolvedConfig } from './config-merger.js'
import { type Logger, silentLogger } from './logger.js'
import type { ConfigLayer, LocatedConfig } from './types.js'

export interface RunContextOptions {
  cwd?: string
  /** Config file named by the caller; skips the ancestor search. */
  configPath?: string
  /** Options set explicitly by the caller, highest precedence. Validated on merge. */
  overrides?: ConfigLayer['values']
  stdinFilename?: string
  cache?: ConfigCache
  locator?: ConfigLocator
  loader?: ConfigLoader
  merger?: ConfigMerger
  logger?: Logger
}

/**
 * State shared by everything in one formatting run. The config cache lives
 * here rather than in module scope, so concurrent runs in one process do not
 * see each other's configs.
 */
export class RunContext {
  readonly cwd: string
  readonly cache: ConfigCache
  readonly logger: Logger
  private configPath?: string
  private overrides: ConfigLayer['values']
  private locator: ConfigLocator
  private loader: ConfigLoader
  private merger: ConfigMerger

  constructor(options: RunContextOptions = {}) {
    this.cwd = options.cwd ?? process.cwd()
    this.configPath = options.configPath
    this.overrides = options.overrides ?? {}
    this.cache = options.cache ?? new ConfigCache()
    this.logger = options.logger ?? silentLogger
    this.locator =
      options.locator ?? new ConfigLocator({ cwd: this.cwd, stdinFilename: options.stdinFilename })
    this.loader = options.loader ?? new ConfigLoader()
    this.merger = options.merger ?? new ConfigMerger()
  }

  /**
   * Resolved config governing one invocation. The search starts once, from
   * the deepest directory shared by every input, so all inputs of a run get
   * the same config. Repeated calls for the same inputs share one instance.
   */
  async configFor(inputs: readonly string[]): Promise<ResolvedConfig> {
    const located = await this.locate(inputs)
    return this.cache.resolve(located, () => this.build(located))
  }

  async locate(inputs: readonly string[]): Promise<LocatedConfig> {
    if (this.configPath !== undefined) {
      const explicit = this.configPath
      return this.cache.locate(`explicit\u0000${explicit}`, () => this.locator.locate([], explicit))
    }
    const base = this.locator.commonBase(inputs)
    return this.cache.locate(base, () => this.locator.search(base))
  }

  private build(located: LocatedConfig): ResolvedConfig {
    const layers: ConfigLayer[] = []
    if (located.configPath) {
      layers.push(this.loader.load(located.configPath))
    }
    layers.push({ source: 'override', values: { ...this.overrides } })

    const config = this.merger.merge(layers, located)
    this.logger.debug(`Resolved config for ${located.projectRoot}`, {
      reason: located.rootReason,
      config: located.configPath,
    })
    return config
  }
}
