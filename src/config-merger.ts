import { createHash } from 'node:crypto'
import { ConfigurationError } from './errors.js'
import { OPTION_NAMES, OPTION_SPECS, defaultValues, isOptionName } from './options.js'
import type {
  ConfigKind,
  ConfigLayer,
  ConfigSourceKind,
  ConfigValues,
  LocatedConfig,
  OptionName,
  OptionProvenance,
} from './types.js'

/**
 * Precedence rules, evaluated top to bottom; the first layer that sets an
 * option decides it. Within one level the layer given last wins.
 */
export const PRECEDENCE_RULES: readonly ConfigSourceKind[] = ['override', 'file', 'default']

export interface ResolvedConfigInit {
  values: ConfigValues
  provenance: Map<OptionName, OptionProvenance>
  projectRoot: string
  rootReason: string
  configPath: string | null
  configKind: ConfigKind
}

/**
 * Effective configuration for one project root. Frozen on construction and
 * shared read-only by every file under that root.
 */
export class ResolvedConfig {
  readonly values: Readonly<ConfigValues>
  readonly provenance: ReadonlyMap<OptionName, OptionProvenance>
  readonly projectRoot: string
  readonly rootReason: string
  readonly configPath: string | null
  readonly configKind: ConfigKind

  constructor(init: ResolvedConfigInit) {
    Object.freeze(init.values['target-version'])
    this.values = Object.freeze(init.values)
    this.provenance = new Map(init.provenance)
    this.projectRoot = init.projectRoot
    this.rootReason = init.rootReason
    this.configPath = init.configPath
    this.configKind = init.configKind
    Object.freeze(this)
  }

  get<K extends OptionName>(name: K): ConfigValues[K] {
    return this.values[name]
  }

  sourceOf(name: OptionName): OptionProvenance {
    return this.provenance.get(name) ?? { source: 'default' }
  }

  /**
   * Splits the effective values back into per-source layers, lowest first.
   * Merging these layers reproduces this config.
   */
  toLayers(): ConfigLayer[] {
    const layers = new Map<string, ConfigLayer>()

    for (const name of OPTION_NAMES) {
      const { source, origin } = this.sourceOf(name)
      const key = `${source}:${origin ?? ''}`
      let layer = layers.get(key)
      if (!layer) {
        layer = { source, origin, values: {} }
        layers.set(key, layer)
      }
      const value = this.values[name]
      layer.values[name] = Array.isArray(value) ? [...value] : value
    }

    return [...layers.values()].sort(
      (a, b) => PRECEDENCE_RULES.indexOf(b.source) - PRECEDENCE_RULES.indexOf(a.source),
    )
  }

  /**
   * Stable hash of the effective values, used to key cached plans.
   */
  fingerprint(): string {
    const entries = OPTION_NAMES.map((name) => [name, this.values[name]])
    return createHash('sha256').update(JSON.stringify(entries), 'utf-8').digest('hex')
  }
}

function describeSource(layer: Pick<ConfigLayer, 'source' | 'origin'>): string {
  switch (layer.source) {
    case 'default':
      return 'built-in defaults'
    case 'file':
      return layer.origin ? `config file ${layer.origin}` : 'config file'
    case 'override':
      return 'command-line overrides'
  }
}

interface Picked<T> {
  value: T
  provenance: OptionProvenance
}

export class ConfigMerger {
  /**
   * Merge layers into one validated, immutable configuration.
   * Built-in defaults always sit below the given layers.
   */
  merge(layers: ConfigLayer[], location?: LocatedConfig): ResolvedConfig {
    for (const layer of layers) {
      this.validateLayer(layer)
    }

    const provenance = new Map<OptionName, OptionProvenance>()
    const pick = <K extends OptionName>(name: K): ConfigValues[K] => {
      const picked = this.pick(name, layers)
      provenance.set(name, picked.provenance)
      return picked.value
    }

    const values: ConfigValues = {
      'line-length': pick('line-length'),
      'target-version': pick('target-version'),
      include: pick('include'),
      exclude: pick('exclude'),
      'extend-exclude': pick('extend-exclude'),
      'force-exclude': pick('force-exclude'),
      'skip-string-normalization': pick('skip-string-normalization'),
      'skip-magic-trailing-comma': pick('skip-magic-trailing-comma'),
    }

    return new ResolvedConfig({
      values,
      provenance,
      projectRoot: location?.projectRoot ?? process.cwd(),
      rootReason: location?.rootReason ?? 'working directory',
      configPath: location?.configPath ?? null,
      configKind: location?.configKind ?? 'none',
    })
  }

  /**
   * Reject unknown names and values that do not match the declared type.
   */
  validateLayer(layer: ConfigLayer): void {
    for (const [name, value] of Object.entries(layer.values)) {
      if (!isOptionName(name)) {
        throw new ConfigurationError(
          `Unknown option '${name}' in ${describeSource(layer)}`,
          layer.source,
          name,
          layer.origin,
        )
      }
      if (value === undefined) continue

      const result = OPTION_SPECS[name].coerce(value)
      if (!result.ok) {
        throw new ConfigurationError(
          `Invalid value for option '${name}' in ${describeSource(layer)}: ${result.reason}`,
          layer.source,
          name,
          layer.origin,
        )
      }
    }
  }

  private pick<K extends OptionName>(name: K, layers: ConfigLayer[]): Picked<ConfigValues[K]> {
    const spec = OPTION_SPECS[name]

    for (const rule of PRECEDENCE_RULES) {
      for (let i = layers.length - 1; i >= 0; i--) {
        const layer = layers[i]
        if (layer.source !== rule) continue

        const raw = layer.values[name]
        if (raw === undefined) continue

        const result = spec.coerce(raw)
        if (result.ok) {
          return {
            value: result.value,
            provenance: layer.origin ? { source: layer.source, origin: layer.origin } : { source: layer.source },
          }
        }
      }
    }

    return { value: defaultValues()[name], provenance: { source: 'default' } }
  }
}
