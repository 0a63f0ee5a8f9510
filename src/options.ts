import { compilePattern } from './patterns.js'
import {
  type ConfigValues,
  type OptionName,
  type OptionType,
  TARGET_VERSIONS,
  type TargetVersion,
} from './types.js'

export const DEFAULT_LINE_LENGTH = 88
export const DEFAULT_INCLUDES = String.raw`(\.pyi?|\.ipynb)$`
export const DEFAULT_EXCLUDES = String.raw`/(\.direnv|\.eggs|\.git|\.hg|\.ipynb_checkpoints|\.mypy_cache|\.nox|\.pytest_cache|\.ruff_cache|\.tox|\.svn|\.venv|\.vscode|__pypackages__|_build|buck-out|build|dist|venv)/`

export type Coerced<T> = { ok: true; value: T } | { ok: false; reason: string }

export interface OptionSpec<T> {
  type: OptionType
  description: string
  default: T
  regex?: boolean
  coerce(value: unknown): Coerced<T>
}

export const OPTION_NAMES: readonly OptionName[] = [
  'line-length',
  'target-version',
  'include',
  'exclude',
  'extend-exclude',
  'force-exclude',
  'skip-string-normalization',
  'skip-magic-trailing-comma',
]

export function isOptionName(name: string): name is OptionName {
  return OPTION_NAMES.some((option) => option === name)
}

export function isTargetVersion(value: unknown): value is TargetVersion {
  return TARGET_VERSIONS.some((version) => version === value)
}

function typeName(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'list'
  return typeof value
}

function positiveInteger(value: unknown): Coerced<number> {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return { ok: false, reason: `expected integer, got ${typeName(value)}` }
  }
  if (value < 1) {
    return { ok: false, reason: `expected a positive integer, got ${value}` }
  }
  return { ok: true, value }
}

function boolean(value: unknown): Coerced<boolean> {
  return typeof value === 'boolean'
    ? { ok: true, value }
    : { ok: false, reason: `expected boolean, got ${typeName(value)}` }
}

function targetVersions(value: unknown): Coerced<TargetVersion[]> {
  if (!Array.isArray(value)) {
    return { ok: false, reason: `expected list of strings, got ${typeName(value)}` }
  }
  const versions: TargetVersion[] = []
  for (const item of value) {
    if (!isTargetVersion(item)) {
      return {
        ok: false,
        reason: `unknown target version ${JSON.stringify(item)}, allowed values: ${TARGET_VERSIONS.join(', ')}`,
      }
    }
    if (!versions.includes(item)) versions.push(item)
  }
  return { ok: true, value: versions }
}

function pattern(value: unknown): Coerced<string> {
  if (typeof value !== 'string') {
    return { ok: false, reason: `expected regular expression string, got ${typeName(value)}` }
  }
  try {
    compilePattern(value)
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    return { ok: false, reason: `invalid regular expression: ${detail}` }
  }
  return { ok: true, value }
}

function optionalPattern(value: unknown): Coerced<string | null> {
  // An empty pattern would match every path; treat it as unset
  if (value === null || value === '') return { ok: true, value: null }
  return pattern(value)
}

export const OPTION_SPECS: { [K in OptionName]: OptionSpec<ConfigValues[K]> } = {
  'line-length': {
    type: 'integer',
    description: 'How many characters per line to allow',
    default: DEFAULT_LINE_LENGTH,
    coerce: positiveInteger,
  },
  'target-version': {
    type: 'string-list',
    description: 'Python versions that should be supported by the output',
    default: [],
    coerce: targetVersions,
  },
  include: {
    type: 'string',
    description: 'Files to include during directory recursion',
    default: DEFAULT_INCLUDES,
    regex: true,
    coerce: pattern,
  },
  exclude: {
    type: 'string',
    description: 'Files and directories to exclude during directory recursion',
    default: DEFAULT_EXCLUDES,
    regex: true,
    coerce: pattern,
  },
  'extend-exclude': {
    type: 'string',
    description: 'Additional exclusions on top of the exclude pattern',
    default: null,
    regex: true,
    coerce: optionalPattern,
  },
  'force-exclude': {
    type: 'string',
    description: 'Exclusions that apply even to explicitly named files',
    default: null,
    regex: true,
    coerce: optionalPattern,
  },
  'skip-string-normalization': {
    type: 'boolean',
    description: "Don't normalize string quotes or prefixes",
    default: false,
    coerce: boolean,
  },
  'skip-magic-trailing-comma': {
    type: 'boolean',
    description: "Don't use trailing commas as a reason to split lines",
    default: false,
    coerce: boolean,
  },
}

/**
 * Fresh copy of the built-in defaults.
 */
export function defaultValues(): ConfigValues {
  return {
    'line-length': OPTION_SPECS['line-length'].default,
    'target-version': [...OPTION_SPECS['target-version'].default],
    include: OPTION_SPECS.include.default,
    exclude: OPTION_SPECS.exclude.default,
    'extend-exclude': OPTION_SPECS['extend-exclude'].default,
    'force-exclude': OPTION_SPECS['force-exclude'].default,
    'skip-string-normalization': OPTION_SPECS['skip-string-normalization'].default,
    'skip-magic-trailing-comma': OPTION_SPECS['skip-magic-trailing-comma'].default,
  }
}
