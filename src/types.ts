// --- Config Types ---

export const TARGET_VERSIONS = [
  'py33',
  'py34',
  'py35',
  'py36',
  'py37',
  'py38',
  'py39',
  'py310',
  'py311',
  'py312',
  'py313',
  'py314',
] as const

export type TargetVersion = (typeof TARGET_VERSIONS)[number]

export interface ConfigValues {
  'line-length': number
  'target-version': TargetVersion[]
  include: string
  exclude: string
  'extend-exclude': string | null
  'force-exclude': string | null
  'skip-string-normalization': boolean
  'skip-magic-trailing-comma': boolean
}

export type OptionName = keyof ConfigValues
export type OptionType = 'integer' | 'string' | 'string-list' | 'boolean'

// Precedence levels, lowest first
export type ConfigSourceKind = 'default' | 'file' | 'override'

export interface OptionProvenance {
  source: ConfigSourceKind
  origin?: string // config file path for file-sourced values
}

// Raw, not yet validated values of one precedence level
export interface ConfigLayer {
  source: ConfigSourceKind
  origin?: string
  values: Partial<Record<string, unknown>>
}

export type ConfigKind = 'explicit' | 'project' | 'global' | 'none'

export interface LocatedConfig {
  projectRoot: string
  rootReason: string // e.g. "config file", ".git directory", "file system root"
  configPath: string | null
  configKind: ConfigKind
}

// --- Path Types ---

export type PatternRole = 'include' | 'exclude' | 'extend-exclude' | 'force-exclude'

export interface PathPattern {
  role: PatternRole
  rank: number // evaluation order, lower runs first
  source: string
  regex: RegExp
}

export interface ExclusionDecision {
  included: boolean
  rule: PatternRole | null // rule that decided, null when nothing matched
}

// --- Span Types ---

export type SpanKind = 'formattable' | 'preserved'

// Lines are 1-indexed, both ends inclusive
export interface DirectiveSpan {
  start: number
  end: number
  kind: SpanKind
}

export interface LineRange {
  start: number
  end: number
}

export type FormatRegion = Readonly<LineRange>

export type DiagnosticCode = 'unterminated-pause' | 'unmatched-resume' | 'misplaced-skip'

export interface Diagnostic {
  code: DiagnosticCode
  line: number
  message: string
}

export type UnmatchedPausePolicy = 'extend-to-eof' | 'error'

export interface ScanResult {
  lineCount: number
  spans: DirectiveSpan[]
  diagnostics: Diagnostic[]
}

// --- Planning Types ---

export interface FilePlan {
  path: string // as given or discovered, relative to cwd when possible
  lineCount: number
  spans: DirectiveSpan[]
  regions: FormatRegion[]
  diagnostics: Diagnostic[]
  cached: boolean
}

export interface FileFailure {
  path: string
  message: string
}

export interface PlanSummary {
  total_files: number
  excluded: number
  failed: number
  cached: number
  regions: number
  duration_ms: number
}

// --- Cache Types ---

export interface CacheEntry {
  file_hash: string
  config_hash: string
  plan_key: string // requested ranges and unmatched-pause policy
  plan: Omit<FilePlan, 'path' | 'cached'>
  timestamp: string // ISO 8601
}

// Cache file: <cache dir>/regions.json
export interface CacheStore {
  version: 1
  entries: Record<string, CacheEntry> // key: absolute file path
}
