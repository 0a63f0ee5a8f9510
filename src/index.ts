export { CacheManager } from './cache-manager.js'
export { ConfigCache, type ConfigCacheStats } from './config-cache.js'
export { ConfigLoader } from './config-loader.js'
export { ConfigLocator, PROJECT_CONFIG_NAMES, type ConfigLocatorOptions } from './config-locator.js'
export { ConfigMerger, PRECEDENCE_RULES, ResolvedConfig } from './config-merger.js'
export {
  DirectiveScanner,
  PAUSE_MARKERS,
  RESUME_MARKERS,
  SKIP_MARKERS,
  type DirectiveScannerOptions,
} from './directive-scanner.js'
export {
  CACHE_DIR_ENV,
  WORKERS_ENV,
  cacheDir,
  globalConfigPath,
  workerCount,
  type EnvironmentContext,
} from './environment.js'
export {
  ConfigurationError,
  DirectiveError,
  PathError,
  RangeRequestError,
  SpanfmtError,
  isSpanfmtError,
  type ErrorCode,
} from './errors.js'
export {
  EXCLUSION_RULES,
  ExclusionMatcher,
  normalizeCandidate,
  type CandidateOrigin,
} from './exclusion-matcher.js'
export { FileResolver, type Candidate } from './file-resolver.js'
export { formatRange, parseLineRange, parseLineRanges, unionRanges, validateLineRange } from './line-ranges.js'
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js'
export { DEFAULT_EXCLUDES, DEFAULT_INCLUDES, DEFAULT_LINE_LENGTH, OPTION_NAMES, OPTION_SPECS } from './options.js'
export { compilePattern } from './patterns.js'
export { immutableLines, intersect } from './range-intersector.js'
export { RegionPlanner, type PlanOptions, type PlanRun } from './region-planner.js'
export { Reporter } from './reporter.js'
export { RunContext, type RunContextOptions } from './run-context.js'
export { inferTargetVersions } from './target-versions.js'
export type * from './types.js'
