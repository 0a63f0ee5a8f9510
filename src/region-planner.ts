import { readFile } from 'node:fs/promises'
import pLimit from 'p-limit'
import { CacheManager } from './cache-manager.js'
import type { ResolvedConfig } from './config-merger.js'
import { DirectiveScanner } from './directive-scanner.js'
import { workerCount } from './environment.js'
import { PathError, RangeRequestError, errorMessage, isSpanfmtError, systemErrorCode } from './errors.js'
import { ExclusionMatcher } from './exclusion-matcher.js'
import type { Candidate, FileResolver } from './file-resolver.js'
import { parseLineRange, validateLineRange } from './line-ranges.js'
import { intersect } from './range-intersector.js'
import type { RunContext } from './run-context.js'
import type {
  ExclusionDecision,
  FileFailure,
  FilePlan,
  LineRange,
  PlanSummary,
  UnmatchedPausePolicy,
} from './types.js'

export type ProgressCallback = (
  completed: number,
  total: number,
  path: string,
  cached: boolean,
) => void

export interface ExcludedFile {
  path: string
  rule: ExclusionDecision['rule']
}

interface RegionPlannerDeps {
  context: RunContext
  resolver: FileResolver
  cache?: CacheManager | null
  readFile?: (absolutePath: string) => Promise<string>
  readStdin?: () => Promise<string>
  onProgress?: ProgressCallback
}

export interface PlanOptions {
  /** `START-END` strings or parsed ranges; empty means the whole file. */
  lineRanges?: ReadonlyArray<string | LineRange>
  /** Explicit worker count; falls back to SPANFMT_NUM_WORKERS, then CPU count. */
  workers?: number
  unmatchedPause?: UnmatchedPausePolicy
}

export interface PlanRun {
  plans: FilePlan[]
  excluded: ExcludedFile[]
  failures: FileFailure[]
  summary: PlanSummary
  exitCode: number
}

export class RegionPlanner {
  constructor(private deps: RegionPlannerDeps) {}

  async run(inputs: string[], options: PlanOptions = {}): Promise<PlanRun> {
    const startTime = Date.now()

    // Range requests are validated before anything touches the filesystem
    const ranges = (options.lineRanges ?? []).map((range) =>
      typeof range === 'string' ? parseLineRange(range) : validateLineRange(range),
    )

    // One config governs every input; a config error aborts before any file is read
    const config = await this.deps.context.configFor(inputs)
    const matcher = ExclusionMatcher.fromConfig(config)

    const failures: FileFailure[] = []
    const excluded: ExcludedFile[] = []
    const planned: Candidate[] = []
    const seen = new Set<string>()

    const expanded = await Promise.all(inputs.map((input) => this.expandInput(input, failures)))
    for (const candidates of expanded) {
      for (const candidate of candidates) {
        const key = candidate.absolutePath ?? '-'
        if (seen.has(key)) continue
        seen.add(key)

        const decision = this.decide(candidate, matcher)
        if (decision.included) {
          planned.push(candidate)
        } else {
          excluded.push({ path: candidate.displayPath, rule: decision.rule })
        }
      }
    }

    if (ranges.length > 0 && planned.length > 1) {
      throw new RangeRequestError(
        `Line ranges apply to a single file, but ${planned.length} files were selected`,
        ranges.map((range) => `${range.start}-${range.end}`).join(','),
      )
    }

    this.deps.cache?.load()

    const unmatchedPause = options.unmatchedPause ?? 'extend-to-eof'
    const scanner = new DirectiveScanner({ unmatchedPause })
    const planKey = CacheManager.planKey(ranges, unmatchedPause)
    const limit = pLimit(workerCount(options.workers))
    const total = planned.length
    let completed = 0

    const outcomes = await Promise.all(
      planned.map((candidate) =>
        limit(async () => {
          try {
            const plan = await this.planFile(candidate, config, ranges, planKey, scanner)
            completed++
            this.deps.onProgress?.(completed, total, plan.path, plan.cached)
            return plan
          } catch (error) {
            // Path and directive problems fail this file only
            if (!isSpanfmtError(error) || error.code === 'CONFIG_ERROR' || error.code === 'RANGE_ERROR') {
              throw error
            }
            completed++
            this.deps.onProgress?.(completed, total, candidate.displayPath, false)
            failures.push({ path: candidate.displayPath, message: error.message })
            return null
          }
        }),
      ),
    )

    this.deps.cache?.save()

    const plans = outcomes.filter((plan): plan is FilePlan => plan !== null)
    const summary: PlanSummary = {
      total_files: plans.length,
      excluded: excluded.length,
      failed: failures.length,
      cached: plans.filter((plan) => plan.cached).length,
      regions: plans.reduce((sum, plan) => sum + plan.regions.length, 0),
      duration_ms: Date.now() - startTime,
    }

    return { plans, excluded, failures, summary, exitCode: failures.length > 0 ? 1 : 0 }
  }

  private async expandInput(input: string, failures: FileFailure[]): Promise<Candidate[]> {
    try {
      return await this.deps.resolver.expand(input)
    } catch (error) {
      if (error instanceof PathError) {
        failures.push({ path: input, message: error.message })
        return []
      }
      throw error
    }
  }

  private decide(candidate: Candidate, matcher: ExclusionMatcher): ExclusionDecision {
    // Unnamed stdin content has no path to match against
    if (candidate.absolutePath === null) {
      return { included: true, rule: null }
    }
    return matcher.decide(candidate.absolutePath, candidate.origin)
  }

  private async planFile(
    candidate: Candidate,
    config: ResolvedConfig,
    ranges: LineRange[],
    planKey: string,
    scanner: DirectiveScanner,
  ): Promise<FilePlan> {
    const text = await this.readCandidate(candidate)
    const cacheKey = candidate.stdin ? null : candidate.absolutePath
    const fileHash = CacheManager.hash(text)
    const configHash = config.fingerprint()

    if (cacheKey && this.deps.cache) {
      const hit = this.deps.cache.lookup(cacheKey, fileHash, configHash, planKey)
      if (hit) {
        this.deps.context.logger.debug(`Cache hit for ${candidate.displayPath}`)
        return {
          path: candidate.displayPath,
          ...hit,
          regions: hit.regions.map((region) => Object.freeze({ ...region })),
          cached: true,
        }
      }
    }

    const scan = scanner.scan(text)
    const plan: FilePlan = {
      path: candidate.displayPath,
      lineCount: scan.lineCount,
      spans: scan.spans,
      regions: intersect(scan.spans, ranges),
      diagnostics: scan.diagnostics,
      cached: false,
    }

    if (cacheKey && this.deps.cache) {
      this.deps.cache.store(cacheKey, fileHash, configHash, planKey, plan)
    }
    return plan
  }

  private async readCandidate(candidate: Candidate): Promise<string> {
    if (candidate.stdin) {
      if (!this.deps.readStdin) {
        throw new PathError('No stdin reader configured', '-')
      }
      try {
        return await this.deps.readStdin()
      } catch (error) {
        if (isSpanfmtError(error)) throw error
        throw new PathError(`Cannot read stdin: ${errorMessage(error)}`, '-', systemErrorCode(error))
      }
    }

    const target = candidate.absolutePath ?? candidate.displayPath
    try {
      return await (this.deps.readFile ?? ((file: string) => readFile(file, 'utf-8')))(target)
    } catch (error) {
      throw new PathError(
        `Cannot read ${candidate.displayPath}: ${errorMessage(error)}`,
        candidate.displayPath,
        systemErrorCode(error),
      )
    }
  }
}
