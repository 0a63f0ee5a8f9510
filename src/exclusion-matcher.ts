import path from 'node:path'
import type { ResolvedConfig } from './config-merger.js'
import { compilePattern } from './patterns.js'
import type { ExclusionDecision, PathPattern, PatternRole } from './types.js'

/**
 * How a candidate reached the matcher. Files the user named directly are
 * only subject to force-exclude; discovered files go through every rule.
 */
export type CandidateOrigin = 'explicit' | 'discovered'

interface ExclusionRule {
  role: PatternRole
  appliesTo: readonly CandidateOrigin[]
  /** True when the rule settles the decision for this path. */
  decides(pattern: RegExp, normalizedPath: string): boolean
}

const matches = (pattern: RegExp, normalizedPath: string) => pattern.test(normalizedPath)

/**
 * Ordered rules; the first one that decides excludes the file.
 */
export const EXCLUSION_RULES: readonly ExclusionRule[] = [
  { role: 'force-exclude', appliesTo: ['explicit', 'discovered'], decides: matches },
  { role: 'include', appliesTo: ['discovered'], decides: (p, s) => !matches(p, s) },
  { role: 'exclude', appliesTo: ['discovered'], decides: matches },
  // Added on top of exclude, never replacing it
  { role: 'extend-exclude', appliesTo: ['discovered'], decides: matches },
]

/**
 * Normalise a path for matching: forward slashes, leading slash, relative to
 * the project root. Patterns search anywhere in this string.
 */
export function normalizeCandidate(filePath: string, projectRoot?: string): string {
  let relative = filePath
  if (projectRoot && path.isAbsolute(filePath)) {
    relative = path.relative(projectRoot, filePath)
  }
  relative = relative.replace(/\\/g, '/').replace(/^(\.\/)+/, '')
  return relative.startsWith('/') ? relative : `/${relative}`
}

/**
 * ExclusionMatcher decides whether a file takes part in a run.
 *
 * Responsibilities:
 * - Compile include/exclude/extend-exclude/force-exclude from a config
 * - Evaluate the rules in fixed precedence order for each candidate
 * - Report which rule decided, for diagnostics
 */
export class ExclusionMatcher {
  readonly patterns: readonly PathPattern[]
  private projectRoot?: string

  constructor(patterns: Partial<Record<PatternRole, string | null>>, projectRoot?: string) {
    this.projectRoot = projectRoot
    this.patterns = EXCLUSION_RULES.flatMap((rule, rank) => {
      const source = patterns[rule.role]
      return source ? [{ role: rule.role, rank, source, regex: compilePattern(source) }] : []
    })
  }

  static fromConfig(config: ResolvedConfig): ExclusionMatcher {
    return new ExclusionMatcher(
      {
        include: config.get('include'),
        exclude: config.get('exclude'),
        'extend-exclude': config.get('extend-exclude'),
        'force-exclude': config.get('force-exclude'),
      },
      config.projectRoot,
    )
  }

  /**
   * Decide one file. Relative paths are taken as relative to the project root.
   *
   * @param filePath - Absolute, or relative to the project root
   * @param origin - Whether the user named this file or it was discovered
   */
  decide(filePath: string, origin: CandidateOrigin = 'discovered'): ExclusionDecision {
    const normalized = normalizeCandidate(filePath, this.projectRoot)

    for (const rule of EXCLUSION_RULES) {
      if (!rule.appliesTo.includes(origin)) continue

      const pattern = this.patterns.find((p) => p.role === rule.role)
      // A missing include pattern admits everything; other missing patterns match nothing
      if (!pattern) continue

      if (rule.decides(pattern.regex, normalized)) {
        return { included: false, rule: rule.role }
      }
    }

    return { included: true, rule: null }
  }

  isIncluded(filePath: string, origin: CandidateOrigin = 'discovered'): boolean {
    return this.decide(filePath, origin).included
  }

  /**
   * Batch operation: split paths into included and excluded lists.
   */
  partition(
    filePaths: string[],
    origin: CandidateOrigin = 'discovered',
  ): { included: string[]; excluded: string[] } {
    const included: string[] = []
    const excluded: string[] = []

    for (const filePath of filePaths) {
      if (this.isIncluded(filePath, origin)) {
        included.push(filePath)
      } else {
        excluded.push(filePath)
      }
    }

    return { included, excluded }
  }
}
