import { unionRanges, validateLineRange } from './line-ranges.js'
import type { DirectiveSpan, FormatRegion, LineRange } from './types.js'

/**
 * Intersect requested line ranges with the formattable spans of a file.
 *
 * With no ranges the whole file is requested. Ranges past the end of the
 * file are clipped, and a range that lies inside a preserved span simply
 * contributes nothing: directives always win over range requests. The
 * result is sorted, maximal and frozen.
 */
export function intersect(
  spans: readonly DirectiveSpan[],
  requested: readonly LineRange[] = [],
): FormatRegion[] {
  const formattable = spans.filter((span) => span.kind === 'formattable')
  if (formattable.length === 0) return []

  const lastLine = spans.reduce((last, span) => Math.max(last, span.end), 0)
  const wanted =
    requested.length === 0
      ? [{ start: 1, end: lastLine }]
      : unionRanges(requested.map((range) => validateLineRange(range)))

  const pieces: LineRange[] = []
  for (const span of formattable) {
    for (const range of wanted) {
      const start = Math.max(span.start, range.start)
      const end = Math.min(span.end, range.end)
      if (start <= end) pieces.push({ start, end })
    }
  }

  return unionRanges(pieces).map((region) => Object.freeze(region))
}

/**
 * Lines a rewrite engine must leave untouched: everything outside the regions.
 */
export function immutableLines(regions: readonly FormatRegion[], lineCount: number): LineRange[] {
  const gaps: LineRange[] = []
  let next = 1
  for (const region of regions) {
    if (region.start > next) gaps.push({ start: next, end: region.start - 1 })
    next = region.end + 1
  }
  if (next <= lineCount) gaps.push({ start: next, end: lineCount })
  return gaps
}
