import { RangeRequestError } from './errors.js'
import type { LineRange } from './types.js'

const RANGE_RE = /^\s*(\d+)\s*-\s*(\d+)\s*$/

/**
 * Parse a `START-END` request (1-indexed, inclusive).
 */
export function parseLineRange(input: string): LineRange {
  const match = RANGE_RE.exec(input)
  if (!match) {
    throw new RangeRequestError(
      `Invalid line range "${input}": expected START-END with positive integers, e.g. 10-20`,
      input,
    )
  }
  return validateLineRange({ start: Number(match[1]), end: Number(match[2]) }, input)
}

export function parseLineRanges(inputs: string[]): LineRange[] {
  return inputs.map(parseLineRange)
}

export function validateLineRange(range: LineRange, input = `${range.start}-${range.end}`): LineRange {
  const { start, end } = range
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new RangeRequestError(`Invalid line range "${input}": bounds must be integers`, input)
  }
  if (start < 1) {
    throw new RangeRequestError(`Invalid line range "${input}": lines start at 1`, input)
  }
  if (start > end) {
    throw new RangeRequestError(
      `Invalid line range "${input}": start ${start} is after end ${end}`,
      input,
    )
  }
  return { start, end }
}

/**
 * Sort and merge overlapping or adjacent ranges.
 */
export function unionRanges(ranges: readonly LineRange[]): LineRange[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end)
  const merged: LineRange[] = []

  for (const range of sorted) {
    const last = merged[merged.length - 1]
    if (last && range.start <= last.end + 1) {
      last.end = Math.max(last.end, range.end)
    } else {
      merged.push({ start: range.start, end: range.end })
    }
  }

  return merged
}

export function formatRange(range: LineRange): string {
  return range.start === range.end ? `${range.start}` : `${range.start}-${range.end}`
}
