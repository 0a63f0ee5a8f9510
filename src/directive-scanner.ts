import { DirectiveError } from './errors.js'
import { type LineInfo, splitLines, tokenizeLines } from './line-tokenizer.js'
import type {
  Diagnostic,
  DirectiveSpan,
  ScanResult,
  SpanKind,
  UnmatchedPausePolicy,
} from './types.js'

export const SKIP_MARKERS = ['fmt: skip', 'fmt:skip'] as const
export const PAUSE_MARKERS = ['fmt: off', 'fmt:off', 'yapf: disable'] as const
export const RESUME_MARKERS = ['fmt: on', 'fmt:on', 'yapf: enable'] as const

type ScanState = SpanKind
type Trigger = 'pause' | 'resume'

// Triggers missing from a state's row leave the state unchanged
const TRANSITIONS: Record<ScanState, Partial<Record<Trigger, ScanState>>> = {
  formattable: { pause: 'preserved' },
  preserved: { resume: 'formattable' },
}

export interface DirectiveScannerOptions {
  unmatchedPause?: UnmatchedPausePolicy
}

function commentSegments(comment: string): string[] {
  return comment
    .split('#')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0)
}

function triggerOf(line: LineInfo): Trigger | null {
  // Pause and resume only count on a line of their own
  if (line.comment === null || line.hasCode) return null
  const body = line.comment.slice(1).trim()
  if (PAUSE_MARKERS.some((marker) => marker === body)) return 'pause'
  if (RESUME_MARKERS.some((marker) => marker === body)) return 'resume'
  return null
}

function hasSkipMarker(line: LineInfo): boolean {
  if (line.comment === null) return false
  return commentSegments(line.comment).some((segment) =>
    SKIP_MARKERS.some((marker) => marker === segment),
  )
}

/**
 * Collapse per-line kinds into maximal runs.
 */
export function toSpans(kinds: SpanKind[]): DirectiveSpan[] {
  const spans: DirectiveSpan[] = []
  kinds.forEach((kind, index) => {
    const line = index + 1
    const last = spans[spans.length - 1]
    if (last && last.kind === kind) {
      last.end = line
    } else {
      spans.push({ start: line, end: line, kind })
    }
  })
  return spans
}

/**
 * DirectiveScanner splits a file into formattable and preserved spans.
 *
 * A two-state machine walks the lines once. `# fmt: off` on its own line
 * moves to preserved, `# fmt: on` on its own line moves back; both marker
 * lines are preserved. A trailing `# fmt: skip` preserves the whole logical
 * statement ending on that line.
 */
export class DirectiveScanner {
  private unmatchedPause: UnmatchedPausePolicy

  constructor(options: DirectiveScannerOptions = {}) {
    this.unmatchedPause = options.unmatchedPause ?? 'extend-to-eof'
  }

  scan(text: string): ScanResult {
    return this.scanLines(splitLines(text))
  }

  scanLines(lines: string[]): ScanResult {
    const infos = tokenizeLines(lines)
    const kinds: SpanKind[] = []
    const diagnostics: Diagnostic[] = []
    let state: ScanState = 'formattable'
    let pausedAt = 0

    for (const line of infos) {
      const trigger = triggerOf(line)
      const next: ScanState | undefined = trigger ? TRANSITIONS[state][trigger] : undefined

      if (trigger === 'resume' && state === 'formattable') {
        diagnostics.push({
          code: 'unmatched-resume',
          line: line.number,
          message: 'resume marker without a preceding pause marker has no effect',
        })
      }
      if (next === 'preserved') pausedAt = line.number

      kinds.push(state === 'preserved' || next === 'preserved' ? 'preserved' : 'formattable')
      if (next) state = next

      if (hasSkipMarker(line)) {
        if (line.hasCode && line.endsStatement) {
          for (let n = line.statementStart; n <= line.number; n++) {
            kinds[n - 1] = 'preserved'
          }
        } else {
          diagnostics.push({
            code: 'misplaced-skip',
            line: line.number,
            message: 'skip marker must trail the last line of a statement; ignored',
          })
        }
      }
    }

    if (state === 'preserved') {
      const message = `pause marker on line ${pausedAt} has no matching resume marker`
      if (this.unmatchedPause === 'error') {
        throw new DirectiveError(message, pausedAt)
      }
      diagnostics.push({
        code: 'unterminated-pause',
        line: pausedAt,
        message: `${message}; preserving through end of file`,
      })
    }

    return { lineCount: infos.length, spans: toSpans(kinds), diagnostics }
  }
}
