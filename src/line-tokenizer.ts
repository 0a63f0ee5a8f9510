export interface LineInfo {
  number: number // 1-indexed
  text: string
  comment: string | null // trailing comment outside any string, including '#'
  hasCode: boolean // anything besides whitespace and the comment
  statementStart: number // first line of the logical statement this line belongs to
  endsStatement: boolean // the logical statement is complete at the end of this line
}

interface OpenString {
  quote: '"' | "'"
  triple: boolean
}

/**
 * Split source text into physical lines. A trailing newline does not start
 * another line, and empty text has no lines.
 */
export function splitLines(text: string): string[] {
  if (text === '') return []
  const lines = text.split(/\r\n|\r|\n/)
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}

/**
 * Single forward pass over the lines, tracking just enough lexical state to
 * find comments and statement boundaries: open strings (single or triple
 * quoted, with escapes), bracket depth and backslash continuations.
 * Malformed input never throws; an unterminated single-quoted string ends at
 * the end of its line.
 */
export function tokenizeLines(lines: string[]): LineInfo[] {
  const infos: LineInfo[] = []
  let open: OpenString | null = null
  let depth = 0
  let continued = false
  let statementStart = 1

  lines.forEach((text, index) => {
    const number = index + 1
    const insideStatement = open !== null || depth > 0 || continued
    if (!insideStatement) statementStart = number

    let comment: string | null = null
    let hasCode = open !== null
    let escapedEol = false
    continued = false

    for (let i = 0; i < text.length; i++) {
      const ch = text[i]

      if (open) {
        if (ch === '\\') {
          if (i === text.length - 1) escapedEol = true
          i++
        } else if (open.triple ? text.startsWith(open.quote.repeat(3), i) : ch === open.quote) {
          if (open.triple) i += 2
          open = null
        }
        continue
      }

      if (ch === '#') {
        comment = text.slice(i)
        break
      }
      if (ch === '\\' && i === text.length - 1) {
        continued = true
        break
      }
      if (/\s/.test(ch)) continue

      hasCode = true
      if (ch === '"' || ch === "'") {
        const triple = text.startsWith(ch.repeat(3), i)
        open = { quote: ch, triple }
        if (triple) i += 2
      } else if (ch === '(' || ch === '[' || ch === '{') {
        depth++
      } else if (ch === ')' || ch === ']' || ch === '}') {
        depth = Math.max(0, depth - 1)
      }
    }

    if (open && !open.triple && !escapedEol) {
      open = null
    }

    infos.push({
      number,
      text,
      comment,
      hasCode,
      statementStart,
      endsStatement: open === null && depth === 0 && !continued,
    })
  })

  return infos
}
