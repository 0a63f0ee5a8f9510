import { describe, expect, it } from 'vitest'
import { splitLines, tokenizeLines } from './line-tokenizer.js'

describe('splitLines', () => {
  it('handles every newline style', () => {
    expect(splitLines('a\r\nb\rc\nd')).toEqual(['a', 'b', 'c', 'd'])
  })

  it('does not count a trailing newline as a line', () => {
    expect(splitLines('a\n')).toEqual(['a'])
    expect(splitLines('a\n\n')).toEqual(['a', ''])
    expect(splitLines('')).toEqual([])
  })
})

describe('tokenizeLines', () => {
  it('finds trailing comments outside strings', () => {
    const [info] = tokenizeLines(['x = "# not a comment"  # real'])
    expect(info.comment).toBe('# real')
    expect(info.hasCode).toBe(true)
    expect(info.endsStatement).toBe(true)
  })

  it('marks comment-only lines as having no code', () => {
    const [info] = tokenizeLines(['    # fmt: off'])
    expect(info).toMatchObject({ comment: '# fmt: off', hasCode: false })
  })

  it('tracks statements across brackets', () => {
    const infos = tokenizeLines(['call(', '    a,', ')'])
    expect(infos.map((info) => info.statementStart)).toEqual([1, 1, 1])
    expect(infos.map((info) => info.endsStatement)).toEqual([false, false, true])
  })

  it('tracks statements across backslash continuations', () => {
    const infos = tokenizeLines(['x = 1 + \\', '    2', 'y = 3'])
    expect(infos.map((info) => info.statementStart)).toEqual([1, 1, 3])
    expect(infos[0].endsStatement).toBe(false)
  })

  it('treats lines inside triple-quoted strings as code without comments', () => {
    const infos = tokenizeLines(['doc = """', '# fmt: off', '"""'])
    expect(infos[1]).toMatchObject({ comment: null, hasCode: true, statementStart: 1 })
    expect(infos[2].endsStatement).toBe(true)
  })

  it('closes an unterminated single-quoted string at the end of the line', () => {
    const infos = tokenizeLines(["s = 'oops", '# comment'])
    expect(infos[0].endsStatement).toBe(true)
    expect(infos[1]).toMatchObject({ comment: '# comment', hasCode: false, statementStart: 2 })
  })

  it('continues a single-quoted string after an escaped newline', () => {
    const infos = tokenizeLines(["s = 'a\\", "b'  # tail"])
    expect(infos[0].endsStatement).toBe(false)
    expect(infos[1]).toMatchObject({ comment: '# tail', statementStart: 1, endsStatement: true })
  })
})
