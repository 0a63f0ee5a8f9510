import { describe, expect, it } from 'vitest'
import { compilePattern } from './patterns.js'

describe('compilePattern', () => {
  it('searches anywhere in the path', () => {
    const regex = compilePattern(String.raw`\.pyi?$`)
    expect(regex.test('/pkg/module.py')).toBe(true)
    expect(regex.test('/pkg/module.pyi')).toBe(true)
    expect(regex.test('/pkg/module.pyc')).toBe(false)
  })

  it('strips whitespace and comments from multi-line patterns', () => {
    const regex = compilePattern(
      ['(', '  /generated/   # code generators', '  | /vendor/', ')'].join('\n'),
    )
    expect(regex.test('/generated/models.py')).toBe(true)
    expect(regex.test('/src/vendor/lib.py')).toBe(true)
    expect(regex.test('/src/generated_models.py')).toBe(false)
  })

  it('keeps escaped whitespace and character classes in verbose patterns', () => {
    const regex = compilePattern('a\\ b\n[# ]x')
    expect(regex.source).toBe('a\\ b[# ]x')
  })

  it('rewrites named groups to the JavaScript form', () => {
    const regex = compilePattern('(?P<dir>build)/(?P=dir)')
    expect(regex.source).toBe('(?<dir>build)\\/\\k<dir>')
    expect(regex.test('/build/build')).toBe(true)
  })

  it('throws on invalid expressions', () => {
    expect(() => compilePattern('(unclosed')).toThrow(SyntaxError)
  })
})
