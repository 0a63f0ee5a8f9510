/**
 * Compiles a user-supplied path pattern. Patterns spanning several lines are
 * verbose: unescaped whitespace and `#` comments outside a character class
 * are dropped before compiling, so long exclusion lists can be written one
 * alternative per line in YAML block scalars.
 *
 * Throws the engine's SyntaxError for invalid expressions.
 */
export function compilePattern(source: string): RegExp {
  const body = source.includes('\n') ? stripVerbose(source) : source
  return new RegExp(translateGroups(body))
}

/**
 * Named groups are written `(?P<name>...)` / `(?P=name)` in most existing
 * formatter configs; rewrite them to the `(?<name>...)` / `\k<name>` form.
 */
function translateGroups(body: string): string {
  return body.replace(/\(\?P</g, '(?<').replace(/\(\?P=(\w+)\)/g, '\\k<$1>')
}

function stripVerbose(source: string): string {
  let out = ''
  let inClass = false

  for (let i = 0; i < source.length; i++) {
    const ch = source[i]

    if (ch === '\\' && i + 1 < source.length) {
      out += ch + source[i + 1]
      i++
      continue
    }

    if (inClass) {
      if (ch === ']') inClass = false
      out += ch
      continue
    }

    if (ch === '[') {
      inClass = true
      out += ch
    } else if (ch === '#') {
      while (i + 1 < source.length && source[i + 1] !== '\n') i++
    } else if (!/\s/.test(ch)) {
      out += ch
    }
  }

  return out
}
