import { TARGET_VERSIONS, type TargetVersion } from './types.js'

const OPERATORS = ['~=', '==', '!=', '<=', '>=', '<', '>', '==='] as const
type Operator = (typeof OPERATORS)[number]

interface Specifier {
  op: Operator
  release: number[]
  wildcard: boolean
  raw: string
}

const VERSION_RE = /^\s*v?(\d+(?:\.\d+)*)\s*$/
const SPECIFIER_RE = /^\s*(~=|===|==|!=|<=|>=|<|>)\s*v?(\d+(?:\.\d+)*)(\.\*)?\s*$/

function minorOf(version: TargetVersion): number {
  return Number(version.slice(3))
}

function compareRelease(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0) return diff
  }
  return 0
}

function hasPrefix(release: number[], prefix: number[]): boolean {
  return prefix.every((part, i) => (release[i] ?? 0) === part)
}

function parseSpecifier(text: string): Specifier | null {
  const match = SPECIFIER_RE.exec(text)
  if (!match) return null

  const [, op, version, wildcard] = match
  const operator = OPERATORS.find((candidate) => candidate === op)
  if (!operator) return null

  const spec: Specifier = {
    op: operator,
    release: version.split('.').map(Number),
    wildcard: wildcard !== undefined,
    raw: `${version}${wildcard ?? ''}`,
  }

  // Wildcards are only valid with equality; ~= needs at least two components
  if (spec.wildcard && spec.op !== '==' && spec.op !== '!=') return null
  if (spec.op === '~=' && spec.release.length < 2) return null
  return spec
}

function admits(spec: Specifier, candidate: number[]): boolean {
  const cmp = compareRelease(candidate, spec.release)
  switch (spec.op) {
    case '==':
      return spec.wildcard ? hasPrefix(candidate, spec.release) : cmp === 0
    case '!=':
      return spec.wildcard ? !hasPrefix(candidate, spec.release) : cmp !== 0
    case '<=':
      return cmp <= 0
    case '>=':
      return cmp >= 0
    case '<':
      return cmp < 0
    case '>':
      return cmp > 0
    case '~=':
      return cmp >= 0 && hasPrefix(candidate, spec.release.slice(0, -1))
    case '===':
      return candidate.join('.') === spec.raw
  }
}

/**
 * Infers target versions from a `requires-python` value.
 *
 * A bare version (`3.8`) selects that single version. A specifier set
 * (`>=3.8,<3.11`) selects every known `3.N` release it admits. Returns null
 * when nothing can be inferred.
 */
export function inferTargetVersions(requiresPython: string): TargetVersion[] | null {
  const bare = VERSION_RE.exec(requiresPython)
  if (bare) {
    const release = bare[1].split('.').map(Number)
    if (release[0] !== 3 || release.length < 2) return null
    const version = TARGET_VERSIONS.find((v) => minorOf(v) === release[1])
    return version ? [version] : null
  }

  const specifiers: Specifier[] = []
  for (const part of requiresPython.split(',')) {
    const spec = parseSpecifier(part)
    if (!spec) return null
    specifiers.push(spec)
  }

  const compatible = TARGET_VERSIONS.filter((version) =>
    specifiers.every((spec) => admits(spec, [3, minorOf(version)])),
  )
  return compatible.length > 0 ? compatible : null
}
