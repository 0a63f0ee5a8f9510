import chalk from 'chalk'
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { ConfigMerger } from './config-merger.js'
import type { PlanRun } from './region-planner.js'
import { Reporter } from './reporter.js'

describe('Reporter', () => {
  const originalLevel = chalk.level
  let lines: string[]
  let reporter: Reporter

  beforeAll(() => {
    chalk.level = 0
  })

  afterAll(() => {
    chalk.level = originalLevel
  })

  beforeEach(() => {
    lines = []
    reporter = new Reporter((line) => lines.push(line))
  })

  const run: PlanRun = {
    plans: [
      {
        path: 'src/app.py',
        lineCount: 10,
        spans: [
          { start: 1, end: 2, kind: 'formattable' },
          { start: 3, end: 7, kind: 'preserved' },
          { start: 8, end: 10, kind: 'formattable' },
        ],
        regions: [
          { start: 2, end: 2 },
          { start: 8, end: 9 },
        ],
        diagnostics: [
          { code: 'unmatched-resume', line: 9, message: 'resume marker without a preceding pause marker has no effect' },
        ],
        cached: false,
      },
      { path: 'src/empty.py', lineCount: 0, spans: [], regions: [], diagnostics: [], cached: true },
    ],
    excluded: [{ path: 'build/gen.py', rule: 'exclude' }],
    failures: [{ path: 'missing.py', message: 'Path missing.py does not exist' }],
    summary: { total_files: 2, excluded: 1, failed: 1, cached: 1, regions: 2, duration_ms: 1500 },
    exitCode: 1,
  }

  it('prints regions, preserved spans, diagnostics, failures and a summary', () => {
    reporter.report(run)

    expect(lines).toEqual([
      '  src/app.py',
      '    format  2, 8-9',
      '    preserved  3-7',
      '    warn  unmatched-resume  line 9: resume marker without a preceding pause marker has no effect',
      '  src/empty.py',
      '    empty file',
      '  error  missing.py: Path missing.py does not exist',
      '',
      '  2 files planned, 2 regions, 1 excluded, 1 cached, 1 failed, 1.5s',
    ])
  })

  it('lists excluded files when verbose', () => {
    reporter.report(run, { verbose: true })
    expect(lines).toContain('  build/gen.py excluded by exclude')
  })

  it('marks cached plans and files without formattable regions', () => {
    reporter.report({
      ...run,
      plans: [
        {
          path: 'a.py',
          lineCount: 2,
          spans: [{ start: 1, end: 2, kind: 'formattable' }],
          regions: [{ start: 1, end: 2 }],
          diagnostics: [],
          cached: true,
        },
        {
          path: 'b.py',
          lineCount: 2,
          spans: [{ start: 1, end: 2, kind: 'preserved' }],
          regions: [],
          diagnostics: [],
          cached: false,
        },
      ],
      failures: [],
      summary: { total_files: 1, excluded: 0, failed: 0, cached: 1, regions: 1, duration_ms: 40 },
    })

    expect(lines).toEqual([
      '  a.py',
      '    format  1-2 (cached)',
      '  b.py',
      '    no formattable regions',
      '    preserved  1-2',
      '',
      '  1 file planned, 1 region, 0 excluded, 1 cached, 0.0s',
    ])
  })

  it('formats the effective config with provenance', () => {
    const config = new ConfigMerger().merge(
      [
        { source: 'file', origin: '/repo/spanfmt.yml', values: { 'line-length': 100, 'target-version': ['py311', 'py312'] } },
        { source: 'override', values: { 'skip-string-normalization': true } },
      ],
      { projectRoot: '/repo', rootReason: 'config file', configPath: '/repo/spanfmt.yml', configKind: 'project' },
    )

    const formatted = reporter.formatConfig(config)
    expect(formatted.slice(0, 4)).toEqual([
      '  Project root: /repo (config file)',
      '  Config file: /repo/spanfmt.yml',
      '  line-length: 100 (file: /repo/spanfmt.yml)',
      '  target-version: [py311, py312] (file: /repo/spanfmt.yml)',
    ])
    expect(formatted).toContain('  extend-exclude: unset (default)')
    expect(formatted).toContain('  skip-string-normalization: true (override)')
  })
})
