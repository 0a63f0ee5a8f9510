import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import chalk from 'chalk'
import { type Mock, afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import { type CliIO, createProgram, overridesFrom } from './cli.js'

describe('CLI', () => {
  const originalLevel = chalk.level
  let tempDir: string
  let out: string[]
  let err: string[]
  let exit: Mock<(code: number) => void>

  const write = (relative: string, content = '') => {
    const file = path.join(tempDir, relative)
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, content)
    return file
  }

  const runCli = async (args: string[], io: Partial<CliIO> = {}) => {
    const program = createProgram({
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      exit,
      cwd: tempDir,
      environment: {
        env: { SPANFMT_CACHE_DIR: path.join(tempDir, 'cache'), SPANFMT_NUM_WORKERS: '2' },
        platform: 'linux',
        homedir: tempDir,
      },
      readStdin: async () => '',
      ...io,
    })
    await program.parseAsync(args, { from: 'user' })
  }

  beforeAll(() => {
    chalk.level = 0
  })

  afterAll(() => {
    chalk.level = originalLevel
  })

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'spanfmt-cli-')))
    fs.mkdirSync(path.join(tempDir, '.git'))
    write('repo/spanfmt.yml', 'line-length: 100\n')
    write('repo/app.py', 'import os\n# fmt: off\nx  =  1\n# fmt: on\ny = 2\n')
    write('repo/lib.py', 'z = 3\n')
    out = []
    err = []
    exit = vi.fn<(code: number) => void>()
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('regions command', () => {
    it('prints the regions of a file and exits 0', async () => {
      await runCli(['regions', 'repo/app.py', '--no-cache'])

      expect(out.slice(0, 3)).toEqual(['  repo/app.py', '    format  1, 5', '    preserved  2-4'])
      expect(exit).toHaveBeenCalledWith(0)
    })

    it('prints the plan as JSON', async () => {
      await runCli(['regions', 'repo', '--json', '--no-cache'])

      const parsed: unknown = JSON.parse(out.join('\n'))
      expect(parsed).toMatchObject({
        plans: [{ path: 'repo/app.py' }, { path: 'repo/lib.py' }],
        excluded: [{ path: 'repo/spanfmt.yml', rule: 'include' }],
        summary: { total_files: 2, excluded: 1, failed: 0 },
      })
    })

    it('narrows to requested line ranges', async () => {
      await runCli(['regions', 'repo/app.py', '--line-ranges', '3-5', '--no-cache'])
      expect(out[1]).toBe('    format  5')
    })

    it('exits 2 when line ranges cover several files', async () => {
      await runCli(['regions', 'repo', '--line-ranges', '1-2', '--no-cache'])

      expect(err).toEqual(['Error: Line ranges apply to a single file, but 2 files were selected'])
      expect(exit).toHaveBeenCalledWith(2)
    })

    it('exits 2 for an invalid option value', async () => {
      await runCli(['regions', 'repo', '--line-length', 'wide', '--no-cache'])

      expect(err).toEqual([
        "Error: Invalid value for option 'line-length' in command-line overrides: expected integer, got number",
      ])
      expect(exit).toHaveBeenCalledWith(2)
    })

    it('exits 1 when a file fails under strict directives', async () => {
      write('repo/open.py', '# fmt: off\nx = 1\n')
      await runCli(['regions', 'repo/open.py', '--strict-directives', '--no-cache'])

      expect(out).toContain('  error  repo/open.py: pause marker on line 1 has no matching resume marker')
      expect(exit).toHaveBeenCalledWith(1)
    })

    it('plans content from stdin under its stdin filename', async () => {
      await runCli(['regions', '-', '--stdin-filename', 'repo/piped.py', '--no-cache'], {
        readStdin: async () => 'a = 1  # fmt: skip\nb = 2\n',
      })

      expect(out.slice(0, 3)).toEqual(['  repo/piped.py', '    format  2', '    preserved  1'])
    })
  })

  describe('config command', () => {
    it('shows effective values with their sources', async () => {
      await runCli(['config', 'repo', '--target-version', 'py311', '--target-version', 'py312'])

      expect(out).toContain('repo:')
      expect(out).toContain(`  Config file: ${path.join(tempDir, 'repo', 'spanfmt.yml')}`)
      expect(out).toContain(`  line-length: 100 (file: ${path.join(tempDir, 'repo', 'spanfmt.yml')})`)
      expect(out).toContain('  target-version: [py311, py312] (override)')
      expect(exit).toHaveBeenCalledWith(0)
    })

    it('resolves one config for all paths from their common base', async () => {
      write('proj/a/spanfmt.yml', 'line-length: 120\n')
      write('proj/b/y.py', 'y = 2\n')

      await runCli(['config', 'proj/a', 'proj/b'])

      expect(out.slice(0, 3)).toEqual([
        'proj/a proj/b:',
        `  Project root: ${tempDir} (.git directory)`,
        '  Config file: none, using defaults',
      ])
      expect(out).toContain('  line-length: 88 (default)')
      expect(exit).toHaveBeenCalledWith(0)
    })

    it('exits 2 for an unreadable explicit config', async () => {
      await runCli(['config', '--config', 'missing.yml'])

      expect(err[0]).toMatch(/^Error: Cannot read config file missing.yml:/)
      expect(exit).toHaveBeenCalledWith(2)
    })
  })

  describe('cache commands', () => {
    it('reports and clears the region cache', async () => {
      await runCli(['regions', 'repo/app.py'])
      out = []

      await runCli(['cache', 'status'])
      expect(out[0]).toBe(`Cache file: ${path.join(tempDir, 'cache', 'regions.json')}`)
      expect(out[1]).toBe('Cache entries: 1')

      out = []
      await runCli(['cache', 'clear'])
      expect(out).toEqual(['✓ Cache cleared'])
      expect(fs.existsSync(path.join(tempDir, 'cache', 'regions.json'))).toBe(false)
    })
  })
})

describe('overridesFrom', () => {
  it('maps flags to option names', () => {
    expect(
      overridesFrom({
        lineLength: '72',
        targetVersion: ['py39'],
        extendExclude: '/gen/',
        skipMagicTrailingComma: true,
        skipStringNormalization: false,
      }),
    ).toEqual({
      'line-length': 72,
      'target-version': ['py39'],
      'extend-exclude': '/gen/',
      'skip-magic-trailing-comma': true,
    })
  })

  it('leaves unset flags out', () => {
    expect(overridesFrom({})).toEqual({})
  })
})
