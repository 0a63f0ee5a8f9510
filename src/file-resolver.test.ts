import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { PathError } from './errors.js'
import { FileResolver } from './file-resolver.js'

describe('FileResolver', () => {
  let tempDir: string
  let resolver: FileResolver

  const write = (relative: string) => {
    const file = path.join(tempDir, relative)
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, '')
    return file
  }

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'spanfmt-resolver-')))
    resolver = new FileResolver(tempDir)
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('returns a named file as an explicit candidate', async () => {
    const file = write('src/app.py')
    expect(await resolver.expand('src/app.py')).toEqual([
      {
        input: 'src/app.py',
        absolutePath: file,
        displayPath: path.join('src', 'app.py'),
        origin: 'explicit',
        stdin: false,
      },
    ])
  })

  it('walks directories in sorted order, including dot directories', async () => {
    write('pkg/b.py')
    write('pkg/a.py')
    write('pkg/.venv/lib.py')
    write('pkg/sub/c.txt')

    const candidates = await resolver.expand('pkg')
    expect(candidates.map((c) => c.displayPath)).toEqual([
      path.join('pkg', '.venv', 'lib.py'),
      path.join('pkg', 'a.py'),
      path.join('pkg', 'b.py'),
      path.join('pkg', 'sub', 'c.txt'),
    ])
    expect(candidates.every((c) => c.origin === 'discovered')).toBe(true)
  })

  it('represents stdin without a filename', async () => {
    expect(await resolver.expand('-')).toEqual([
      { input: '-', absolutePath: null, displayPath: '-', origin: 'explicit', stdin: true },
    ])
  })

  it('uses the stdin filename for stdin', async () => {
    const named = new FileResolver(tempDir, 'src/piped.py')
    const [candidate] = await named.expand('-')
    expect(candidate).toMatchObject({
      absolutePath: path.join(tempDir, 'src', 'piped.py'),
      displayPath: 'src/piped.py',
      stdin: true,
    })
  })

  it('shows paths outside the working directory as absolute', async () => {
    const outside = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'spanfmt-outside-')))
    try {
      const file = path.join(outside, 'x.py')
      fs.writeFileSync(file, '')
      const [candidate] = await resolver.expand(file)
      expect(candidate.displayPath).toBe(file)
    } finally {
      fs.rmSync(outside, { recursive: true, force: true })
    }
  })

  it('fails for missing paths', async () => {
    await expect(resolver.expand('nope.py')).rejects.toThrow(PathError)
    await expect(resolver.expand('nope.py')).rejects.toThrow('Path nope.py does not exist')
  })

  it.skipIf(process.platform === 'win32')('fails for symlink loops', async () => {
    fs.symlinkSync(path.join(tempDir, 'loop-b'), path.join(tempDir, 'loop-a'))
    fs.symlinkSync(path.join(tempDir, 'loop-a'), path.join(tempDir, 'loop-b'))
    await expect(resolver.expand('loop-a')).rejects.toThrow('Path loop-a is a symlink loop')
  })
})
