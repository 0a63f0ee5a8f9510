import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterEach, describe, expect, test } from 'vitest'
import { ConfigLoader } from './config-loader.js'
import { ConfigurationError } from './errors.js'

describe('ConfigLoader', () => {
  const loader = new ConfigLoader()
  const testDataDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../__test-data__')
  const fixture = (name: string) => path.join(testDataDir, name)
  let tempDir: string | null = null

  afterEach(() => {
    if (tempDir) fs.rmSync(tempDir, { recursive: true, force: true })
    tempDir = null
  })

  test('loads a valid config into a file layer', () => {
    const layer = loader.load(fixture('valid-config.yml'))

    expect(layer.source).toBe('file')
    expect(layer.origin).toBe(fixture('valid-config.yml'))
    expect(layer.values).toEqual({
      'line-length': 100,
      'target-version': ['py311', 'py312'],
      include: '\\.pyi?$',
      'extend-exclude': '(\n  /generated/   # code generators\n  | /migrations/\n)\n',
      'skip-string-normalization': true,
    })
  })

  test('an empty file is an empty layer', () => {
    expect(loader.load(fixture('empty.yml')).values).toEqual({})
  })

  test('infers target versions from requires-python', () => {
    expect(loader.load(fixture('requires-python.yml')).values).toEqual({
      'line-length': 79,
      'target-version': ['py311', 'py312'],
    })
  })

  test('an explicit target-version wins over requires-python', () => {
    expect(loader.load(fixture('requires-python-explicit.yml')).values).toEqual({
      'target-version': ['py310'],
    })
  })

  test('drops requires-python when nothing can be inferred', () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'spanfmt-loader-'))
    const file = path.join(tempDir, 'spanfmt.yml')
    fs.writeFileSync(file, 'requires-python: "2.7"\n')
    expect(loader.load(file).values).toEqual({})
  })

  test('rejects unknown options', () => {
    const file = fixture('unknown-option.yml')
    expect(() => loader.load(file)).toThrow(
      `Config validation failed for ${file}:\n  - unknown option 'line_lenght'`,
    )
    try {
      loader.load(file)
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      expect(error).toMatchObject({ source: 'file', option: 'line_lenght', origin: file })
    }
  })

  test('rejects values of the wrong type', () => {
    const file = fixture('wrong-type.yml')
    expect(() => loader.load(file)).toThrow(
      `Config validation failed for ${file}:\n  - /line-length: must be integer`,
    )
  })

  test('lists allowed target versions', () => {
    expect(() => loader.load(fixture('bad-target.yml'))).toThrow(
      '/target-version/0: must be equal to one of the allowed values, allowed values: py33, py34',
    )
  })

  test('rejects a document that is not a mapping', () => {
    const file = fixture('not-a-mapping.yml')
    expect(() => loader.load(file)).toThrow(
      `Config validation failed for ${file}:\n  - root: must be a mapping of option names to values`,
    )
  })

  test('reports YAML syntax errors', () => {
    const file = fixture('broken.yml')
    expect(() => loader.load(file)).toThrow(`Config file ${file} is not valid YAML:`)
  })

  test('reports unreadable files', () => {
    const file = fixture('missing.yml')
    expect(() => loader.load(file)).toThrow(`Cannot read config file ${file}:`)
  })
})
