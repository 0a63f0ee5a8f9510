import { statSync } from 'node:fs'
import path from 'node:path'
import fg from 'fast-glob'
import { PathError, errorMessage, systemErrorCode } from './errors.js'
import type { CandidateOrigin } from './exclusion-matcher.js'

export interface Candidate {
  input: string // the argument this candidate came from
  absolutePath: string | null // null for stdin without a filename
  displayPath: string // relative to cwd where possible
  origin: CandidateOrigin
  stdin: boolean
}

/**
 * FileResolver expands input arguments into candidate files:
 * - `-` stands for stdin, optionally named by a stdin filename
 * - File arguments become explicit candidates
 * - Directory arguments are walked; every file below is a discovered candidate
 */
export class FileResolver {
  constructor(
    private cwd: string = process.cwd(),
    private stdinFilename?: string,
  ) {}

  async expand(input: string): Promise<Candidate[]> {
    if (input === '-') {
      return [this.stdinCandidate()]
    }

    const absolutePath = path.resolve(this.cwd, input)
    const kind = this.kindOf(input, absolutePath)

    if (kind === 'file') {
      return [this.candidate(input, absolutePath, 'explicit')]
    }

    try {
      const files = await fg('**/*', {
        cwd: absolutePath,
        absolute: true,
        dot: true,
        onlyFiles: true,
        followSymbolicLinks: false,
      })

      return files
        .map((file) => path.normalize(file))
        .sort()
        .map((file) => this.candidate(input, file, 'discovered'))
    } catch (error) {
      throw new PathError(
        `Failed to list files under ${input}: ${errorMessage(error)}`,
        input,
        systemErrorCode(error),
      )
    }
  }

  private stdinCandidate(): Candidate {
    const absolutePath = this.stdinFilename ? path.resolve(this.cwd, this.stdinFilename) : null
    return {
      input: '-',
      absolutePath,
      displayPath: this.stdinFilename ?? '-',
      origin: 'explicit',
      stdin: true,
    }
  }

  private candidate(input: string, absolutePath: string, origin: CandidateOrigin): Candidate {
    const relative = path.relative(this.cwd, absolutePath)
    return {
      input,
      absolutePath,
      displayPath: relative.startsWith('..') || relative === '' ? absolutePath : relative,
      origin,
      stdin: false,
    }
  }

  private kindOf(input: string, absolutePath: string): 'file' | 'directory' {
    try {
      const stats = statSync(absolutePath)
      if (stats.isDirectory()) return 'directory'
      if (stats.isFile()) return 'file'
      throw new PathError(`Not a regular file or directory: ${input}`, input)
    } catch (error) {
      if (error instanceof PathError) throw error
      const code = systemErrorCode(error)
      const reason =
        code === 'ENOENT'
          ? 'does not exist'
          : code === 'ELOOP'
            ? 'is a symlink loop'
            : `cannot be read (${errorMessage(error)})`
      throw new PathError(`Path ${input} ${reason}`, input, code)
    }
  }
}
