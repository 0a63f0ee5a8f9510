import type { ConfigSourceKind } from './types.js'

export type ErrorCode = 'CONFIG_ERROR' | 'PATH_ERROR' | 'RANGE_ERROR' | 'DIRECTIVE_ERROR'

export class SpanfmtError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
  ) {
    super(message)
    this.name = 'SpanfmtError'
  }
}

/**
 * Malformed config file, unknown option, wrong value type or bad pattern.
 * Aborts the run before any file is processed.
 */
export class ConfigurationError extends SpanfmtError {
  constructor(
    message: string,
    public source: ConfigSourceKind | 'environment',
    public option?: string,
    public origin?: string,
  ) {
    super(message, 'CONFIG_ERROR')
    this.name = 'ConfigurationError'
  }
}

/**
 * Unreadable input or symlink loop. Fatal for that path only.
 */
export class PathError extends SpanfmtError {
  constructor(
    message: string,
    public path: string,
    public systemCode?: string,
  ) {
    super(message, 'PATH_ERROR')
    this.name = 'PathError'
  }
}

export class RangeRequestError extends SpanfmtError {
  constructor(
    message: string,
    public input: string,
  ) {
    super(message, 'RANGE_ERROR')
    this.name = 'RangeRequestError'
  }
}

export class DirectiveError extends SpanfmtError {
  constructor(
    message: string,
    public line: number,
  ) {
    super(message, 'DIRECTIVE_ERROR')
    this.name = 'DirectiveError'
  }
}

export function isSpanfmtError(error: unknown): error is SpanfmtError {
  return error instanceof SpanfmtError
}

/**
 * Reads the errno-style code off a Node.js system error.
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
