import os from 'node:os'
import path, { type PlatformPath } from 'node:path'
import { ConfigurationError } from './errors.js'

export const CACHE_DIR_ENV = 'SPANFMT_CACHE_DIR'
export const WORKERS_ENV = 'SPANFMT_NUM_WORKERS'

export interface EnvironmentContext {
  env: NodeJS.ProcessEnv
  platform: NodeJS.Platform
  homedir: string
}

export function currentEnvironment(): EnvironmentContext {
  return { env: process.env, platform: process.platform, homedir: os.homedir() }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined
}

function pathApi(ctx: EnvironmentContext): PlatformPath {
  return ctx.platform === 'win32' ? path.win32 : path.posix
}

function expandHome(value: string, ctx: EnvironmentContext): string {
  if (value === '~') return ctx.homedir
  if (value.startsWith('~/')) return pathApi(ctx).join(ctx.homedir, value.slice(2))
  return value
}

/**
 * The single user-level config location, consulted when no project file is found.
 */
export function globalConfigPath(ctx: EnvironmentContext = currentEnvironment()): string {
  const p = pathApi(ctx)
  if (ctx.platform === 'win32') {
    const home = nonEmpty(ctx.env.USERPROFILE) ?? ctx.homedir
    return p.join(home, '.spanfmt.yml')
  }
  const configRoot = nonEmpty(ctx.env.XDG_CONFIG_HOME) ?? p.join(ctx.homedir, '.config')
  return p.join(expandHome(configRoot, ctx), 'spanfmt', 'config.yml')
}

export function cacheDir(ctx: EnvironmentContext = currentEnvironment()): string {
  const override = nonEmpty(ctx.env[CACHE_DIR_ENV])
  if (override) return expandHome(override, ctx)

  const p = pathApi(ctx)
  switch (ctx.platform) {
    case 'win32':
      return p.join(
        nonEmpty(ctx.env.LOCALAPPDATA) ?? p.join(ctx.homedir, 'AppData', 'Local'),
        'spanfmt',
        'Cache',
      )
    case 'darwin':
      return p.join(ctx.homedir, 'Library', 'Caches', 'spanfmt')
    default:
      return p.join(
        expandHome(nonEmpty(ctx.env.XDG_CACHE_HOME) ?? p.join(ctx.homedir, '.cache'), ctx),
        'spanfmt',
      )
  }
}

/**
 * Worker pool size: explicit value, then SPANFMT_NUM_WORKERS, then CPU count.
 */
export function workerCount(
  explicit: number | undefined,
  ctx: EnvironmentContext = currentEnvironment(),
  cpuCount: number = os.cpus().length,
): number {
  if (explicit !== undefined) {
    if (!Number.isInteger(explicit) || explicit < 1) {
      throw new ConfigurationError(
        `Invalid worker count ${explicit}: expected a positive integer`,
        'override',
        'workers',
      )
    }
    return explicit
  }

  const fromEnv = nonEmpty(ctx.env[WORKERS_ENV])
  if (fromEnv !== undefined) {
    const parsed = Number(fromEnv)
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new ConfigurationError(
        `Invalid ${WORKERS_ENV} value "${fromEnv}": expected a positive integer`,
        'environment',
        WORKERS_ENV,
      )
    }
    return parsed
  }

  return Math.max(1, cpuCount)
}
