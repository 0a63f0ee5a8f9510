import chalk from 'chalk'

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void
  info(msg: string, data?: Record<string, unknown>): void
  warn(msg: string, data?: Record<string, unknown>): void
  error(msg: string, data?: Record<string, unknown>): void
}

export interface LoggerOptions {
  verbose?: boolean
  quiet?: boolean
  /** Routes all output through this instead of the console. */
  output?: (msg: string) => void
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false, output } = opts
  const write = output ?? ((msg: string) => console.log(msg))
  const writeErr = output ?? ((msg: string) => console.error(msg))

  const suffix = (data?: Record<string, unknown>) => (data ? ` ${JSON.stringify(data)}` : '')

  return {
    debug(msg, data) {
      if (verbose && !quiet) {
        write(chalk.gray(`[debug] ${msg}${suffix(data)}`))
      }
    },

    info(msg, data) {
      if (!quiet) {
        write(chalk.blue(`[info] ${msg}${verbose ? suffix(data) : ''}`))
      }
    },

    warn(msg, data) {
      writeErr(chalk.yellow(`[warn] ${msg}${suffix(data)}`))
    },

    error(msg, data) {
      writeErr(chalk.red(`[error] ${msg}${suffix(data)}`))
    },
  }
}

/**
 * Silent logger (for tests or quiet mode)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
