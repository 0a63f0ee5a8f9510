import { createRequire } from 'node:module'
import { Command } from 'commander'
import { CacheManager } from './cache-manager.js'
import { ConfigLocator } from './config-locator.js'
import {
  type EnvironmentContext,
  cacheDir,
  currentEnvironment,
  globalConfigPath,
  workerCount,
} from './environment.js'
import { errorMessage } from './errors.js'
import { FileResolver } from './file-resolver.js'
import { createLogger } from './logger.js'
import { RegionPlanner } from './region-planner.js'
import { Reporter } from './reporter.js'
import { RunContext } from './run-context.js'
import type { ConfigLayer } from './types.js'

const require = createRequire(import.meta.url)

function packageVersion(): string {
  const pkg: unknown = require('../package.json')
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return '0.0.0'
}

export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
  exit: (code: number) => void
  cwd: string
  environment: EnvironmentContext
  readStdin: () => Promise<string>
}

interface ConfigFlags {
  config?: string
  stdinFilename?: string
  lineLength?: string
  targetVersion?: string[]
  include?: string
  exclude?: string
  extendExclude?: string
  forceExclude?: string
  skipStringNormalization?: boolean
  skipMagicTrailingComma?: boolean
  verbose?: boolean
}

interface RegionsFlags extends ConfigFlags {
  lineRanges?: string[]
  workers?: string
  strictDirectives?: boolean
  cache: boolean
  json?: boolean
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

function defaultIO(): CliIO {
  return {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    exit: (code) => process.exit(code),
    cwd: process.cwd(),
    environment: currentEnvironment(),
    readStdin: readProcessStdin,
  }
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}

function withConfigOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Read configuration from this file, skipping discovery')
    .option('--stdin-filename <path>', 'Path to report and match for content read from -')
    .option('-l, --line-length <n>', 'How many characters per line to allow')
    .option('-t, --target-version <version>', 'Python version the output must support (repeatable)', collect)
    .option('--include <regex>', 'Files to include during directory recursion')
    .option('--exclude <regex>', 'Files and directories to exclude during directory recursion')
    .option('--extend-exclude <regex>', 'Additional exclusions on top of --exclude')
    .option('--force-exclude <regex>', 'Exclusions that apply even to explicitly named files')
    .option('-S, --skip-string-normalization', "Don't normalize string quotes or prefixes")
    .option('-C, --skip-magic-trailing-comma', "Don't use trailing commas as a reason to split lines")
    .option('-v, --verbose', 'Show config discovery and cache decisions')
}

/**
 * Command-line flags become the override layer; values are validated when
 * the layers are merged, like values read from a file.
 */
export function overridesFrom(flags: ConfigFlags): ConfigLayer['values'] {
  const overrides: ConfigLayer['values'] = {}
  if (flags.lineLength !== undefined) overrides['line-length'] = Number(flags.lineLength)
  if (flags.targetVersion !== undefined) overrides['target-version'] = flags.targetVersion
  if (flags.include !== undefined) overrides.include = flags.include
  if (flags.exclude !== undefined) overrides.exclude = flags.exclude
  if (flags.extendExclude !== undefined) overrides['extend-exclude'] = flags.extendExclude
  if (flags.forceExclude !== undefined) overrides['force-exclude'] = flags.forceExclude
  if (flags.skipStringNormalization) overrides['skip-string-normalization'] = true
  if (flags.skipMagicTrailingComma) overrides['skip-magic-trailing-comma'] = true
  return overrides
}

export function createProgram(overrides: Partial<CliIO> = {}): Command {
  const io: CliIO = { ...defaultIO(), ...overrides }
  const program = new Command()

  const fail = (error: unknown) => {
    io.err(error instanceof Error ? `Error: ${errorMessage(error)}` : 'An unexpected error occurred')
    io.exit(2)
  }

  const contextFor = (flags: ConfigFlags) => {
    const logger = createLogger({ verbose: flags.verbose, output: io.err })
    return new RunContext({
      cwd: io.cwd,
      configPath: flags.config,
      overrides: overridesFrom(flags),
      stdinFilename: flags.stdinFilename,
      locator: new ConfigLocator({
        cwd: io.cwd,
        stdinFilename: flags.stdinFilename,
        globalConfig: () => globalConfigPath(io.environment),
      }),
      logger,
    })
  }

  program
    .name('spanfmt')
    .description('Plan which regions of Python sources a formatter may rewrite')
    .version(packageVersion())

  // --- regions command ---
  withConfigOptions(
    program
      .command('regions')
      .description('Show formattable regions for files and directories')
      .argument('[paths...]', 'Files, directories or - for stdin', ['.']),
  )
    .option('--line-ranges <START-END>', 'Only format these lines of a single file (repeatable)', collect)
    .option('-W, --workers <n>', 'Number of files planned in parallel')
    .option('--strict-directives', 'Fail a file whose pause marker is never resumed')
    .option('--no-cache', 'Do not read or write the region cache')
    .option('--json', 'Print the plan as JSON')
    .action(async (paths: string[], flags: RegionsFlags) => {
      try {
        const context = contextFor(flags)
        const cache = flags.cache
          ? new CacheManager(cacheDir(io.environment), context.logger)
          : null

        const planner = new RegionPlanner({
          context,
          resolver: new FileResolver(io.cwd, flags.stdinFilename),
          cache,
          readStdin: io.readStdin,
          onProgress: (completed, total, path, cached) => {
            context.logger.debug(`[${completed}/${total}] (${cached ? 'cache' : 'scan'}) ${path}`)
          },
        })

        const run = await planner.run(paths, {
          lineRanges: flags.lineRanges ?? [],
          workers: workerCount(
            flags.workers === undefined ? undefined : Number(flags.workers),
            io.environment,
          ),
          unmatchedPause: flags.strictDirectives ? 'error' : 'extend-to-eof',
        })

        if (flags.json) {
          const { plans, excluded, failures, summary } = run
          io.out(JSON.stringify({ plans, excluded, failures, summary }, null, 2))
        } else {
          new Reporter(io.out).report(run, { verbose: flags.verbose })
        }

        io.exit(run.exitCode)
      } catch (error) {
        fail(error)
      }
    })

  // --- config command ---
  withConfigOptions(
    program
      .command('config')
      .description('Show the effective configuration and where each value came from')
      .argument('[paths...]', 'Paths whose shared config to show', ['.']),
  ).action(async (paths: string[], flags: ConfigFlags) => {
    try {
      const context = contextFor(flags)
      const reporter = new Reporter(io.out)

      const config = await context.configFor(paths)
      io.out(`${paths.join(' ')}:`)
      for (const line of reporter.formatConfig(config)) {
        io.out(line)
      }
      io.exit(0)
    } catch (error) {
      fail(error)
    }
  })

  // --- cache commands ---
  const cacheCmd = program.command('cache').description('Manage the region cache')

  cacheCmd
    .command('clear')
    .description('Delete the region cache')
    .action(() => {
      try {
        const cache = new CacheManager(cacheDir(io.environment))
        cache.clear()
        io.out('✓ Cache cleared')
        io.exit(0)
      } catch (error) {
        fail(error)
      }
    })

  cacheCmd
    .command('status')
    .description('Show cache location and size')
    .action(() => {
      try {
        const cache = new CacheManager(cacheDir(io.environment), createLogger({ output: io.err }))
        cache.load()
        const stats = cache.status()
        io.out(`Cache file: ${stats.path}`)
        io.out(`Cache entries: ${stats.entries}`)
        io.out(`Cache size: ${(stats.sizeBytes / 1024).toFixed(2)} KB`)
        io.exit(0)
      } catch (error) {
        fail(error)
      }
    })

  return program
}
