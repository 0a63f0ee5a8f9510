import chalk from 'chalk'
import type { ResolvedConfig } from './config-merger.js'
import { formatRange } from './line-ranges.js'
import { OPTION_NAMES } from './options.js'
import type { PlanRun } from './region-planner.js'
import type { FilePlan, OptionProvenance, PlanSummary } from './types.js'

export class Reporter {
  constructor(private write: (line: string) => void = (line) => console.log(line)) {}

  report(run: PlanRun, options: { verbose?: boolean } = {}): void {
    for (const plan of run.plans) {
      this.write(chalk.white.bold(`  ${plan.path}`))
      this.write(`    ${this.formatRegions(plan)}`)

      const preserved = plan.spans.filter((span) => span.kind === 'preserved')
      if (preserved.length > 0) {
        this.write(`    ${chalk.dim('preserved')}  ${preserved.map(formatRange).join(', ')}`)
      }

      for (const diagnostic of plan.diagnostics) {
        this.write(
          `    ${chalk.yellow('warn')}  ${chalk.dim(diagnostic.code)}  line ${diagnostic.line}: ${diagnostic.message}`,
        )
      }
    }

    if (options.verbose) {
      for (const file of run.excluded) {
        this.write(chalk.dim(`  ${file.path} excluded by ${file.rule ?? 'include'}`))
      }
    }

    for (const failure of run.failures) {
      this.write(`  ${chalk.red('error')}  ${failure.path}: ${failure.message}`)
    }

    this.write('')
    this.write(this.formatSummary(run.summary))
  }

  formatConfig(config: ResolvedConfig): string[] {
    const lines = [
      `  Project root: ${config.projectRoot} (${config.rootReason})`,
      `  Config file: ${config.configPath ?? 'none, using defaults'}`,
    ]

    for (const name of OPTION_NAMES) {
      const value = config.get(name)
      const shown = Array.isArray(value)
        ? `[${value.join(', ')}]`
        : value === null
          ? 'unset'
          : String(value)
      lines.push(`  ${name}: ${shown} ${chalk.dim(`(${this.formatProvenance(config.sourceOf(name))})`)}`)
    }

    return lines
  }

  private formatProvenance(provenance: OptionProvenance): string {
    return provenance.origin ? `${provenance.source}: ${provenance.origin}` : provenance.source
  }

  private formatRegions(plan: FilePlan): string {
    if (plan.lineCount === 0) {
      return chalk.dim('empty file')
    }
    if (plan.regions.length === 0) {
      return chalk.yellow('no formattable regions')
    }
    const tag = plan.cached ? chalk.dim(' (cached)') : ''
    return `${chalk.green('format')}  ${plan.regions.map(formatRange).join(', ')}${tag}`
  }

  private formatSummary(summary: PlanSummary): string {
    const files = chalk.dim(
      `${summary.total_files} ${summary.total_files === 1 ? 'file' : 'files'} planned`,
    )
    const regions = chalk.dim(`${summary.regions} ${summary.regions === 1 ? 'region' : 'regions'}`)
    const excluded = chalk.dim(`${summary.excluded} excluded`)
    const cached = chalk.dim(`${summary.cached} cached`)
    const failed = summary.failed > 0 ? `, ${chalk.red(`${summary.failed} failed`)}` : ''
    const duration = chalk.dim(`${(summary.duration_ms / 1000).toFixed(1)}s`)
    return `  ${files}, ${regions}, ${excluded}, ${cached}${failed}, ${duration}`
  }
}
