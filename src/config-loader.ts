import fs from 'node:fs'
import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv'
import YAML from 'yaml'
import { ConfigurationError, errorMessage } from './errors.js'
import schema from './schema.json' with { type: 'json' }
import { inferTargetVersions } from './target-versions.js'
import type { ConfigLayer } from './types.js'

// Project metadata, read for inference only; never an option
const REQUIRES_PYTHON = 'requires-python'

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export class ConfigLoader {
  private static validator: ValidateFunction | null = null

  /**
   * Get cached schema validator (lazy singleton)
   */
  private getValidator(): ValidateFunction {
    if (!ConfigLoader.validator) {
      const ajv = new Ajv({ allErrors: true, verbose: true, allowUnionTypes: true })
      ConfigLoader.validator = ajv.compile(schema)
    }
    return ConfigLoader.validator
  }

  /**
   * Load and validate a spanfmt YAML config file into a file-level layer
   */
  load(filePath: string): ConfigLayer {
    let fileContent: string
    try {
      fileContent = fs.readFileSync(filePath, 'utf-8')
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read config file ${filePath}: ${errorMessage(error)}`,
        'file',
        undefined,
        filePath,
      )
    }

    let rawConfig: unknown
    try {
      rawConfig = YAML.parse(fileContent)
    } catch (error) {
      throw new ConfigurationError(
        `Config file ${filePath} is not valid YAML: ${errorMessage(error)}`,
        'file',
        undefined,
        filePath,
      )
    }

    // An empty document is an empty table
    const config = rawConfig ?? {}

    const validate = this.getValidator()
    if (!validate(config) || !isPlainObject(config)) {
      const errors = validate.errors ?? []
      throw new ConfigurationError(
        `Config validation failed for ${filePath}:\n${this.formatValidationErrors(errors)}`,
        'file',
        this.offendingOption(errors),
        filePath,
      )
    }

    const values: Record<string, unknown> = { ...config }
    const requiresPython = values[REQUIRES_PYTHON]
    delete values[REQUIRES_PYTHON]

    if (typeof requiresPython === 'string' && values['target-version'] === undefined) {
      const inferred = inferTargetVersions(requiresPython)
      if (inferred) {
        values['target-version'] = inferred
      }
    }

    return { source: 'file', origin: filePath, values }
  }

  private offendingOption(errors: ErrorObject[]): string | undefined {
    const [first] = errors
    if (!first) return undefined
    if (first.keyword === 'additionalProperties') {
      return String(first.params.additionalProperty)
    }
    const [, option] = first.instancePath.split('/')
    return option || undefined
  }

  /**
   * Format AJV validation errors into readable messages
   */
  private formatValidationErrors(errors: ErrorObject[]): string {
    if (errors.length === 0) {
      return '  - root: must be a mapping of option names to values'
    }

    return errors
      .map((err) => {
        const field = err.instancePath || 'root'

        if (err.keyword === 'additionalProperties') {
          return `  - unknown option '${err.params.additionalProperty}'`
        }
        if (err.keyword === 'enum') {
          return `  - ${field}: ${err.message}, allowed values: ${err.params.allowedValues?.join(', ')}`
        }
        if (err.keyword === 'type' && field === 'root') {
          return '  - root: must be a mapping of option names to values'
        }

        return `  - ${field}: ${err.message}`
      })
      .join('\n')
  }
}
