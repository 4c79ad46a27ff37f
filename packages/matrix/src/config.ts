import type { OutputFormat, WheelhouseConfig } from './types'
import process from 'node:process'
import { PYPI_URL } from './pypi'

export interface ValidationResult {
  valid: boolean
  errors: string[]
  warnings: string[]
}

export type ConfigOverrides = Partial<Omit<WheelhouseConfig, 'pypi' | 'index' | 'output'>> & {
  pypi?: Partial<WheelhouseConfig['pypi']>
  index?: Partial<WheelhouseConfig['index']>
  output?: Partial<WheelhouseConfig['output']>
}

type Env = Record<string, string | undefined>

export function isCI(env: Env = process.env): boolean {
  return env.CI === 'true' || env.GITHUB_ACTIONS === 'true' || env.TF_BUILD === 'True'
}

function detectFormat(env: Env): OutputFormat {
  const format = env.WHEELHOUSE_OUTPUT_FORMAT
  if (format === 'github' || format === 'azure' || format === 'json')
    return format
  if (env.GITHUB_ACTIONS === 'true')
    return 'github'
  if (env.TF_BUILD === 'True')
    return 'azure'
  return 'json'
}

function int(value: string | undefined, fallback: number): number {
  return value === undefined || value === '' ? fallback : Number.parseInt(value, 10)
}

/**
 * Defaults, with environment variables applied
 */
export function createDefaultConfig(env: Env = process.env): WheelhouseConfig {
  const ci = isCI(env)
  return {
    manifestPath: env.WHEELHOUSE_MANIFEST || 'wheel_matrix.yml',
    verbose: env.WHEELHOUSE_VERBOSE === 'true',
    concurrency: int(env.WHEELHOUSE_CONCURRENCY, 4),
    pypi: {
      baseUrl: env.WHEELHOUSE_PYPI_URL || PYPI_URL,
      // Longer timeout and more retries in CI, where a flaky lookup fails the whole run
      timeout: int(env.WHEELHOUSE_PYPI_TIMEOUT, ci ? 60000 : 30000),
      retries: int(env.WHEELHOUSE_PYPI_RETRIES, ci ? 5 : 3),
      retryDelay: int(env.WHEELHOUSE_PYPI_RETRY_DELAY, 1000),
    },
    index: {
      bucket: env.WHEELHOUSE_BUCKET || '',
      region: env.WHEELHOUSE_REGION || env.AWS_REGION || 'us-east-1',
      prefix: env.WHEELHOUSE_PREFIX ?? 'packages/',
      directory: env.WHEELHOUSE_INDEX_DIR || undefined,
      timeout: int(env.WHEELHOUSE_INDEX_TIMEOUT, ci ? 60000 : 30000),
      retries: int(env.WHEELHOUSE_INDEX_RETRIES, ci ? 5 : 3),
      retryDelay: int(env.WHEELHOUSE_INDEX_RETRY_DELAY, 1000),
    },
    output: {
      format: detectFormat(env),
      variable: env.WHEELHOUSE_OUTPUT_VARIABLE || 'matrix',
    },
  }
}

/**
 * Merge overrides onto the defaults; undefined override values are ignored
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): WheelhouseConfig {
  const base = createDefaultConfig(env)
  const { pypi = {}, index = {}, output = {} } = overrides
  return {
    manifestPath: overrides.manifestPath ?? base.manifestPath,
    verbose: overrides.verbose ?? base.verbose,
    concurrency: overrides.concurrency ?? base.concurrency,
    pypi: {
      baseUrl: pypi.baseUrl ?? base.pypi.baseUrl,
      timeout: pypi.timeout ?? base.pypi.timeout,
      retries: pypi.retries ?? base.pypi.retries,
      retryDelay: pypi.retryDelay ?? base.pypi.retryDelay,
    },
    index: {
      bucket: index.bucket ?? base.index.bucket,
      region: index.region ?? base.index.region,
      prefix: index.prefix ?? base.index.prefix,
      directory: index.directory ?? base.index.directory,
      timeout: index.timeout ?? base.index.timeout,
      retries: index.retries ?? base.index.retries,
      retryDelay: index.retryDelay ?? base.index.retryDelay,
    },
    output: {
      format: output.format ?? base.output.format,
      variable: output.variable ?? base.output.variable,
    },
  }
}

function checkInt(errors: string[], value: number, name: string, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max)
    errors.push(`${name} must be an integer between ${min} and ${max}`)
}

/**
 * Validates a WheelhouseConfig object
 */
export function validateConfig(config: WheelhouseConfig): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []

  if (!config.manifestPath)
    errors.push('manifestPath is required')

  checkInt(errors, config.concurrency, 'concurrency', 1, 32)
  checkInt(errors, config.pypi.timeout, 'pypi.timeout', 1000, 300000)
  checkInt(errors, config.pypi.retries, 'pypi.retries', 0, 10)
  checkInt(errors, config.pypi.retryDelay, 'pypi.retryDelay', 0, 60000)
  checkInt(errors, config.index.timeout, 'index.timeout', 1000, 300000)
  checkInt(errors, config.index.retries, 'index.retries', 0, 10)
  checkInt(errors, config.index.retryDelay, 'index.retryDelay', 0, 60000)

  try {
    const url = new URL(config.pypi.baseUrl)
    if (url.protocol !== 'https:')
      warnings.push(`pypi.baseUrl uses ${url.protocol} rather than https:`)
  }
  catch {
    errors.push(`pypi.baseUrl is not a valid URL: ${config.pypi.baseUrl}`)
  }

  if (!config.index.bucket && !config.index.directory)
    errors.push('index.bucket (WHEELHOUSE_BUCKET) or index.directory (WHEELHOUSE_INDEX_DIR) is required')
  if (config.index.bucket && config.index.directory)
    warnings.push('both index.bucket and index.directory are set; the local directory is used')
  if (config.index.prefix && !config.index.prefix.endsWith('/'))
    warnings.push(`index.prefix "${config.index.prefix}" does not end with "/"`)

  if (!['github', 'azure', 'json'].includes(config.output.format))
    errors.push(`output.format must be one of github, azure, json`)
  if (!/^\w+$/.test(config.output.variable))
    errors.push('output.variable may only contain letters, digits and underscores')

  return { valid: errors.length === 0, errors, warnings }
}
