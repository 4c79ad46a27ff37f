#!/usr/bin/env node
import type { ConfigOverrides } from '../src/config'
import type { OutputFormat } from '../src/types'
import process from 'node:process'
import * as core from '@actions/core'
import { CAC } from 'cac'
import { version } from '../package.json'
import { checkCommand, generateCommand } from '../src/commands'
import { resolveConfig } from '../src/config'
import { errorMessage } from '../src/errors'
import { createLogger } from '../src/logging'

interface CliOptions {
  manifest?: string
  bucket?: string
  region?: string
  prefix?: string
  indexDir?: string
  format?: string
  variable?: string
  pypiUrl?: string
  concurrency?: string | number
  verbose?: boolean
}

function toFormat(value: string | undefined): OutputFormat | undefined {
  if (value === undefined)
    return undefined
  if (value === 'github' || value === 'azure' || value === 'json')
    return value
  throw new Error(`Unknown output format "${value}", expected github, azure or json`)
}

function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    manifestPath: options.manifest,
    verbose: options.verbose,
    concurrency: options.concurrency === undefined ? undefined : Number(options.concurrency),
    pypi: { baseUrl: options.pypiUrl },
    index: {
      bucket: options.bucket,
      region: options.region,
      prefix: options.prefix,
      directory: options.indexDir,
    },
    output: {
      format: toFormat(options.format),
      variable: options.variable,
    },
  }
}

function withSharedOptions<T extends ReturnType<CAC['command']>>(command: T): T {
  command
    .option('-m, --manifest <path>', 'Build manifest (default: wheel_matrix.yml)')
    .option('-b, --bucket <name>', 'S3 bucket holding published wheels')
    .option('-r, --region <region>', 'AWS region (default: us-east-1)')
    .option('--prefix <prefix>', 'Key prefix of the wheels in the bucket (default: packages/)')
    .option('--index-dir <path>', 'Use a local directory of wheels instead of S3')
    .option('--pypi-url <url>', 'PyPI JSON API base URL')
    .option('--concurrency <n>', 'Max concurrent index lookups')
    .option('--verbose', 'Enable verbose output')
  return command
}

async function run(action: (options: CliOptions) => Promise<void>, options: CliOptions): Promise<void> {
  try {
    await action(options)
  }
  catch (error) {
    core.setFailed(errorMessage(error))
    process.exit(1)
  }
}

const cli = new CAC('wheelhouse')

cli.version(version)
cli.help()

withSharedOptions(cli.command('[generate]', 'Generate the CI build matrix for wheels missing from the index'))
  .alias('generate')
  .option('--format <format>', 'Output format: github, azure or json (detected from the CI environment)')
  .option('--variable <name>', 'Name of the matrix output variable (default: matrix)')
  .example('wheelhouse generate -b my-wheel-bucket')
  .example('wheelhouse generate --index-dir ./wheelhouse --format json')
  .action((_generate: string | undefined, options: CliOptions) => run(async (opts) => {
    const config = resolveConfig(toOverrides(opts))
    // JSON goes to stdout, so the log goes to stderr
    const stream = config.output.format === 'json' ? process.stderr : undefined
    const logger = createLogger({ verbose: config.verbose, stream })
    await generateCommand({ config, logger })
  }, options))

withSharedOptions(cli.command('check', 'Show which requested wheels are published and which would be built'))
  .example('wheelhouse check -b my-wheel-bucket')
  .action((options: CliOptions) => run(async (opts) => {
    const config = resolveConfig(toOverrides(opts))
    const logger = createLogger({ verbose: config.verbose })
    await checkCommand({ config, logger })
  }, options))

cli.parse()
