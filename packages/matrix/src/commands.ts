import type { Logger } from './logging'
import type { PipelineDeps } from './pipeline'
import type { WheelhouseConfig } from './types'
import { validateConfig } from './config'
import { WheelhouseError } from './errors'
import { loadManifest } from './manifest'
import { writeMatrixOutput } from './output'
import { createPipelineDeps, generateBuildMatrix } from './pipeline'
import { wheelFilename } from './wheel'

export interface CommandContext {
  config: WheelhouseConfig
  logger: Logger
  /** Collaborators to use instead of the ones built from config */
  deps?: PipelineDeps
  write?: (line: string) => void
}

class ConfigError extends WheelhouseError {}

function prepare(ctx: CommandContext): PipelineDeps {
  const { valid, errors, warnings } = validateConfig(ctx.config)
  for (const warning of warnings)
    ctx.logger.warn(warning)
  if (!valid)
    throw new ConfigError(`Invalid configuration:\n${errors.map(e => `  - ${e}`).join('\n')}`)
  return ctx.deps ? { logger: ctx.logger, ...ctx.deps } : createPipelineDeps(ctx.config, ctx.logger)
}

/**
 * Build the matrix and publish it for the CI platform
 */
export async function generateCommand(ctx: CommandContext): Promise<boolean> {
  const deps = prepare(ctx)
  const manifest = loadManifest(ctx.config.manifestPath)
  const { gate } = await generateBuildMatrix(manifest, deps)

  await writeMatrixOutput(gate, {
    format: ctx.config.output.format,
    variable: ctx.config.output.variable,
    write: ctx.write,
    logger: ctx.logger,
  })
  return gate.hasJobs
}

/**
 * List every requested wheel as published or missing, without CI output
 */
export async function checkCommand(ctx: CommandContext): Promise<string[]> {
  const deps = prepare(ctx)
  const manifest = loadManifest(ctx.config.manifestPath)
  const { resolved, published } = await generateBuildMatrix(manifest, deps)
  const done = new Set(published)

  const lines = resolved.map(request =>
    `  - ${wheelFilename(request)} on ${request.instance} ${done.has(request) ? '(already published)' : '(would build)'}`)
  const write = ctx.write ?? ctx.logger.info
  for (const line of lines)
    write(line)
  return lines
}
