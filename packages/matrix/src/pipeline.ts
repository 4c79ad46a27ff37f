import type { FilterResult } from './filter'
import type { Logger } from './logging'
import type { ArtifactIndex, BuildManifest, GateResult, PublicIndex, ResolvedBuildRequest, WheelhouseConfig } from './types'
import { LocalArtifactIndex, S3ArtifactIndex } from './artifact-index'
import { filterPublished } from './filter'
import { gateMatrix } from './gate'
import { silentLogger } from './logging'
import { expandManifest } from './manifest'
import { generateMatrix } from './matrix'
import { PyPIClient } from './pypi'
import { resolveVersions } from './resolver'

export interface PipelineDeps {
  publicIndex: PublicIndex
  artifactIndex: ArtifactIndex
  concurrency?: number
  logger?: Logger
}

export interface PipelineResult extends FilterResult {
  gate: GateResult
  resolved: ResolvedBuildRequest[]
}

/**
 * Manifest → resolve versions → drop published wheels → group by instance → gate.
 *
 * Any failure aborts the whole run; a partial matrix is never returned.
 */
export async function generateBuildMatrix(manifest: BuildManifest, deps: PipelineDeps): Promise<PipelineResult> {
  const logger = deps.logger ?? silentLogger
  const requests = expandManifest(manifest)
  logger.info(`Manifest requests ${requests.length} wheel build(s)`)

  const resolved = await logger.group('Resolving versions', () => resolveVersions(requests, deps.publicIndex, {
    concurrency: deps.concurrency,
    constraints: manifest.constraints,
    logger,
  }))

  const { pending, published } = await logger.group('Checking wheel index', () => filterPublished(resolved, deps.artifactIndex, logger))
  logger.info(`${published.length} already published, ${pending.length} to build`)

  const matrix = generateMatrix(pending, logger)
  const gate = gateMatrix(matrix)
  if (gate.hasJobs)
    logger.info(`Build matrix has ${matrix.length} job(s): ${matrix.map(e => e.name).join(', ')}`)
  else
    logger.info('Nothing to build, downstream stages will be skipped')

  return { gate, resolved, pending, published }
}

/**
 * Wire the real collaborators from configuration
 */
export function createPipelineDeps(config: WheelhouseConfig, logger: Logger = silentLogger): PipelineDeps {
  const publicIndex = new PyPIClient({
    baseUrl: config.pypi.baseUrl,
    timeout: config.pypi.timeout,
    retries: config.pypi.retries,
    retryDelay: config.pypi.retryDelay,
    logger,
  })

  const artifactIndex = config.index.directory
    ? new LocalArtifactIndex(config.index.directory)
    : new S3ArtifactIndex({
        bucket: config.index.bucket,
        region: config.index.region,
        prefix: config.index.prefix,
        timeout: config.index.timeout,
        retries: config.index.retries,
        retryDelay: config.index.retryDelay,
        logger,
      })

  return { publicIndex, artifactIndex, concurrency: config.concurrency, logger }
}
