/**
 * Wheelhouse build matrix
 *
 * Expands a wheel build manifest, resolves versions against PyPI, skips
 * wheels already in the private index and emits a CI job matrix.
 */

export { InMemoryArtifactIndex, isTransientS3Error, LocalArtifactIndex, S3ArtifactIndex } from './artifact-index'
export type { ListObjectsPage, S3ArtifactIndexOptions } from './artifact-index'

export { createDefaultConfig, isCI, resolveConfig, validateConfig } from './config'
export type { ConfigOverrides, ValidationResult } from './config'

export { IndexQueryError, ManifestParseError, VersionResolutionError, WheelhouseError } from './errors'
export type { ResolutionFailure } from './errors'

export { filterPublished } from './filter'
export type { FilterResult } from './filter'

export { gateMatrix } from './gate'
export { createLogger, silentLogger } from './logging'
export type { Logger, LoggerOptions } from './logging'

export { expandManifest, loadManifest, parseManifest, validateManifest } from './manifest'
export { decodeJobData, decodeMatrixEntry, dedupeRequests, generateMatrix } from './matrix'
export { formatSummary, toAzureMatrix, toGitHubMatrix, writeMatrixOutput } from './output'
export { createPipelineDeps, generateBuildMatrix } from './pipeline'
export type { PipelineDeps, PipelineResult } from './pipeline'
export { PyPIClient, PYPI_URL } from './pypi'
export { constraintsFor, resolveVersions } from './resolver'
export { artifactKey, wheelFilename } from './wheel'

export { LATEST } from './types'
export type * from './types'
