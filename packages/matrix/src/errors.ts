/**
 * Base class for every fatal wheelhouse error. None of these are recovered
 * locally: a partial matrix would silently drop requested builds.
 */
export class WheelhouseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * The manifest could not be read or failed validation
 */
export class ManifestParseError extends WheelhouseError {
  readonly source: string
  readonly problems: string[]

  constructor(source: string, problems: string[], options?: { cause?: unknown }) {
    const detail = problems.map(p => `  - ${p}`).join('\n')
    super(`Invalid manifest ${source}:\n${detail}`, options)
    this.source = source
    this.problems = problems
  }
}

export type ResolutionFailure = 'not-found' | 'transport' | 'invalid-response'

/**
 * A package version could not be resolved against the public index
 */
export class VersionResolutionError extends WheelhouseError {
  readonly packageName: string
  readonly requestedVersion: string
  readonly reason: ResolutionFailure

  constructor(packageName: string, requestedVersion: string, reason: ResolutionFailure, detail: string, options?: { cause?: unknown }) {
    super(`Cannot resolve ${packageName}@${requestedVersion} (${reason}): ${detail}`, options)
    this.packageName = packageName
    this.requestedVersion = requestedVersion
    this.reason = reason
  }
}

/**
 * The private wheel index could not be listed
 */
export class IndexQueryError extends WheelhouseError {
  readonly location: string

  constructor(location: string, detail: string, options?: { cause?: unknown }) {
    super(`Cannot list wheel index ${location}: ${detail}`, options)
    this.location = location
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
