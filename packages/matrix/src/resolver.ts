import type { Logger } from './logging'
import type { BuildRequest, ConstraintRule, PublicIndex, PublishedRelease, ResolvedBuildRequest } from './types'
import { VersionResolutionError } from './errors'
import { silentLogger } from './logging'
import { mapWithConcurrency } from './retry'
import { LATEST } from './types'
import { satisfiesSpecifier } from './version'

export interface ResolveOptions {
  /** Max lookups in flight */
  concurrency?: number
  constraints?: ConstraintRule[]
  logger?: Logger
}

/**
 * Requirements of the first rule matching `pkg` at `version`, newline separated
 */
export function constraintsFor(pkg: string, version: string, rules: ConstraintRule[] = []): string {
  const name = pkg.toLowerCase()
  const rule = rules.find(r => r.package.toLowerCase() === name && satisfiesSpecifier(version, r.specifier))
  return rule ? rule.requirements.join('\n') : ''
}

function lookupKey(pkg: string, version: string): string {
  return `${pkg}@${version}`
}

/**
 * Resolve every request to a concrete version.
 *
 * Each distinct (package, requested version) is looked up once. All lookups
 * are joined before anything is returned, and the output keeps input order.
 * A concrete version is never rewritten; the lookup only supplies its sdist.
 */
export async function resolveVersions(requests: BuildRequest[], index: PublicIndex, options: ResolveOptions = {}): Promise<ResolvedBuildRequest[]> {
  const logger = options.logger ?? silentLogger
  const lookups = new Map<string, { pkg: string, version: string }>()
  for (const request of requests) {
    const key = lookupKey(request.package, request.version)
    if (!lookups.has(key))
      lookups.set(key, { pkg: request.package, version: request.version })
  }

  const entries = Array.from(lookups.entries())
  const releases = await mapWithConcurrency(entries, options.concurrency ?? 4, async ([, { pkg, version }]) => {
    const release = await index.getRelease(pkg, version)
    if (version === LATEST)
      logger.info(`${pkg}: latest is ${release.version}`)
    else
      logger.debug(`${pkg}@${version}: found on index`)
    return release
  })

  const resolved = new Map<string, PublishedRelease>()
  entries.forEach(([key], i) => resolved.set(key, releases[i]))

  return requests.map((request) => {
    const release = resolved.get(lookupKey(request.package, request.version))
    if (!release)
      throw new VersionResolutionError(request.package, request.version, 'invalid-response', 'lookup produced no release')
    if (!release.sdistUrl)
      throw new VersionResolutionError(request.package, request.version, 'not-found', `release ${release.version} has no source distribution`)

    const version = request.version === LATEST ? release.version : request.version
    return {
      ...request,
      version,
      requestedVersion: request.version,
      sdistUrl: release.sdistUrl,
      constraints: constraintsFor(request.package, version, options.constraints),
    }
  })
}
