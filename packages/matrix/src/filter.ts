import type { Logger } from './logging'
import type { ArtifactIndex, ResolvedBuildRequest } from './types'
import { silentLogger } from './logging'
import { wheelFilename } from './wheel'

export interface FilterResult {
  /** Requests with no published wheel, in input order */
  pending: ResolvedBuildRequest[]
  /** Requests whose wheel is already in the index */
  published: ResolvedBuildRequest[]
}

/**
 * Split requests into those still to build and those already published:
 * `pending` is {requested} − {published}
 */
export async function filterPublished(requests: ResolvedBuildRequest[], index: ArtifactIndex, logger: Logger = silentLogger): Promise<FilterResult> {
  const filenames = Array.from(new Set(requests.map(wheelFilename)))
  const existing = await index.listPublished(filenames)

  const pending: ResolvedBuildRequest[] = []
  const published: ResolvedBuildRequest[] = []

  for (const request of requests) {
    const filename = wheelFilename(request)
    if (existing.has(filename)) {
      logger.debug(`${filename} is already published`)
      published.push(request)
    }
    else {
      logger.debug(`${filename} is not present in the index`)
      pending.push(request)
    }
  }

  return { pending, published }
}
