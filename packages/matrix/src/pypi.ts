import type { Logger } from './logging'
import type { PublicIndex, PublishedRelease } from './types'
import { errorMessage, VersionResolutionError } from './errors'
import { silentLogger } from './logging'
import { withRetry } from './retry'
import { LATEST } from './types'

export const PYPI_URL = 'https://pypi.org/pypi'

export interface PyPIClientOptions {
  baseUrl?: string
  /** Per-request timeout in ms */
  timeout?: number
  retries?: number
  retryDelay?: number
  fetch?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  logger?: Logger
}

interface PyPIRelease {
  info?: { version?: unknown }
  urls?: Array<{ packagetype?: unknown, url?: unknown }>
}

interface PyPIResponse {
  status: number
  /** Body of a successful response */
  text?: string
}

/**
 * Marks a failure that another attempt might fix
 */
class TransientError extends Error {}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error('aborted'))
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      },
    )
  })
}

function isPyPIRelease(value: unknown): value is PyPIRelease {
  return typeof value === 'object' && value !== null
}

/**
 * Client for the PyPI JSON API
 *
 * `latest` resolves through `/{name}/json`, concrete versions through
 * `/{name}/{version}/json`. 404 means not found and is never retried;
 * network errors, timeouts, 429 and 5xx are retried with backoff.
 */
export class PyPIClient implements PublicIndex {
  private baseUrl: string
  private timeout: number
  private retries: number
  private retryDelay: number
  private fetchImpl: typeof fetch
  private sleep?: (ms: number) => Promise<void>
  private logger: Logger

  constructor(options: PyPIClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? PYPI_URL).replace(/\/+$/, '')
    this.timeout = options.timeout ?? 30000
    this.retries = options.retries ?? 3
    this.retryDelay = options.retryDelay ?? 1000
    this.fetchImpl = options.fetch ?? globalThis.fetch
    this.sleep = options.sleep
    this.logger = options.logger ?? silentLogger
  }

  releaseUrl(name: string, version: string): string {
    const pkg = encodeURIComponent(name)
    return version === LATEST
      ? `${this.baseUrl}/${pkg}/json`
      : `${this.baseUrl}/${pkg}/${encodeURIComponent(version)}/json`
  }

  async getRelease(name: string, version: string): Promise<PublishedRelease> {
    const url = this.releaseUrl(name, version)

    let response: PyPIResponse
    try {
      response = await withRetry(() => this.request(url), {
        retries: this.retries,
        delay: this.retryDelay,
        sleep: this.sleep,
        shouldRetry: error => error instanceof TransientError,
        onRetry: (error, attempt, delay) =>
          this.logger.warn(`PyPI lookup for ${name}@${version} failed (${errorMessage(error)}), retry ${attempt}/${this.retries} in ${delay}ms`),
      })
    }
    catch (error) {
      throw new VersionResolutionError(name, version, 'transport', errorMessage(error), { cause: error })
    }

    if (response.status === 404)
      throw new VersionResolutionError(name, version, 'not-found', `${url} returned 404`)
    if (response.text === undefined)
      throw new VersionResolutionError(name, version, 'transport', `${url} returned ${response.status}`)

    let body: unknown
    try {
      body = JSON.parse(response.text)
    }
    catch (error) {
      throw new VersionResolutionError(name, version, 'invalid-response', `malformed JSON from ${url}`, { cause: error })
    }

    return this.toRelease(name, version, body)
  }

  /**
   * One attempt: headers and body are both read under the timeout
   */
  private async request(url: string): Promise<PyPIResponse> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeout)

    try {
      const response = await untilAborted(this.fetchImpl(url, {
        signal: controller.signal,
        headers: { Accept: 'application/json' },
      }), controller.signal)
      if (response.status === 429 || response.status >= 500)
        throw new TransientError(`${url} returned ${response.status}`)
      if (!response.ok)
        return { status: response.status }
      return { status: response.status, text: await untilAborted(response.text(), controller.signal) }
    }
    catch (error) {
      if (error instanceof TransientError)
        throw error
      if (controller.signal.aborted)
        throw new TransientError(`${url} timed out after ${this.timeout}ms`)
      throw new TransientError(`${url}: ${errorMessage(error)}`)
    }
    finally {
      clearTimeout(timeoutId)
    }
  }

  private toRelease(name: string, version: string, body: unknown): PublishedRelease {
    const resolved = isPyPIRelease(body) ? body.info?.version : undefined
    if (!isPyPIRelease(body) || typeof resolved !== 'string' || !resolved)
      throw new VersionResolutionError(name, version, 'invalid-response', 'response has no info.version')

    const urls = Array.isArray(body.urls) ? body.urls : []
    const sdist = urls.find(u => u.packagetype === 'sdist')
    return {
      version: resolved,
      sdistUrl: typeof sdist?.url === 'string' ? sdist.url : undefined,
    }
  }
}
