import type { ListObjectsV2CommandInput, ListObjectsV2CommandOutput } from '@aws-sdk/client-s3'
import type { Logger } from './logging'
import type { ArtifactIndex } from './types'
import fs from 'node:fs'
import { ListObjectsV2Command, S3Client } from '@aws-sdk/client-s3'
import { errorMessage, IndexQueryError } from './errors'
import { silentLogger } from './logging'
import { withRetry } from './retry'

export type ListObjectsPage = (input: ListObjectsV2CommandInput) => Promise<ListObjectsV2CommandOutput>

export interface S3ArtifactIndexOptions {
  bucket: string
  region?: string
  /** Key prefix wheels are stored under */
  prefix?: string
  /** Per-request timeout in ms */
  timeout?: number
  retries?: number
  retryDelay?: number
  /** Replaces the S3 call, for tests */
  listObjects?: ListObjectsPage
  sleep?: (ms: number) => Promise<void>
  logger?: Logger
}

function basename(key: string): string {
  return key.slice(key.lastIndexOf('/') + 1)
}

const TRANSIENT_ERRORS = new Set([
  'TimeoutError',
  'RequestTimeout',
  'RequestTimeoutException',
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
])

/**
 * Network failures, timeouts, throttling and 5xx responses. Errors such as
 * NoSuchBucket or AccessDenied will fail the same way again.
 */
export function isTransientS3Error(error: unknown): boolean {
  if (typeof error !== 'object' || error === null)
    return false

  const fields: Record<string, unknown> = { ...error }
  if (fields.$retryable !== undefined)
    return true

  const metadata = fields.$metadata
  const status = typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata
    ? metadata.httpStatusCode
    : undefined
  if (typeof status === 'number')
    return status === 429 || status >= 500 || TRANSIENT_ERRORS.has(String(fields.name))

  const name = error instanceof Error ? error.name : fields.name
  return TRANSIENT_ERRORS.has(String(name)) || TRANSIENT_ERRORS.has(String(fields.code))
}

function pick(published: Set<string>, filenames: string[]): Set<string> {
  return new Set(filenames.filter(name => published.has(name)))
}

/**
 * Wheel index stored in an S3 bucket, one object per wheel
 *
 * The whole prefix is listed once per query and membership is tested
 * locally, rather than one request per wheel. Never writes to the bucket.
 */
export class S3ArtifactIndex implements ArtifactIndex {
  private bucket: string
  private prefix: string
  private retries: number
  private retryDelay: number
  private listObjects: ListObjectsPage
  private sleep?: (ms: number) => Promise<void>
  private logger: Logger

  constructor(options: S3ArtifactIndexOptions) {
    this.bucket = options.bucket
    this.prefix = options.prefix ?? 'packages/'
    this.retries = options.retries ?? 3
    this.retryDelay = options.retryDelay ?? 1000
    this.sleep = options.sleep
    this.logger = options.logger ?? silentLogger

    if (options.listObjects) {
      this.listObjects = options.listObjects
    }
    else {
      const timeout = options.timeout ?? 30000
      // Retries are ours; the SDK would multiply them
      const client = new S3Client({
        region: options.region ?? 'us-east-1',
        maxAttempts: 1,
        requestHandler: { requestTimeout: timeout, connectionTimeout: timeout },
      })
      this.listObjects = input => client.send(new ListObjectsV2Command(input))
    }
  }

  get location(): string {
    return `s3://${this.bucket}/${this.prefix}`
  }

  async listPublished(filenames: string[]): Promise<Set<string>> {
    if (filenames.length === 0)
      return new Set()
    return pick(await this.listAll(), filenames)
  }

  /**
   * File names of every object under the prefix
   */
  async listAll(): Promise<Set<string>> {
    const names = new Set<string>()
    let token: string | undefined
    let pages = 0

    do {
      const page = await this.listPage(token)
      for (const object of page.Contents ?? []) {
        if (object.Key)
          names.add(basename(object.Key))
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined
      pages++
    } while (token)

    this.logger.debug(`Listed ${names.size} wheels in ${pages} page(s) from ${this.location}`)
    return names
  }

  private async listPage(token?: string): Promise<ListObjectsV2CommandOutput> {
    try {
      return await withRetry(() => this.listObjects({
        Bucket: this.bucket,
        Prefix: this.prefix,
        ContinuationToken: token,
      }), {
        retries: this.retries,
        delay: this.retryDelay,
        sleep: this.sleep,
        shouldRetry: isTransientS3Error,
        onRetry: (error, attempt, delay) =>
          this.logger.warn(`Listing ${this.location} failed (${errorMessage(error)}), retry ${attempt}/${this.retries} in ${delay}ms`),
      })
    }
    catch (error) {
      throw new IndexQueryError(this.location, errorMessage(error), { cause: error })
    }
  }
}

/**
 * Wheel index backed by a local directory of .whl files
 */
export class LocalArtifactIndex implements ArtifactIndex {
  constructor(private directory: string) {}

  async listPublished(filenames: string[]): Promise<Set<string>> {
    let entries: string[]
    try {
      entries = await fs.promises.readdir(this.directory)
    }
    catch (error) {
      throw new IndexQueryError(this.directory, errorMessage(error), { cause: error })
    }
    return pick(new Set(entries.filter(name => name.endsWith('.whl'))), filenames)
  }
}

/**
 * In-memory wheel index for development/testing
 */
export class InMemoryArtifactIndex implements ArtifactIndex {
  private published: Set<string>

  constructor(filenames: Iterable<string> = []) {
    this.published = new Set(filenames)
  }

  add(filename: string): void {
    this.published.add(filename)
  }

  async listPublished(filenames: string[]): Promise<Set<string>> {
    return pick(this.published, filenames)
  }
}
