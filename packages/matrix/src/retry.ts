export interface RetryOptions {
  /** Retries after the first attempt */
  retries: number
  /** Initial delay in ms, doubled after every failed attempt */
  delay: number
  /** Only errors this returns true for are retried */
  shouldRetry?: (error: unknown) => boolean
  /** Called before each retry */
  onRetry?: (error: unknown, attempt: number, delay: number) => void
  sleep?: (ms: number) => Promise<void>
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Run `fn`, retrying with exponential backoff on errors `shouldRetry`
 * accepts. The last error is rethrown untouched.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep
  const shouldRetry = options.shouldRetry ?? (() => true)
  let attempt = 0

  while (true) {
    try {
      return await fn(attempt)
    }
    catch (error) {
      if (attempt >= options.retries || !shouldRetry(error))
        throw error

      const delay = options.delay * 2 ** attempt
      options.onRetry?.(error, attempt + 1, delay)
      attempt++
      if (delay > 0)
        await wait(delay)
    }
  }
}

/**
 * Map over `items` with at most `limit` calls in flight. Results keep the
 * input order and the first rejection rejects the whole call.
 */
export async function mapWithConcurrency<T, R>(items: readonly T[], limit: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++
      results[index] = await fn(items[index], index)
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker())
  await Promise.all(workers)
  return results
}
