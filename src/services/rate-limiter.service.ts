/**
 * Rate Limiter
 *
 * Wraps every remote call. Bounds the number of calls in flight and keeps a
 * slot idle for a fixed interval after each call settles, so burst
 * concurrency and steady-state throughput are bounded independently.
 *
 * Uses p-limit for FIFO admission without polling.
 */

import pLimit, { type LimitFunction } from 'p-limit'

export interface RateLimiterOptions {
  /** Maximum calls outstanding at once (default: 20) */
  maxConcurrent: number
  /** Idle time a slot is held after its call settles (default: 2000) */
  minIntervalMs: number
}

export const DEFAULT_RATE_LIMITER_OPTIONS: RateLimiterOptions = {
  maxConcurrent: 20,
  // 30 requests per minute
  minIntervalMs: 60_000 / 30,
}

export class RateLimiterClosedError extends Error {
  constructor() {
    super('Rate limiter has been closed')
    this.name = 'RateLimiterClosedError'
  }
}

export class RateLimiter {
  private readonly limit: LimitFunction
  private readonly options: RateLimiterOptions
  private closed = false

  constructor(options: Partial<RateLimiterOptions> = {}) {
    this.options = { ...DEFAULT_RATE_LIMITER_OPTIONS, ...options }
    this.limit = pLimit(this.options.maxConcurrent)
  }

  get maxConcurrent(): number {
    return this.options.maxConcurrent
  }

  get minIntervalMs(): number {
    return this.options.minIntervalMs
  }

  /** Calls currently holding a slot, including the idle hold */
  get activeCount(): number {
    return this.limit.activeCount
  }

  /** Calls waiting for a slot */
  get pendingCount(): number {
    return this.limit.pendingCount
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Runs a task once a slot is free. The slot, and the caller, wait out
   * `minIntervalMs` after the task settles.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new RateLimiterClosedError()
    }
    return this.limit(async () => {
      if (this.closed) {
        throw new RateLimiterClosedError()
      }
      try {
        return await task()
      } finally {
        if (this.options.minIntervalMs > 0) {
          await new Promise((resolve) =>
            setTimeout(resolve, this.options.minIntervalMs),
          )
        }
      }
    })
  }

  /**
   * Ends the limiter's lifecycle. Calls already running finish; queued calls
   * reject with RateLimiterClosedError as they reach a slot, without running.
   */
  close(): void {
    this.closed = true
  }
}

/**
 * Scopes a rate limiter to one unit of work: created before `fn`, closed after it.
 */
export async function withRateLimiter<T>(
  options: Partial<RateLimiterOptions>,
  fn: (limiter: RateLimiter) => Promise<T>,
): Promise<T> {
  const limiter = new RateLimiter(options)
  try {
    return await fn(limiter)
  } finally {
    limiter.close()
  }
}
