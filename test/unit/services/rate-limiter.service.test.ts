import {
  DEFAULT_RATE_LIMITER_OPTIONS,
  RateLimiter,
  RateLimiterClosedError,
  withRateLimiter,
} from '@services/rate-limiter.service.js'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should default to 20 concurrent calls and a 2 second interval', () => {
    const limiter = new RateLimiter()

    expect(limiter.maxConcurrent).toBe(20)
    expect(limiter.minIntervalMs).toBe(2000)
    expect(DEFAULT_RATE_LIMITER_OPTIONS.minIntervalMs).toBe(2000)
  })

  it('should bound the number of calls in flight', async () => {
    const limiter = new RateLimiter({ maxConcurrent: 2, minIntervalMs: 0 })
    let running = 0
    let peak = 0
    const task = async () => {
      running++
      peak = Math.max(peak, running)
      await new Promise((resolve) => setTimeout(resolve, 100))
      running--
    }

    const all = Promise.all([1, 2, 3, 4, 5].map(() => limiter.run(task)))
    await vi.advanceTimersByTimeAsync(500)
    await all

    expect(peak).toBe(2)
  })

  it('should hold a slot idle for the interval after a call settles', async () => {
    const limiter = new RateLimiter({ maxConcurrent: 1, minIntervalMs: 1000 })
    const started: number[] = []
    const task = async () => {
      started.push(Date.now())
    }

    const first = limiter.run(task)
    const second = limiter.run(task)

    await vi.advanceTimersByTimeAsync(0)
    expect(started).toHaveLength(1)
    expect(limiter.pendingCount).toBe(1)

    await vi.advanceTimersByTimeAsync(999)
    expect(started).toHaveLength(1)

    await vi.advanceTimersByTimeAsync(1)
    expect(started).toHaveLength(2)
    expect(started[1] - started[0]).toBe(1000)

    await vi.advanceTimersByTimeAsync(1000)
    await Promise.all([first, second])
  })

  it('should hold the slot after a failed call as well', async () => {
    const limiter = new RateLimiter({ maxConcurrent: 1, minIntervalMs: 500 })
    const failing = limiter.run(async () => {
      throw new Error('boom')
    })
    const assertion = expect(failing).rejects.toThrow('boom')
    const next = vi.fn(async () => 'ok')
    const second = limiter.run(next)

    await vi.advanceTimersByTimeAsync(499)
    expect(next).not.toHaveBeenCalled()

    await vi.advanceTimersByTimeAsync(1)
    expect(next).toHaveBeenCalledTimes(1)

    await vi.advanceTimersByTimeAsync(500)
    await assertion
    await expect(second).resolves.toBe('ok')
  })

  it('should admit callers in FIFO order', async () => {
    const limiter = new RateLimiter({ maxConcurrent: 1, minIntervalMs: 10 })
    const order: number[] = []

    const all = Promise.all(
      [1, 2, 3].map((n) =>
        limiter.run(async () => {
          order.push(n)
        }),
      ),
    )
    await vi.advanceTimersByTimeAsync(100)
    await all

    expect(order).toEqual([1, 2, 3])
  })

  it('should reject new work after close', async () => {
    const limiter = new RateLimiter({ minIntervalMs: 0 })
    limiter.close()

    expect(limiter.isClosed).toBe(true)
    await expect(limiter.run(async () => 1)).rejects.toBeInstanceOf(
      RateLimiterClosedError,
    )
  })

  it('should reject queued callers on close without running them', async () => {
    const limiter = new RateLimiter({ maxConcurrent: 1, minIntervalMs: 1000 })
    const queued = vi.fn(async () => 'late')

    const running = limiter.run(async () => 'first')
    const waiting = limiter.run(queued)
    const rejected = expect(waiting).rejects.toBeInstanceOf(RateLimiterClosedError)

    await vi.advanceTimersByTimeAsync(0)
    limiter.close()
    await vi.advanceTimersByTimeAsync(1000)

    await expect(running).resolves.toBe('first')
    await rejected
    expect(queued).not.toHaveBeenCalled()
    expect(limiter.pendingCount).toBe(0)
  })

  describe('withRateLimiter', () => {
    it('should close the limiter after the scoped work', async () => {
      let captured: RateLimiter | undefined

      const result = await withRateLimiter({ minIntervalMs: 0 }, async (limiter) => {
        captured = limiter
        return limiter.run(async () => 7)
      })

      expect(result).toBe(7)
      expect(captured?.isClosed).toBe(true)
    })

    it('should close the limiter when the scoped work throws', async () => {
      let captured: RateLimiter | undefined

      await expect(
        withRateLimiter({ minIntervalMs: 0 }, async (limiter) => {
          captured = limiter
          throw new Error('failed')
        }),
      ).rejects.toThrow('failed')

      expect(captured?.isClosed).toBe(true)
    })
  })
})
