import { describe, it, expect } from 'vitest'
import { SlidingWindowRateLimiter } from '@/lib/providers/rate-limit'

describe('SlidingWindowRateLimiter', () => {
  it('blocks once the window is full and frees up as calls age out', () => {
    let clock = 0
    const limiter = new SlidingWindowRateLimiter(2, 1000, () => clock)

    expect(limiter.consume()).toMatchObject({ success: true, remaining: 1 })
    clock = 100
    expect(limiter.consume()).toMatchObject({ success: true, remaining: 0 })
    clock = 200
    expect(limiter.consume()).toEqual({
      success: false,
      remaining: 0,
      retryAfterSec: 1,
      resetTimeMs: 1000,
      key: 'outbound',
    })
    clock = 1001
    expect(limiter.consume()).toMatchObject({ success: true, remaining: 0 })
  })

  it('tracks keys separately and normalizes them', () => {
    const limiter = new SlidingWindowRateLimiter(1, 1000, () => 0)
    expect(limiter.consume('Sleeper API').key).toBe('sleeperapi')
    expect(limiter.consume('sleeper api').success).toBe(false)
    expect(limiter.remaining('espn')).toBe(1)
  })
})
