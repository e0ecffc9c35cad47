export type RateLimitResult = {
  success: boolean
  remaining: number
  retryAfterSec: number
  resetTimeMs: number
  key: string
}

const HOUR_MS = 60 * 60 * 1000

function normalizeKeyPart(v: string) {
  return (v || '').trim().toLowerCase().replace(/\s+/g, '')
}

/**
 * Sliding-window limiter: at most `maxCalls` calls per key within the trailing
 * window (one hour by default).
 */
export class SlidingWindowRateLimiter {
  private readonly calls = new Map<string, number[]>()

  constructor(
    private readonly maxCalls: number,
    private readonly windowMs: number = HOUR_MS,
    private readonly now: () => number = Date.now
  ) {}

  private recent(key: string, now: number): number[] {
    const cutoff = now - this.windowMs
    const kept = (this.calls.get(key) ?? []).filter((t) => t > cutoff)
    this.calls.set(key, kept)
    return kept
  }

  consume(rawKey = 'outbound'): RateLimitResult {
    const key = normalizeKeyPart(rawKey) || 'outbound'
    const now = this.now()
    const recent = this.recent(key, now)

    if (recent.length >= this.maxCalls) {
      const resetTimeMs = recent[0] + this.windowMs
      return {
        success: false,
        remaining: 0,
        retryAfterSec: Math.max(1, Math.ceil((resetTimeMs - now) / 1000)),
        resetTimeMs,
        key,
      }
    }

    recent.push(now)
    return {
      success: true,
      remaining: this.maxCalls - recent.length,
      retryAfterSec: 0,
      resetTimeMs: recent[0] + this.windowMs,
      key,
    }
  }

  remaining(rawKey = 'outbound'): number {
    const key = normalizeKeyPart(rawKey) || 'outbound'
    return Math.max(0, this.maxCalls - this.recent(key, this.now()).length)
  }
}
