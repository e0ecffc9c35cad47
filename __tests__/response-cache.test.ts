import { describe, it, expect } from 'vitest'
import {
  computeRequestSignature,
  getProviderTTL,
  ResponseCache,
  stableStringify,
  DEFAULT_TTL_MS,
} from '@/lib/providers/response-cache'

describe('stableStringify', () => {
  it('sorts object keys at every depth', () => {
    expect(stableStringify({ b: [1, { d: 1, c: 2 }], a: null })).toBe('{"a":null,"b":[1,{"c":2,"d":1}]}')
  })
})

describe('computeRequestSignature', () => {
  it('ignores key order but not the provider id', () => {
    const a = computeRequestSignature('sleeper', { week: 3, season: 2025 })
    const b = computeRequestSignature('sleeper', { season: 2025, week: 3 })
    const c = computeRequestSignature('espn', { season: 2025, week: 3 })
    expect(a).toBe(b)
    expect(a).not.toBe(c)
    expect(a).toMatch(/^[0-9a-f]{64}$/)
  })
})

describe('getProviderTTL', () => {
  it('uses per-kind TTLs with a default', () => {
    expect(getProviderTTL('matchups')).toBe(6 * 60 * 60 * 1000)
    expect(getProviderTTL('trending')).toBe(15 * 60 * 1000)
    expect(getProviderTTL(null)).toBe(DEFAULT_TTL_MS)
  })
})

describe('ResponseCache', () => {
  it('expires entries once their TTL has elapsed', () => {
    let clock = 1_000
    const cache = new ResponseCache<string>(() => clock)
    cache.set('k', 'v', 500)
    clock = 1_499
    expect(cache.get('k')).toBe('v')
    clock = 1_500
    expect(cache.get('k')).toBeNull()
    expect(cache.size).toBe(0)
  })

  it('prunes only expired entries', () => {
    let clock = 0
    const cache = new ResponseCache<number>(() => clock)
    cache.set('short', 1, 10)
    cache.set('long', 2, 100)
    clock = 50
    expect(cache.prune()).toBe(1)
    expect(cache.get('long')).toBe(2)
  })
})
