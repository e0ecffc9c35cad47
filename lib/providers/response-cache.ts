import { createHash } from 'node:crypto'
import type { ProviderKind } from './types'

export const PROVIDER_TTL_MS: Record<ProviderKind, number> = {
  projections: 30 * 60 * 1000,
  matchups: 6 * 60 * 60 * 1000,
  trending: 15 * 60 * 1000,
  recent: 60 * 60 * 1000,
}

export const DEFAULT_TTL_MS = 10 * 60 * 1000

export function getProviderTTL(kind: ProviderKind | null): number {
  return kind ? PROVIDER_TTL_MS[kind] : DEFAULT_TTL_MS
}

export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return 'null'
  if (typeof value !== 'object') return JSON.stringify(value)
  if (Array.isArray(value)) return '[' + value.map(stableStringify).join(',') + ']'
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + stableStringify(v)).join(',') + '}'
}

export function computeRequestSignature(providerId: string, request: unknown): string {
  return createHash('sha256').update(`${providerId}|${stableStringify(request)}`).digest('hex')
}

type Entry<T> = { value: T; expiresAt: number }

/**
 * In-memory TTL cache keyed by request signature. One instance is owned by
 * whoever builds snapshots; the engine never sees it.
 */
export class ResponseCache<T> {
  private readonly entries = new Map<string, Entry<T>>()
  private readonly now: () => number

  constructor(now: () => number = Date.now) {
    this.now = now
  }

  get(key: string): T | null {
    const entry = this.entries.get(key)
    if (!entry) return null
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key)
      return null
    }
    return entry.value
  }

  set(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs })
  }

  prune(): number {
    const now = this.now()
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key)
        removed++
      }
    }
    return removed
  }

  get size(): number {
    return this.entries.size
  }
}
