import { describe, it, expect, vi, beforeEach } from 'vitest'
import { sleep } from '@/lib/async-utils'
import { ByeWeekResolver } from '@/lib/lineup-engine/bye-weeks'
import { runLineupRequest } from '@/lib/lineup-engine/service'
import { buildSnapshot } from '@/lib/providers/snapshot-builder'
import { ResponseCache } from '@/lib/providers/response-cache'
import { SlidingWindowRateLimiter } from '@/lib/providers/rate-limit'
import {
  UpstreamError,
  type ProviderKind,
  type ProviderRecord,
  type SignalProvider,
  type SnapshotRequest,
  type TrendingProvider,
} from '@/lib/providers'

const request: SnapshotRequest = {
  season: 2025,
  week: 4,
  players: [
    { name: 'Josh Allen', position: 'QB', team: 'BUF' },
    { name: 'Bijan Robinson', position: 'RB', team: 'ATL' },
  ],
}

function provider(id: string, kind: ProviderKind, payload: unknown, delayMs = 0): SignalProvider {
  return {
    id,
    kind,
    fetch: async () => {
      if (delayMs) await sleep(delayMs)
      return payload
    },
  }
}

function failing(id: string, message: string): SignalProvider {
  return {
    id,
    kind: 'matchups',
    fetch: async () => {
      throw new UpstreamError(id, message, 503)
    },
  }
}

const limiter = () => new SlidingWindowRateLimiter(100, 60_000)

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

describe('buildSnapshot', () => {
  it('merges projections per provider and turns failures into warnings', async () => {
    const snapshot = await buildSnapshot(
      [
        provider('sleeper', 'projections', [
          { name: 'Josh Allen', position: 'QB', projection: 24.1, opponent: 'MIA' },
          { name: 'Bijan Robinson', position: 'RB', projection: 17 },
        ]),
        provider('yahoo', 'projections', [{ name: 'Josh Allen', position: 'qb', projection: 22.5, opponent: 'NE' }]),
        failing('matchups', 'down'),
      ],
      request,
      { rateLimiter: limiter(), concurrency: 2, timeoutMs: 500 }
    )

    expect(snapshot.players[0]).toMatchObject({
      name: 'Josh Allen',
      team: 'BUF',
      opponent: 'MIA',
      projections: { sleeper: 24.1, yahoo: 22.5 },
      matchupDifficulty: null,
    })
    expect(snapshot.players[1].projections).toEqual({ sleeper: 17 })
    expect(snapshot.upstreamWarnings).toEqual(['matchups unavailable: matchups: down'])
    expect(snapshot.providerStatus).toEqual({ sleeper: 'ok', yahoo: 'ok', matchups: 'failed' })
  })

  it('produces the same snapshot whichever provider answers first', async () => {
    const records = (opponent: string): ProviderRecord[] => [
      { name: 'Josh Allen', position: 'QB', opponent },
    ]
    const slowFirst = await buildSnapshot(
      [provider('a', 'matchups', records('MIA'), 30), provider('b', 'matchups', records('NE'))],
      request,
      { rateLimiter: limiter(), concurrency: 2, timeoutMs: 500 }
    )
    expect(slowFirst.players[0].opponent).toBe('MIA')
  })

  it('times out a slow provider', async () => {
    const snapshot = await buildSnapshot([provider('slow', 'trending', [], 200)], request, {
      rateLimiter: limiter(),
      timeoutMs: 20,
    })
    expect(snapshot.upstreamWarnings).toEqual(['slow unavailable: slow timed out after 20ms'])
    expect(snapshot.providerStatus.slow).toBe('failed')
  })

  it('serves repeat requests from cache', async () => {
    const fetch = vi.fn(async () => [{ name: 'Josh Allen', position: 'QB', trendingDelta: 4200 }])
    const trending: TrendingProvider = { id: 'trending', kind: 'trending', fetch }
    const cache = new ResponseCache<ProviderRecord[]>()

    await buildSnapshot([trending], request, { cache, rateLimiter: limiter() })
    const second = await buildSnapshot([trending], request, { cache, rateLimiter: limiter() })

    expect(fetch).toHaveBeenCalledTimes(1)
    expect(second.providerStatus.trending).toBe('cached')
    expect(second.players[0].trendingDelta).toBe(4200)
  })

  it('stops calling providers once the hourly budget is spent', async () => {
    const snapshot = await buildSnapshot(
      [provider('first', 'projections', []), provider('second', 'projections', [])],
      request,
      { rateLimiter: new SlidingWindowRateLimiter(1), concurrency: 1 }
    )
    expect(snapshot.providerStatus).toEqual({ first: 'ok', second: 'rate-limited' })
    expect(snapshot.upstreamWarnings[0]).toMatch(/^second unavailable: second: rate limit reached/)
  })

  it('drops malformed records with a note', async () => {
    const snapshot = await buildSnapshot(
      [provider('recent', 'recent', [{ name: 'Josh Allen', position: 'QB', projection: 'lots' }, { position: 'RB' }])],
      request,
      { rateLimiter: limiter() }
    )
    expect(snapshot.upstreamWarnings).toEqual(['recent: 2 malformed records ignored'])
  })

  it('rejects a payload that is not a list', async () => {
    const snapshot = await buildSnapshot([provider('odd', 'recent', { players: [] })], request, {
      rateLimiter: limiter(),
    })
    expect(snapshot.upstreamWarnings).toEqual(['odd unavailable: odd: payload is not a list of player records'])
  })

  it('adds players a provider reports beyond the request', async () => {
    const snapshot = await buildSnapshot(
      [
        provider('sleeper', 'projections', [
          { name: 'Puka Nacua', position: 'WR', team: 'LAR', projection: 15 },
          { name: 'Nobody', position: 'WR', projection: 3 },
        ]),
      ],
      request,
      { rateLimiter: limiter() }
    )
    expect(snapshot.players.map((p) => p.name)).toEqual(['Josh Allen', 'Bijan Robinson', 'Puka Nacua'])
  })

  it('keeps same-name players on different teams apart', async () => {
    const twins: SnapshotRequest = {
      season: 2025,
      week: 4,
      players: [
        { name: 'Mike Williams', position: 'WR', team: 'NYJ' },
        { name: 'Mike Williams', position: 'WR', team: 'PIT' },
      ],
    }
    const snapshot = await buildSnapshot(
      [
        provider('sleeper', 'projections', [
          { name: 'Mike Williams', position: 'WR', team: 'pit', projection: 9 },
          { name: 'Mike Williams', position: 'WR', team: 'NYJ', projection: 4 },
          { name: 'Mike Williams', position: 'WR', projection: 7 },
        ]),
      ],
      twins,
      { rateLimiter: limiter() }
    )
    expect(snapshot.players.map((p) => [p.team, p.projections])).toEqual([
      ['NYJ', { sleeper: 4 }],
      ['PIT', { sleeper: 9 }],
    ])
    expect(snapshot.upstreamWarnings).toEqual(['sleeper: Mike Williams (WR) has no team and matches 2 players; ignored'])
  })

  it('feeds a degraded snapshot into a partial lineup', async () => {
    const snapshot = await buildSnapshot(
      [provider('sleeper', 'projections', [{ name: 'Josh Allen', position: 'QB', projection: 24 }]), failing('matchups', 'down')],
      request,
      { rateLimiter: limiter() }
    )
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const response = runLineupRequest(
      { ...snapshot, strategy: 'balanced' },
      { byeResolver: ByeWeekResolver.fromJson({ season: 2025, byeWeeks: { BUF: 7, ATL: 5 } }) }
    )
    expect(response.status).toBe('partial')
    expect(response.warnings[0]).toBe('matchups unavailable: matchups: down')
    expect(response.payload?.starters.find((s) => s.slot === 'QB')?.player?.name).toBe('Josh Allen')
  })
})
