import pLimit from 'p-limit'
import { withTimeout } from '@/lib/async-utils'
import { engineConfig } from '@/lib/config'
import { normalizePosition, normalizeTeamAbbrev, playerKey } from '@/lib/team-abbrev'
import type { Position } from '@/lib/lineup-engine/types'
import { computeRequestSignature, getProviderTTL, ResponseCache } from './response-cache'
import { SlidingWindowRateLimiter } from './rate-limit'
import {
  providerRecordSchema,
  UpstreamError,
  type ProviderRecord,
  type SignalProvider,
  type SnapshotRequest,
} from './types'

export type ProviderStatus = 'ok' | 'cached' | 'failed' | 'rate-limited'

export type SnapshotPlayer = {
  name: string
  position: string
  team: string
  opponent: string | null
  projections: Record<string, number>
  matchupDifficulty: number | null
  defenseRank: number | null
  trendingDelta: number | null
  recentPerformance: { period: number; points: number }[]
  byeWeek: unknown
  teamClinched: boolean
}

export type BuiltSnapshot = {
  season: number
  week: number
  players: SnapshotPlayer[]
  upstreamWarnings: string[]
  providerStatus: Record<string, ProviderStatus>
}

export type SnapshotBuilderOptions = {
  cache?: ResponseCache<ProviderRecord[]>
  rateLimiter?: SlidingWindowRateLimiter
  concurrency?: number
  timeoutMs?: number
}

type FetchOutcome = { records: ProviderRecord[]; notes: string[] }

function validateRecords(providerId: string, payload: unknown, notes: string[]): ProviderRecord[] {
  if (!Array.isArray(payload)) {
    throw new UpstreamError(providerId, 'payload is not a list of player records')
  }
  const records: ProviderRecord[] = []
  let rejected = 0
  for (const item of payload) {
    const parsed = providerRecordSchema.safeParse(item)
    if (parsed.success) records.push(parsed.data)
    else rejected++
  }
  if (rejected) notes.push(`${providerId}: ${rejected} malformed records ignored`)
  return records
}

function emptyPlayer(ref: { name: string; position: string; team: string }): SnapshotPlayer {
  return {
    name: ref.name,
    position: ref.position,
    team: ref.team,
    opponent: null,
    projections: {},
    matchupDifficulty: null,
    defenseRank: null,
    trendingDelta: null,
    recentPerformance: [],
    byeWeek: null,
    teamClinched: false,
  }
}

function teamKey(team: string): string {
  return normalizeTeamAbbrev(team) ?? team.trim().toUpperCase()
}

/**
 * Players keyed by name, position and team, so two players sharing a name and
 * position stay apart. A record without a team joins the one player it names,
 * and is left out when no player or several players match.
 */
class PlayerIndex {
  private readonly players = new Map<string, SnapshotPlayer>()
  private readonly keysByName = new Map<string, string[]>()

  get size(): number {
    return this.players.size
  }

  values(): SnapshotPlayer[] {
    return [...this.players.values()]
  }

  add(name: string, position: Position, team: string): SnapshotPlayer {
    const base = playerKey(name, position)
    const key = `${base}__${teamKey(team)}`
    const existing = this.players.get(key)
    if (existing) return existing
    const player = emptyPlayer({ name, position, team })
    this.players.set(key, player)
    this.keysByName.set(base, [...(this.keysByName.get(base) ?? []), key])
    return player
  }

  matchWithoutTeam(name: string, position: Position): SnapshotPlayer[] {
    const keys = this.keysByName.get(playerKey(name, position)) ?? []
    return keys.flatMap((key) => this.players.get(key) ?? [])
  }
}

// First provider in registration order wins for single-valued fields.
function mergeRecord(target: SnapshotPlayer, providerId: string, record: ProviderRecord) {
  if (record.projection != null) target.projections[providerId] = record.projection
  if (target.opponent === null && record.opponent) target.opponent = record.opponent
  if (target.matchupDifficulty === null && record.matchupDifficulty != null) {
    target.matchupDifficulty = record.matchupDifficulty
  }
  if (target.defenseRank === null && record.defenseRank != null) target.defenseRank = record.defenseRank
  if (target.trendingDelta === null && record.trendingDelta != null) target.trendingDelta = record.trendingDelta
  if (!target.recentPerformance.length && record.recentPerformance?.length) {
    target.recentPerformance = [...record.recentPerformance]
  }
  if (target.byeWeek === null && record.byeWeek !== undefined) target.byeWeek = record.byeWeek
  if (record.teamClinched) target.teamClinched = true
}

/**
 * Fans out to every provider with bounded concurrency and a per-fetch timeout,
 * then merges results in registration order so the snapshot does not depend
 * on which fetch finished first. A failed provider becomes a warning.
 */
export async function buildSnapshot(
  providers: readonly SignalProvider[],
  request: SnapshotRequest,
  options: SnapshotBuilderOptions = {}
): Promise<BuiltSnapshot> {
  const cache = options.cache ?? new ResponseCache<ProviderRecord[]>()
  const limiter = options.rateLimiter ?? new SlidingWindowRateLimiter(engineConfig.rateLimitPerHour)
  const timeoutMs = options.timeoutMs ?? engineConfig.providerTimeoutMs
  const limit = pLimit(options.concurrency ?? engineConfig.fetchConcurrency)
  const warnings: string[] = []
  const statusById = new Map<string, ProviderStatus>()

  const settled = await Promise.allSettled(
    providers.map((provider) =>
      limit(async (): Promise<FetchOutcome> => {
        const key = computeRequestSignature(provider.id, request)
        const cached = cache.get(key)
        if (cached) {
          statusById.set(provider.id, 'cached')
          return { records: cached, notes: [] }
        }

        const budget = limiter.consume('outbound')
        if (!budget.success) {
          statusById.set(provider.id, 'rate-limited')
          throw new UpstreamError(provider.id, `rate limit reached, retry in ${budget.retryAfterSec}s`, 429)
        }

        const payload = await withTimeout(provider.fetch(request), timeoutMs, provider.id)
        const notes: string[] = []
        const records = validateRecords(provider.id, payload, notes)
        cache.set(key, records, getProviderTTL(provider.kind))
        statusById.set(provider.id, 'ok')
        return { records, notes }
      })
    )
  )

  const players = new PlayerIndex()
  for (const ref of request.players) players.add(ref.name, ref.position, ref.team)

  settled.forEach((outcome, i) => {
    const provider = providers[i]
    if (outcome.status === 'rejected') {
      const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason)
      if (statusById.get(provider.id) !== 'rate-limited') statusById.set(provider.id, 'failed')
      warnings.push(`${provider.id} unavailable: ${reason}`)
      console.warn(`[providers] ${provider.id} failed, continuing without it:`, reason)
      return
    }
    warnings.push(...outcome.value.notes)
    for (const record of outcome.value.records) {
      const position = normalizePosition(record.position)
      if (!position) continue
      if (record.team) {
        mergeRecord(players.add(record.name, position, record.team), provider.id, record)
        continue
      }
      const matches = players.matchWithoutTeam(record.name, position)
      if (matches.length === 1) mergeRecord(matches[0], provider.id, record)
      else if (matches.length > 1) {
        warnings.push(`${provider.id}: ${record.name} (${position}) has no team and matches ${matches.length} players; ignored`)
      }
    }
  })

  const providerStatus: Record<string, ProviderStatus> = {}
  for (const provider of providers) {
    providerStatus[provider.id] = statusById.get(provider.id) ?? 'failed'
  }

  console.log(
    `[providers] Snapshot week ${request.week}: ${players.size} players from ${providers.length} providers (${warnings.length} warnings)`
  )

  return {
    season: request.season,
    week: request.week,
    players: players.values(),
    upstreamWarnings: warnings,
    providerStatus,
  }
}
