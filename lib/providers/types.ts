import { z } from 'zod'
import type { Position } from '@/lib/lineup-engine/types'

export type ProviderKind = 'projections' | 'matchups' | 'trending' | 'recent'

export type PlayerRef = {
  name: string
  position: Position
  team: string
}

export type SnapshotRequest = {
  season: number
  week: number
  players: PlayerRef[]
}

/**
 * One upstream source. `fetch` may return any JSON-like payload; records are
 * validated before they reach the snapshot.
 */
export interface SignalProvider {
  readonly id: string
  readonly kind: ProviderKind
  fetch(request: SnapshotRequest): Promise<unknown>
}

export type ProjectionProvider = SignalProvider & { readonly kind: 'projections' }
export type MatchupProvider = SignalProvider & { readonly kind: 'matchups' }
export type TrendingProvider = SignalProvider & { readonly kind: 'trending' }
export type RecentFormProvider = SignalProvider & { readonly kind: 'recent' }

const optionalNumber = z.number().finite().nullish()

export const providerRecordSchema = z.object({
  name: z.string().trim().min(1),
  position: z.string().min(1),
  team: z.string().nullish(),
  opponent: z.string().nullish(),
  projection: optionalNumber,
  matchupDifficulty: optionalNumber,
  defenseRank: optionalNumber,
  trendingDelta: optionalNumber,
  recentPerformance: z
    .array(z.object({ period: z.number().int(), points: z.number().finite() }))
    .nullish(),
  byeWeek: z.unknown().optional(),
  teamClinched: z.boolean().nullish(),
})

export type ProviderRecord = z.infer<typeof providerRecordSchema>

export class UpstreamError extends Error {
  provider: string
  status: number | null

  constructor(provider: string, message: string, status: number | null = null) {
    super(`${provider}: ${message}`)
    this.name = 'UpstreamError'
    this.provider = provider
    this.status = status
  }
}
