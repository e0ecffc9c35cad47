export const POSITIONS = ['QB', 'RB', 'WR', 'TE', 'K', 'DEF'] as const
export type Position = (typeof POSITIONS)[number]

export const STRATEGY_NAMES = ['conservative', 'balanced', 'aggressive'] as const
export type StrategyName = (typeof STRATEGY_NAMES)[number]

export const TIERS = ['elite', 'stud', 'solid', 'flex', 'bench'] as const
export type Tier = (typeof TIERS)[number]

export const TIER_MODES = ['fixed', 'percentile'] as const
export type TierMode = (typeof TIER_MODES)[number]

export type RiskDirection = 'floor' | 'neutral' | 'ceiling'

export type PlayerFlag =
  | 'on bye'
  | 'matchup unknown'
  | 'low data confidence'
  | 'breakout candidate'
  | 'declining role'
  | 'high ceiling'
  | 'consistent'
  | 'possible rest risk'

// A signal that was never reported is distinct from a reported zero.
export type Signal =
  | { kind: 'known'; value: number }
  | { kind: 'unknown' }

export type RecentPerformance = {
  period: number
  points: number
}

export type RawPlayerSignals = {
  name: string
  position: Position
  team: string
  opponent: string | null
  projections: Readonly<Record<string, number>>
  matchupDifficulty: number | null
  trendingDelta: number | null
  recentPerformance: readonly RecentPerformance[]
  reportedByeWeek: unknown
  teamClinched: boolean
}

export type BlendWeights = {
  projection: number
  matchup: number
  trending: number
  momentum: number
}

export type DraftWeights = {
  vor: number
  scarcity: number
  need: number
}

// Minimum projected points for each tier above bench.
export type TierThresholds = Record<Exclude<Tier, 'bench'>, number>

export type StrategyProfile = {
  name: StrategyName
  weights: BlendWeights
  riskDirection: RiskDirection
  tierMode: TierMode
  tierThresholds: Readonly<Record<Position, Readonly<TierThresholds>>>
  tierMultipliers: Record<Tier, number>
  draftWeights: DraftWeights
}

export type PositionValue = {
  baseline: number
  vor: number
  scarcity: number
  flexValue: number
}

export type ScoredPlayer = {
  index: number
  name: string
  position: Position
  team: string
  opponent: string | null
  providerProjections: Readonly<Record<string, number>>
  projection: Signal
  // replacement level stands in for an unknown projection
  effectiveProjection: number
  adjustedProjection: number
  normalizedProjection: number
  matchupScore: number
  matchupLabel: string
  trendingDelta: number | null
  trendingScore: number
  momentumScore: number
  consistencyScore: number
  floor: number
  ceiling: number
  positionValue: PositionValue
  blendedScore: number
  tier: Tier
  compositeScore: number
  byeWeek: number | null
  onBye: boolean
  flags: PlayerFlag[]
  recommendation: string
  reasoning: string
}

export type RosterSlot = {
  name: string
  accepts: readonly Position[]
}

export type SlotAssignment = {
  slot: string
  accepts: readonly Position[]
  player: ScoredPlayer | null
}

export type DataQualitySummary = {
  totalPlayers: number
  withProjection: number
  withCompleteSignals: number
  // fraction of players with at least one real provider projection
  projectionCoverage: number
  // fraction of players with projection, matchup, trending and recent form
  completeFraction: number
}

export type LineupResult = {
  strategy: StrategyName
  week: number
  starters: SlotAssignment[]
  bench: ScoredPlayer[]
  totalCompositeValue: number
  recommendations: string[]
  warnings: string[]
  dataQuality: DataQualitySummary
}

export type NeedLevel = 'critical' | 'high' | 'medium' | 'low' | 'saturated'

export type ScarcityTier = 'abundant' | 'balanced' | 'scarce' | 'desert'

export type DraftRosterPlayer = {
  name: string
  position: Position
  team: string
}

export type DraftPosition = {
  overallPick: number
  round: number
  pickInRound: number
  picksUntilNext: number
  phase: 'early' | 'middle' | 'late'
}

export type DraftRankingEntry = {
  rank: number
  name: string
  position: Position
  team: string
  projection: number
  vor: number
  vorScore: number
  scarcityAdjustment: number
  scarcityTier: ScarcityTier
  needAdjustment: number
  needLevel: NeedLevel
  rankScore: number
  reasoning: string
}

export type DraftRankingResult = {
  strategy: StrategyName
  draftPosition: DraftPosition
  rankings: DraftRankingEntry[]
  warnings: string[]
  dataQuality: DataQualitySummary
}

export type ResponseStatus = 'success' | 'partial' | 'error'

export type EngineResponse<T> = {
  status: ResponseStatus
  payload: T | null
  warnings: string[]
  dataQuality: DataQualitySummary | null
  error?: string
}
