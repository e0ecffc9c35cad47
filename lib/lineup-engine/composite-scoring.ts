import type { ByeWeekResolver } from './bye-weeks'
import { matchupAdvice, transformMatchup } from './matchup'
import { computePositionValue, STATIC_SCARCITY, type BaselineTable } from './position-value'
import {
  assessRecentForm,
  consistencyScore,
  floorCeiling,
  momentumScore,
  recentPoints,
} from './recent-form'
import { normalizeProjections, round2, scaleProjection, trendingScore } from './signal-normalizer'
import type {
  PlayerFlag,
  Position,
  RawPlayerSignals,
  ScoredPlayer,
  StrategyProfile,
  Tier,
  TierThresholds,
} from './types'

export const REST_RISK_MULTIPLIER = 0.85
export const DO_NOT_START = 'do not start'
export const COMPOSITE_CAP = 150
// Elite and stud players outrank any lesser player regardless of matchup.
export const TIER_SCORE_FLOORS: Readonly<Partial<Record<Tier, number>>> = { elite: 120, stud: 100 }
export const PERCENTILE_MIN_POOL = 10
const TIER_PERCENTILES: Readonly<TierThresholds> = { elite: 90, stud: 75, solid: 50, flex: 25 }

export type ScoringContext = {
  profile: StrategyProfile
  week: number
  byeResolver: ByeWeekResolver
  baselines: BaselineTable
  scarcity?: Readonly<Record<Position, number>>
  restRiskWeeks: readonly number[]
  // Percentile cut-offs for positions with a deep enough pool this week.
  poolThresholds?: Readonly<Partial<Record<Position, TierThresholds>>>
}

const MISSING_SIGNAL_FLAGS: ReadonlySet<PlayerFlag> = new Set<PlayerFlag>(['low data confidence', 'matchup unknown'])

export function dataConfidencePenalty(player: Pick<ScoredPlayer, 'flags'>): number {
  return player.flags.filter((flag) => MISSING_SIGNAL_FLAGS.has(flag)).length
}

export function classifyTier(points: number, thresholds: Readonly<TierThresholds>): Tier {
  if (points >= thresholds.elite) return 'elite'
  if (points >= thresholds.stud) return 'stud'
  if (points >= thresholds.solid) return 'solid'
  if (points >= thresholds.flex) return 'flex'
  return 'bench'
}

/** Linear-interpolated percentile of an ascending list. */
function percentile(sorted: readonly number[], p: number): number {
  if (!sorted.length) return 0
  const rank = ((sorted.length - 1) * p) / 100
  const lo = Math.floor(rank)
  const hi = Math.ceil(rank)
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo)
}

/**
 * Tier cut-offs from this week's projections, for positions with at least
 * PERCENTILE_MIN_POOL known projections. Other positions keep fixed thresholds.
 */
export function poolTierThresholds(
  pool: readonly RawPlayerSignals[]
): Partial<Record<Position, TierThresholds>> {
  const byPosition = new Map<Position, number[]>()
  for (const raw of pool) {
    const avg = normalizeProjections(raw.projections).average
    if (avg.kind !== 'known') continue
    const list = byPosition.get(raw.position) ?? []
    list.push(avg.value)
    byPosition.set(raw.position, list)
  }

  const thresholds: Partial<Record<Position, TierThresholds>> = {}
  for (const [position, values] of byPosition) {
    if (values.length < PERCENTILE_MIN_POOL) continue
    const sorted = [...values].sort((a, b) => a - b)
    thresholds[position] = {
      elite: percentile(sorted, TIER_PERCENTILES.elite),
      stud: percentile(sorted, TIER_PERCENTILES.stud),
      solid: percentile(sorted, TIER_PERCENTILES.solid),
      flex: percentile(sorted, TIER_PERCENTILES.flex),
    }
  }
  return thresholds
}

// Multiplier with diminishing returns, so a boosted tier cannot run away.
export function applyTierMultiplier(base: number, multiplier: number): number {
  return Math.min(COMPOSITE_CAP, base * multiplier * (1 - 0.3 * Math.exp(-base / 50)))
}

// Points added to the blend before the tier multiplier.
export function riskAdjustment(consistency: number, profile: StrategyProfile): number {
  switch (profile.riskDirection) {
    case 'floor':
      return (consistency - 50) * 0.02
    case 'ceiling':
      return (50 - consistency) * 0.02
    case 'neutral':
      return (consistency - 50) * 0.01
  }
}

export function blendSignals(
  signals: { projection: number; matchup: number; trending: number; momentum: number },
  profile: StrategyProfile
): number {
  const w = profile.weights
  return (
    w.projection * signals.projection +
    w.matchup * signals.matchup +
    w.trending * signals.trending +
    w.momentum * signals.momentum
  )
}

function buildReasoning(p: Omit<ScoredPlayer, 'reasoning'>, weekLabel: string): string {
  if (p.onBye) {
    return `${p.name} (${p.team}) is on bye in ${weekLabel} - ${DO_NOT_START}`
  }
  const projection =
    p.projection.kind === 'known'
      ? `${p.adjustedProjection.toFixed(1)} pts projected`
      : `no projection, replacement level ${p.adjustedProjection.toFixed(1)} assumed`
  const parts = [
    `${p.tier.toUpperCase()} ${p.position}`,
    projection,
    p.matchupLabel,
    `blend ${p.blendedScore.toFixed(1)}`,
    `composite ${p.compositeScore.toFixed(2)}`,
  ]
  if (p.flags.length) parts.push(`flags: ${p.flags.join(', ')}`)
  return parts.join(' | ')
}

/**
 * Scores one player for the active strategy. Pure: the same raw signals and
 * context always give the same result. The tier comes from projected points
 * against the position's thresholds; the composite is the 0-100 blend scaled
 * by that tier.
 */
export function scorePlayer(raw: RawPlayerSignals, index: number, ctx: ScoringContext): ScoredPlayer {
  const { profile, baselines } = ctx
  const scarcity = ctx.scarcity ?? STATIC_SCARCITY
  const normalized = normalizeProjections(raw.projections)
  const baseline = baselines[raw.position]
  const known = normalized.average.kind === 'known' ? normalized.average.value : null

  const matchup = transformMatchup(raw.matchupDifficulty, raw.opponent)
  const points = recentPoints(raw.recentPerformance)
  const form = assessRecentForm(known, points)
  const effectiveProjection = known ?? baseline
  const adjustedProjection = known === null ? baseline : form.adjustedProjection

  const trending = trendingScore(raw.trendingDelta)
  const momentum = momentumScore(points)
  const consistency = consistencyScore(points)
  const range = floorCeiling(adjustedProjection, matchup.score, points)
  const positionValue = computePositionValue(adjustedProjection, raw.position, baselines, scarcity)
  const normalizedProjection = scaleProjection(adjustedProjection, raw.position)

  const byeWeek = ctx.byeResolver.resolve(raw.team, raw.reportedByeWeek)
  const onBye = ctx.byeResolver.isOnBye(raw.team, ctx.week, raw.reportedByeWeek)

  const flags: PlayerFlag[] = []
  if (onBye) flags.push('on bye')
  if (known === null) flags.push('low data confidence')
  if (!matchup.known) flags.push('matchup unknown')
  flags.push(...form.flags)

  const base = {
    index,
    name: raw.name,
    position: raw.position,
    team: raw.team,
    opponent: raw.opponent,
    providerProjections: normalized.perProvider,
    projection: normalized.average,
    effectiveProjection,
    adjustedProjection,
    normalizedProjection,
    matchupScore: matchup.score,
    matchupLabel: matchup.label,
    trendingDelta: raw.trendingDelta,
    trendingScore: trending,
    momentumScore: momentum,
    consistencyScore: consistency,
    floor: range.floor,
    ceiling: range.ceiling,
    positionValue,
    byeWeek,
    onBye,
  }
  const weekLabel = `week ${ctx.week}`

  if (onBye) {
    const scored = {
      ...base,
      blendedScore: 0,
      tier: 'bench' as const,
      compositeScore: 0,
      flags,
      recommendation: DO_NOT_START,
    }
    return { ...scored, reasoning: buildReasoning(scored, weekLabel) }
  }

  const blended = blendSignals(
    { projection: normalizedProjection, matchup: matchup.score, trending, momentum },
    profile
  )
  const adjusted = Math.max(0, blended + riskAdjustment(consistency, profile))
  // replacement level carries no tier signal either way
  const thresholds = ctx.poolThresholds?.[raw.position] ?? profile.tierThresholds[raw.position]
  const tier: Tier = known === null ? 'flex' : classifyTier(adjustedProjection, thresholds)
  let composite = Math.max(
    applyTierMultiplier(adjusted, profile.tierMultipliers[tier]),
    TIER_SCORE_FLOORS[tier] ?? 0
  )

  if (raw.teamClinched && ctx.restRiskWeeks.includes(ctx.week)) {
    composite *= REST_RISK_MULTIPLIER
    flags.push('possible rest risk')
  }

  const scored = {
    ...base,
    blendedScore: round2(adjusted),
    tier,
    compositeScore: round2(composite),
    flags,
    recommendation: matchupAdvice(matchup.score, raw.position),
  }
  return { ...scored, reasoning: buildReasoning(scored, weekLabel) }
}

export function scorePlayers(pool: readonly RawPlayerSignals[], ctx: ScoringContext): ScoredPlayer[] {
  const scoped =
    ctx.profile.tierMode === 'percentile' && !ctx.poolThresholds
      ? { ...ctx, poolThresholds: poolTierThresholds(pool) }
      : ctx
  return pool.map((raw, index) => scorePlayer(raw, index, scoped))
}
