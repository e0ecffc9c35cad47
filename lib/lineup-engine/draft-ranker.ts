import type { ByeWeekResolver } from './bye-weeks'
import { DEFAULT_BASELINES, type BaselineTable } from './position-value'
import { normalizeProjections, round2 } from './signal-normalizer'
import type {
  DraftPosition,
  DraftRankingEntry,
  DraftRosterPlayer,
  NeedLevel,
  Position,
  RawPlayerSignals,
  ScarcityTier,
  StrategyProfile,
} from './types'

export type RosterRequirement = {
  starters: number
  optimal: number
  maximum: number
}

export const STANDARD_ROSTER_REQUIREMENTS: Readonly<Record<Position, RosterRequirement>> = {
  QB: { starters: 1, optimal: 2, maximum: 3 },
  RB: { starters: 2, optimal: 5, maximum: 7 },
  WR: { starters: 2, optimal: 5, maximum: 7 },
  TE: { starters: 1, optimal: 2, maximum: 3 },
  K: { starters: 1, optimal: 1, maximum: 2 },
  DEF: { starters: 1, optimal: 1, maximum: 2 },
}

export const NEED_SCORES: Readonly<Record<NeedLevel, number>> = {
  critical: 100,
  high: 75,
  medium: 50,
  low: 25,
  saturated: 0,
}

const VOR_SCALE = 10
const BYE_STACK_THRESHOLD = 2

export type DraftState = {
  available: readonly RawPlayerSignals[]
  roster: readonly DraftRosterPlayer[]
  overallPick: number
  leagueSize: number
  profile: StrategyProfile
  baselines?: BaselineTable
  byeResolver?: ByeWeekResolver
  limit?: number
}

export function computeDraftPosition(overallPick: number, leagueSize: number): DraftPosition {
  const pick = Math.max(1, Math.floor(overallPick))
  const teams = Math.max(1, Math.floor(leagueSize))
  const round = Math.ceil(pick / teams)
  const pickInRound = ((pick - 1) % teams) + 1
  // in a snake draft the gap to the next pick is the same in odd and even rounds
  const picksUntilNext = 2 * (teams - pickInRound) + 1
  const phase = round <= 3 ? 'early' : round <= 8 ? 'middle' : 'late'
  return { overallPick: pick, round, pickInRound, picksUntilNext, phase }
}

export function needLevel(count: number, req: RosterRequirement): NeedLevel {
  if (count === 0 && req.starters > 0) return 'critical'
  if (count < req.starters) return 'high'
  if (count < req.optimal) return 'medium'
  if (count < req.maximum) return 'low'
  return 'saturated'
}

export function analyzeRosterNeeds(roster: readonly DraftRosterPlayer[]): Record<Position, NeedLevel> {
  const counts: Record<Position, number> = { QB: 0, RB: 0, WR: 0, TE: 0, K: 0, DEF: 0 }
  for (const p of roster) counts[p.position]++
  return {
    QB: needLevel(counts.QB, STANDARD_ROSTER_REQUIREMENTS.QB),
    RB: needLevel(counts.RB, STANDARD_ROSTER_REQUIREMENTS.RB),
    WR: needLevel(counts.WR, STANDARD_ROSTER_REQUIREMENTS.WR),
    TE: needLevel(counts.TE, STANDARD_ROSTER_REQUIREMENTS.TE),
    K: needLevel(counts.K, STANDARD_ROSTER_REQUIREMENTS.K),
    DEF: needLevel(counts.DEF, STANDARD_ROSTER_REQUIREMENTS.DEF),
  }
}

export function roundMultiplier(round: number): number {
  return 1 + (round - 1) * 0.1
}

function scarcityTier(remaining: number, target: number): ScarcityTier {
  const ratio = target > 0 ? remaining / target : 1
  if (ratio <= 0.25) return 'desert'
  if (ratio <= 0.5) return 'scarce'
  if (ratio <= 0.9) return 'balanced'
  return 'abundant'
}

function compareIdentity(a: DraftRankingEntry, b: DraftRankingEntry): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1
  if (a.team !== b.team) return a.team < b.team ? -1 : 1
  if (a.position !== b.position) return a.position < b.position ? -1 : 1
  return 0
}

/**
 * Ranks the available pool by value over replacement, scarcity of
 * above-replacement players left at the position (the candidate excluded), and
 * the drafter's need at the position.
 */
export function rankDraftCandidates(state: DraftState): DraftRankingEntry[] {
  const baselines = state.baselines ?? DEFAULT_BASELINES
  const weights = state.profile.draftWeights
  const draftPosition = computeDraftPosition(state.overallPick, state.leagueSize)
  const multiplier = roundMultiplier(draftPosition.round)
  const needs = analyzeRosterNeeds(state.roster)

  const candidates = state.available.map((raw) => {
    const avg = normalizeProjections(raw.projections).average
    const projection = avg.kind === 'known' ? avg.value : baselines[raw.position]
    return { raw, projection, known: avg.kind === 'known', vor: projection - baselines[raw.position] }
  })

  const aboveReplacement: Record<Position, number> = { QB: 0, RB: 0, WR: 0, TE: 0, K: 0, DEF: 0 }
  for (const c of candidates) {
    if (c.vor > 0) aboveReplacement[c.raw.position]++
  }

  const rosterByes = new Map<number, number>()
  if (state.byeResolver) {
    for (const p of state.roster) {
      const bye = state.byeResolver.resolve(p.team)
      if (bye !== null) rosterByes.set(bye, (rosterByes.get(bye) ?? 0) + 1)
    }
  }

  const entries = candidates.map((c): DraftRankingEntry => {
    const position = c.raw.position
    const target = state.leagueSize * STANDARD_ROSTER_REQUIREMENTS[position].starters
    const others = aboveReplacement[position] - (c.vor > 0 ? 1 : 0)
    const remaining = Math.min(others, target)
    const scarcity = target > 0 ? Math.min(100, 100 * (1 - remaining / target) * multiplier) : 0
    const level = needs[position]
    const need = NEED_SCORES[level]
    const vorScore = c.vor * VOR_SCALE
    const rankScore = weights.vor * vorScore + weights.scarcity * scarcity + weights.need * need
    const tier = scarcityTier(others, target)

    const notes = [
      c.known ? `VOR ${c.vor >= 0 ? '+' : ''}${c.vor.toFixed(1)}` : 'no projection, replacement level assumed',
      `${others} above-replacement ${position} left (${tier})`,
      `${level} need`,
    ]
    if (state.byeResolver) {
      const bye = state.byeResolver.resolve(c.raw.team, c.raw.reportedByeWeek)
      const stacked = bye !== null ? rosterByes.get(bye) ?? 0 : 0
      if (bye !== null && stacked >= BYE_STACK_THRESHOLD) {
        notes.push(`shares week ${bye} bye with ${stacked} rostered players`)
      }
    }

    return {
      rank: 0,
      name: c.raw.name,
      position,
      team: c.raw.team,
      projection: round2(c.projection),
      vor: round2(c.vor),
      vorScore: round2(vorScore),
      scarcityAdjustment: round2(scarcity),
      scarcityTier: tier,
      needAdjustment: need,
      needLevel: level,
      rankScore: round2(rankScore),
      reasoning: `${c.raw.name} (${position}): ${notes.join('; ')}`,
    }
  })

  const limit = state.limit ?? entries.length
  return entries
    .sort((a, b) => b.rankScore - a.rankScore || compareIdentity(a, b))
    .slice(0, Math.max(0, limit))
    .map((entry, i) => ({ ...entry, rank: i + 1 }))
}
