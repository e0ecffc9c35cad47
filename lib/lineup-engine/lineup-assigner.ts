import { dataConfidencePenalty } from './composite-scoring'
import { compareForFlex, explainFlexComparison } from './position-value'
import { round2 } from './signal-normalizer'
import type {
  Position,
  RiskDirection,
  RosterSlot,
  ScoredPlayer,
  SlotAssignment,
  StrategyProfile,
} from './types'

export const SCORE_EPSILON = 1e-9
const TRENDING_ALERT = 10000

export type LineupTemplate = {
  startingQB: number
  startingRB: number
  startingWR: number
  startingTE: number
  startingFlex: number
  startingSuperflex: number
  startingK: number
  startingDEF: number
}

export const DEFAULT_LINEUP_TEMPLATE: LineupTemplate = {
  startingQB: 1,
  startingRB: 2,
  startingWR: 2,
  startingTE: 1,
  startingFlex: 1,
  startingSuperflex: 0,
  startingK: 1,
  startingDEF: 1,
}

export const FLEX_ELIGIBLE: readonly Position[] = ['RB', 'WR', 'TE']
export const SUPERFLEX_ELIGIBLE: readonly Position[] = ['QB', 'RB', 'WR', 'TE']
export const BENCH_SLOT = 'BENCH'

export function buildSlots(template: Partial<LineupTemplate> = {}): RosterSlot[] {
  const t = { ...DEFAULT_LINEUP_TEMPLATE, ...template }
  const slots: RosterSlot[] = []

  function add(name: string, accepts: readonly Position[], count: number) {
    for (let i = 1; i <= count; i++) {
      slots.push({ name: count > 1 ? `${name}${i}` : name, accepts })
    }
  }

  add('QB', ['QB'], t.startingQB)
  add('RB', ['RB'], t.startingRB)
  add('WR', ['WR'], t.startingWR)
  add('TE', ['TE'], t.startingTE)
  add('FLEX', FLEX_ELIGIBLE, t.startingFlex)
  add('SUPERFLEX', SUPERFLEX_ELIGIBLE, t.startingSuperflex)
  add('K', ['K'], t.startingK)
  add('DEF', ['DEF'], t.startingDEF)
  return slots
}

export type LineupAssignment = {
  starters: SlotAssignment[]
  bench: ScoredPlayer[]
  totalCompositeValue: number
  recommendations: string[]
  warnings: string[]
}

function riskMetric(player: ScoredPlayer, direction: RiskDirection): number {
  if (direction === 'floor') return player.floor
  if (direction === 'ceiling') return player.ceiling
  return player.consistencyScore
}

function primaryScore(player: ScoredPlayer, slot: RosterSlot): number {
  return slot.accepts.length > 1 ? player.positionValue.flexValue : player.compositeScore
}

/**
 * Orders candidates for a slot. Scores within epsilon fall through to the
 * data-confidence penalty, the strategy's risk metric, then input order.
 */
export function compareForSlot(slot: RosterSlot, direction: RiskDirection) {
  return (a: ScoredPlayer, b: ScoredPlayer): number => {
    const pa = primaryScore(a, slot)
    const pb = primaryScore(b, slot)
    if (Math.abs(pa - pb) > SCORE_EPSILON) return pb - pa
    if (slot.accepts.length > 1 && Math.abs(a.compositeScore - b.compositeScore) > SCORE_EPSILON) {
      return b.compositeScore - a.compositeScore
    }
    const penalty = dataConfidencePenalty(a) - dataConfidencePenalty(b)
    if (penalty !== 0) return penalty
    const ra = riskMetric(a, direction)
    const rb = riskMetric(b, direction)
    if (Math.abs(ra - rb) > SCORE_EPSILON) return rb - ra
    return a.index - b.index
  }
}

function isBenchSlot(slot: RosterSlot): boolean {
  return slot.name.toUpperCase() === BENCH_SLOT
}

function eligible(player: ScoredPlayer, slot: RosterSlot): boolean {
  return !player.onBye && slot.accepts.includes(player.position)
}

/**
 * Fills the least flexible slots first so a flexible slot cannot consume the
 * only player a single-position slot could use. A slot that would go empty
 * reshuffles earlier holders along any chain that frees an eligible player.
 */
export function assignLineup(
  players: readonly ScoredPlayer[],
  slots: readonly RosterSlot[],
  profile: StrategyProfile
): LineupAssignment {
  const required = slots.filter((slot) => !isBenchSlot(slot))
  const fillOrder = required
    .map((slot, position) => ({ slot, position }))
    .sort((a, b) => a.slot.accepts.length - b.slot.accepts.length || a.position - b.position)

  const assigned = new Map<number, ScoredPlayer | null>()
  const used = new Set<number>()
  const warnings: string[] = []

  function bestCandidate(slot: RosterSlot): ScoredPlayer | null {
    const candidates = players.filter((p) => !used.has(p.index) && eligible(p, slot))
    if (!candidates.length) return null
    return [...candidates].sort(compareForSlot(slot, profile.riskDirection))[0] ?? null
  }

  // Augmenting path: an empty slot takes the holder of an earlier slot, which in
  // turn looks for a free player or another holder to displace. Each slot is
  // visited at most once per search.
  function fill(position: number, visited: Set<number>): boolean {
    const slot = required[position]
    const pick = bestCandidate(slot)
    if (pick) {
      used.add(pick.index)
      assigned.set(position, pick)
      return true
    }
    for (const earlier of fillOrder) {
      if (visited.has(earlier.position)) continue
      const holder = assigned.get(earlier.position)
      if (!holder || !eligible(holder, slot)) continue
      visited.add(earlier.position)
      assigned.set(position, holder)
      assigned.set(earlier.position, null)
      if (fill(earlier.position, visited)) return true
      assigned.set(earlier.position, holder)
      assigned.delete(position)
    }
    return false
  }

  for (const { slot, position } of fillOrder) {
    if (fill(position, new Set([position]))) continue
    assigned.set(position, null)
    warnings.push(`No eligible player available for ${slot.name} slot (accepts ${slot.accepts.join('/')})`)
  }

  const starters: SlotAssignment[] = required.map((slot, position) => ({
    slot: slot.name,
    accepts: slot.accepts,
    player: assigned.get(position) ?? null,
  }))

  const bench = players
    .filter((p) => !used.has(p.index))
    .sort((a, b) => b.compositeScore - a.compositeScore || a.index - b.index)

  for (const p of players) {
    if (p.flags.includes('low data confidence')) {
      warnings.push(`${p.name}: no provider projection, replacement level assumed`)
    }
    if (p.flags.includes('matchup unknown')) {
      warnings.push(`${p.name}: matchup data unavailable, neutral score used`)
    }
  }

  const totalCompositeValue = round2(
    starters.reduce((acc, s) => acc + (s.player ? s.player.compositeScore : 0), 0)
  )

  return {
    starters,
    bench,
    totalCompositeValue,
    recommendations: buildRecommendations(starters, bench, players),
    warnings,
  }
}

function isTopTier(player: ScoredPlayer): boolean {
  return player.tier === 'elite' || player.tier === 'stud'
}

function versus(player: ScoredPlayer): string {
  return player.opponent ? ` vs ${player.opponent}` : ''
}

export function buildRecommendations(
  starters: readonly SlotAssignment[],
  bench: readonly ScoredPlayer[],
  all: readonly ScoredPlayer[]
): string[] {
  const recommendations: string[] = []
  const starting = starters.flatMap((s) => (s.player ? [s.player] : []))
  const startingIndexes = new Set(starting.map((p) => p.index))

  for (const p of bench) {
    if (p.onBye) {
      recommendations.push(`${p.name} is on bye (week ${p.byeWeek ?? '?'}) - do not start`)
    } else if (isTopTier(p)) {
      recommendations.push(`${p.name} (${p.tier.toUpperCase()}) is on the bench - start regardless of matchup if a slot opens`)
    } else if (p.matchupScore >= 85 && p.compositeScore > 70) {
      recommendations.push(`${p.name} on bench has an elite matchup${versus(p)} - consider starting`)
    }
  }

  for (const p of starting) {
    if (isTopTier(p) && p.matchupScore <= 30) {
      recommendations.push(`${p.name} is ${p.tier.toUpperCase()} - starting despite tough matchup${versus(p)}`)
    } else if (!isTopTier(p) && p.matchupScore <= 20) {
      recommendations.push(
        `${p.name} faces a tough matchup${versus(p)} (score: ${Math.round(p.matchupScore)}/100) - consider alternatives`
      )
    }
    if (p.flags.includes('possible rest risk')) {
      recommendations.push(`${p.name} may rest with a clinched seed - have a backup ready`)
    }
  }

  // Say why each multi-position slot went to its holder over the best bench option.
  for (const s of starters) {
    const holder = s.player
    if (!holder || s.accepts.length < 2) continue
    const alternative = bench
      .filter((p) => !p.onBye && s.accepts.includes(p.position))
      .sort((a, b) => b.positionValue.flexValue - a.positionValue.flexValue || a.index - b.index)[0]
    if (alternative && compareForFlex(holder, alternative) === -1) {
      recommendations.push(`${s.slot}: ${explainFlexComparison(holder, alternative)}`)
    }
  }

  for (const p of all) {
    if (p.trendingDelta !== null && p.trendingDelta > TRENDING_ALERT && !startingIndexes.has(p.index)) {
      recommendations.push(
        `${p.name} is trending (${p.trendingDelta.toLocaleString('en-US')} adds) - monitor for breakout`
      )
    }
  }

  const best = [...starting].sort((a, b) => b.matchupScore - a.matchupScore || a.index - b.index)[0]
  if (best && best.matchupScore >= 80) {
    if (isTopTier(best)) {
      recommendations.push(`SMASH PLAY: ${best.name} (${best.tier})${versus(best)} - elite player and elite matchup`)
    } else {
      recommendations.push(
        `Great matchup: ${best.name}${versus(best)} (matchup score: ${Math.round(best.matchupScore)}/100)`
      )
    }
  }

  return recommendations
}
