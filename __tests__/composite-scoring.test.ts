import { describe, it, expect } from 'vitest'
import { ByeWeekResolver } from '@/lib/lineup-engine/bye-weeks'
import {
  COMPOSITE_CAP,
  DO_NOT_START,
  applyTierMultiplier,
  classifyTier,
  poolTierThresholds,
  dataConfidencePenalty,
  riskAdjustment,
  scorePlayer,
  scorePlayers,
  type ScoringContext,
} from '@/lib/lineup-engine/composite-scoring'
import { DEFAULT_BASELINES } from '@/lib/lineup-engine/position-value'
import { STRATEGY_PROFILES, withTierMode } from '@/lib/lineup-engine/strategy-profiles'
import type { RawPlayerSignals } from '@/lib/lineup-engine/types'

const byeResolver = ByeWeekResolver.fromJson({ season: 2025, byeWeeks: { KC: 10, BUF: 7, NYJ: 9 } })

function makeCtx(overrides: Partial<ScoringContext> = {}): ScoringContext {
  return {
    profile: STRATEGY_PROFILES.balanced,
    week: 8,
    byeResolver,
    baselines: DEFAULT_BASELINES,
    restRiskWeeks: [17, 18],
    ...overrides,
  }
}

function makeRaw(overrides: Partial<RawPlayerSignals> = {}): RawPlayerSignals {
  return {
    name: 'Test Runner',
    position: 'RB',
    team: 'NYJ',
    opponent: 'NYJ',
    projections: { yahoo: 15 },
    matchupDifficulty: 50,
    trendingDelta: null,
    recentPerformance: [],
    reportedByeWeek: null,
    teamClinched: false,
    ...overrides,
  }
}

describe('scorePlayer', () => {
  it('blends scaled signals, applies the tier multiplier and explains the result', () => {
    // blend 0.8*60 + 0.1*50 + 0.05*50 + 0.05*50 = 58; 15 pts is a stud RB
    // 58 * 2 * (1 - 0.3 * e^(-58/50)) = 105.09
    const player = scorePlayer(makeRaw(), 0, makeCtx())
    expect(player.normalizedProjection).toBeCloseTo(60, 10)
    expect(player.matchupScore).toBe(50)
    expect(player.blendedScore).toBeCloseTo(58, 10)
    expect(player.tier).toBe('stud')
    expect(player.compositeScore).toBe(105.09)
    expect(player.flags).toEqual([])
    expect(player.reasoning).toBe(
      'STUD RB | 15.0 pts projected | Neutral matchup vs NYJ | blend 58.0 | composite 105.09'
    )
  })

  it('keeps the position-relative value separate from the composite', () => {
    const player = scorePlayer(makeRaw(), 0, makeCtx())
    // (15 - 10) * 1.0 * 0.3 + 15 * 0.7
    expect(player.positionValue.flexValue).toBeCloseTo(12, 10)
    expect(player.positionValue.vor).toBe(5)
  })

  it('zeroes a player on bye and blocks starting', () => {
    const player = scorePlayer(makeRaw({ team: 'KC', projections: { yahoo: 25 } }), 0, makeCtx({ week: 10 }))
    expect(player.onBye).toBe(true)
    expect(player.compositeScore).toBe(0)
    expect(player.tier).toBe('bench')
    expect(player.flags).toContain('on bye')
    expect(player.recommendation).toBe(DO_NOT_START)
    expect(player.reasoning).toBe('Test Runner (KC) is on bye in week 10 - do not start')
  })

  it('ignores a reported bye for a team in the curated table', () => {
    const player = scorePlayer(makeRaw({ team: 'KC', reportedByeWeek: 8 }), 0, makeCtx({ week: 8 }))
    expect(player.onBye).toBe(false)
    expect(player.byeWeek).toBe(10)
  })

  it('falls back to replacement level and flags missing data instead of dropping the player', () => {
    const player = scorePlayer(
      makeRaw({ projections: {}, matchupDifficulty: null }),
      3,
      makeCtx()
    )
    expect(player.projection).toEqual({ kind: 'unknown' })
    expect(player.adjustedProjection).toBe(DEFAULT_BASELINES.RB)
    expect(player.matchupScore).toBe(50)
    expect(player.flags).toEqual(['low data confidence', 'matchup unknown'])
    expect(dataConfidencePenalty(player)).toBe(2)
    expect(player.tier).toBe('flex')
    expect(player.compositeScore).toBe(36.56)
  })

  it('does not promote a player projected for zero points', () => {
    const player = scorePlayer(
      makeRaw({
        projections: { a: 0 },
        recentPerformance: [
          { period: 5, points: 12 },
          { period: 6, points: 14 },
        ],
      }),
      0,
      makeCtx()
    )
    expect(player.flags).toEqual([])
    expect(player.adjustedProjection).toBe(0)
    expect(player.tier).toBe('bench')
  })

  it('keeps an elite player at the elite minimum despite a brutal matchup', () => {
    const player = scorePlayer(
      makeRaw({ position: 'TE', projections: { a: 12 }, matchupDifficulty: 100 }),
      0,
      makeCtx({ profile: STRATEGY_PROFILES.aggressive })
    )
    expect(player.tier).toBe('elite')
    expect(player.compositeScore).toBe(120)
  })

  it('moves the adjusted projection toward a breakout', () => {
    const player = scorePlayer(
      makeRaw({
        projections: { yahoo: 10 },
        recentPerformance: [
          { period: 5, points: 16 },
          { period: 6, points: 17 },
          { period: 7, points: 18 },
        ],
      }),
      0,
      makeCtx()
    )
    expect(player.flags).toContain('breakout candidate')
    expect(player.adjustedProjection).toBeCloseTo(14.9, 10)
    expect(player.effectiveProjection).toBe(10)
  })

  it('discounts clinched teams in rest weeks and says so', () => {
    const rested = scorePlayer(makeRaw({ teamClinched: true }), 0, makeCtx({ week: 17 }))
    expect(rested.flags).toContain('possible rest risk')
    expect(rested.compositeScore).toBe(89.33)

    const earlier = scorePlayer(makeRaw({ teamClinched: true }), 0, makeCtx({ week: 8 }))
    expect(earlier.flags).not.toContain('possible rest risk')
    expect(earlier.compositeScore).toBe(105.09)
  })

  it('is deterministic for identical input', () => {
    const pool = [makeRaw(), makeRaw({ name: 'Other', position: 'WR', projections: { a: 11, b: 13 } })]
    expect(scorePlayers(pool, makeCtx())).toEqual(scorePlayers(pool, makeCtx()))
  })
})

describe('classifyTier', () => {
  it('uses thresholds on the position scale', () => {
    const t = STRATEGY_PROFILES.balanced.tierThresholds
    expect(classifyTier(22, t.QB)).toBe('elite')
    expect(classifyTier(18, t.RB)).toBe('elite')
    expect(classifyTier(16, t.WR)).toBe('elite')
    expect(classifyTier(12, t.TE)).toBe('elite')
    expect(classifyTier(11.9, t.TE)).toBe('stud')
    expect(classifyTier(12, t.QB)).toBe('flex')
    expect(classifyTier(11.9, t.QB)).toBe('bench')
  })
})

describe('applyTierMultiplier', () => {
  it('caps boosted scores', () => {
    expect(applyTierMultiplier(100, 3)).toBe(COMPOSITE_CAP)
    expect(applyTierMultiplier(0, 3)).toBe(0)
  })
})

describe('percentile tiers', () => {
  const receivers = Array.from({ length: 10 }, (_, i) =>
    makeRaw({ name: `WR ${i + 1}`, position: 'WR', projections: { a: i + 1 } })
  )

  it('derives cut-offs from a deep enough position pool', () => {
    const thresholds = poolTierThresholds([...receivers, makeRaw({ position: 'QB', projections: { a: 20 } })])
    expect(thresholds.WR?.elite).toBeCloseTo(9.1, 10)
    expect(thresholds.WR?.stud).toBeCloseTo(7.75, 10)
    expect(thresholds.WR?.solid).toBeCloseTo(5.5, 10)
    expect(thresholds.WR?.flex).toBeCloseTo(3.25, 10)
    expect(thresholds.QB).toBeUndefined()
  })

  it('classifies against the pool when the profile asks for it', () => {
    const profile = withTierMode(STRATEGY_PROFILES.balanced, 'percentile')
    const tiers = scorePlayers(receivers, makeCtx({ profile })).map((p) => p.tier)
    expect(tiers).toEqual(['bench', 'bench', 'bench', 'flex', 'flex', 'solid', 'solid', 'stud', 'stud', 'elite'])

    const fixed = scorePlayers(receivers, makeCtx()).map((p) => p.tier)
    expect(fixed).toEqual(['bench', 'bench', 'bench', 'bench', 'bench', 'flex', 'flex', 'flex', 'solid', 'solid'])
  })
})

describe('riskAdjustment', () => {
  it('rewards consistency for floor strategies and volatility for ceiling strategies', () => {
    expect(riskAdjustment(100, STRATEGY_PROFILES.conservative)).toBeCloseTo(1, 10)
    expect(riskAdjustment(100, STRATEGY_PROFILES.aggressive)).toBeCloseTo(-1, 10)
    expect(riskAdjustment(0, STRATEGY_PROFILES.balanced)).toBeCloseTo(-0.5, 10)
  })
})
