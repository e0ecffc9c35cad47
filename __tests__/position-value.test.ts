import { describe, it, expect } from 'vitest'
import {
  STATIC_SCARCITY,
  baselinesForLeagueSize,
  compareForFlex,
  computePositionValue,
  createBaselineTable,
  derivePoolScarcity,
  explainFlexComparison,
  flexValue,
} from '@/lib/lineup-engine/position-value'
import { InvalidConfigurationError } from '@/lib/lineup-engine/errors'
import type { Position } from '@/lib/lineup-engine/types'

function candidate(name: string, position: Position, projection: number) {
  return { name, position, adjustedProjection: projection, positionValue: computePositionValue(projection, position) }
}

describe('flexValue', () => {
  it('weights VOR x scarcity at 0.3 and raw projection at 0.7', () => {
    // (15 - 11) * 1.2 * 0.3 + 15 * 0.7 = 1.44 + 10.5
    expect(flexValue(15, 11, 1.2)).toBeCloseTo(11.94, 10)
  })

  it('matches computePositionValue with a 10-team baseline and custom scarcity', () => {
    const value = computePositionValue(15, 'RB', baselinesForLeagueSize(10), { ...STATIC_SCARCITY, RB: 1.2 })
    expect(value.baseline).toBe(11)
    expect(value.vor).toBe(4)
    expect(value.scarcity).toBe(1.2)
    expect(value.flexValue).toBeCloseTo(11.94, 10)
  })

  it('goes below the raw weighting for sub-replacement players', () => {
    const value = computePositionValue(6, 'TE')
    expect(value.vor).toBe(-2)
    expect(value.flexValue).toBeCloseTo(-2 * 1.05 * 0.3 + 6 * 0.7, 10)
  })
})

describe('baseline tables', () => {
  it('picks the nearest league size, preferring the smaller one on ties', () => {
    expect(baselinesForLeagueSize(12).RB).toBe(10)
    expect(baselinesForLeagueSize(11).RB).toBe(11)
    expect(baselinesForLeagueSize(20).RB).toBe(8)
    expect(baselinesForLeagueSize(8).QB).toBe(17)
  })

  it('rejects a table missing a position', () => {
    expect(() => createBaselineTable({ QB: 16, RB: 10, WR: 11, TE: 8, K: 7 })).toThrow(InvalidConfigurationError)
  })

  it('rejects negative baselines', () => {
    expect(() => createBaselineTable({ QB: 16, RB: -1, WR: 11, TE: 8, K: 7, DEF: 6 })).toThrow(
      InvalidConfigurationError
    )
  })
})

describe('derivePoolScarcity', () => {
  it('raises thin positions and lowers deep ones, within 0.8..1.3', () => {
    const scarcity = derivePoolScarcity([
      { position: 'RB', projection: 20 },
      { position: 'RB', projection: 18 },
      { position: 'WR', projection: 13 },
    ])
    // RB drop-off 9, WR drop-off 2, mean 5.5
    expect(scarcity.RB).toBe(1.3)
    expect(scarcity.WR).toBe(0.8)
    expect(scarcity.TE).toBe(STATIC_SCARCITY.TE)
  })

  it('keeps static factors when nobody is above replacement', () => {
    expect(derivePoolScarcity([{ position: 'RB', projection: 5 }])).toEqual({ ...STATIC_SCARCITY })
  })
})

describe('compareForFlex', () => {
  it('prefers the tight end when position value outweighs a small projection gap', () => {
    // RB 12 -> 9.0, TE 11.9 -> 9.5585
    const rb = candidate('Runner', 'RB', 12)
    const te = candidate('Tight', 'TE', 11.9)
    expect(compareForFlex(rb, te)).toBe(1)
    expect(explainFlexComparison(rb, te)).toBe(
      'Tight (TE) is 3.9 pts over replacement vs 2.0 for Runner (RB); flex value 9.56 vs 9.00'
    )
  })

  it('falls back to raw projection when flex values are within 0.3', () => {
    // RB 12 -> 9.0, WR 12.2 -> 8.882
    const rb = candidate('Runner', 'RB', 12)
    const wr = candidate('Wideout', 'WR', 12.2)
    expect(compareForFlex(rb, wr)).toBe(1)
    expect(explainFlexComparison(rb, wr)).toBe('Wideout (WR) edges Runner (RB) on raw projection, 12.2 vs 12.0')
  })
})
