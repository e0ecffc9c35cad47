import { z } from 'zod'
import { InvalidConfigurationError } from './errors'
import { clamp } from './signal-normalizer'
import { POSITIONS, type Position, type PositionValue } from './types'

export type BaselineTable = Readonly<Record<Position, number>>

// Weekly points of a replacement-level starter, by league size.
const REPLACEMENT_BASELINES: Record<number, Record<Position, number>> = {
  10: { QB: 17, RB: 11, WR: 12, TE: 8.5, K: 7.5, DEF: 6.5 },
  12: { QB: 16, RB: 10, WR: 11, TE: 8, K: 7, DEF: 6 },
  14: { QB: 15, RB: 9, WR: 10, TE: 7.5, K: 6.5, DEF: 5.5 },
  16: { QB: 14, RB: 8, WR: 9, TE: 7, K: 6, DEF: 5 },
}

// Thinner pools get the higher multiplier.
export const STATIC_SCARCITY: Readonly<Record<Position, number>> = Object.freeze({
  QB: 1.0,
  RB: 1.0,
  WR: 0.95,
  TE: 1.05,
  K: 1.0,
  DEF: 1.0,
})

export const FLEX_VOR_WEIGHT = 0.3
export const FLEX_PROJECTION_WEIGHT = 0.7
const FLEX_TIE_MARGIN = 0.3

const baselineSchema = z
  .object({
    QB: z.number().finite().nonnegative(),
    RB: z.number().finite().nonnegative(),
    WR: z.number().finite().nonnegative(),
    TE: z.number().finite().nonnegative(),
    K: z.number().finite().nonnegative(),
    DEF: z.number().finite().nonnegative(),
  })
  .strict()

export function createBaselineTable(input: unknown): BaselineTable {
  const parsed = baselineSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      'Malformed baseline table',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'table'}: ${issue.message}`)
    )
  }
  return Object.freeze({ ...parsed.data })
}

const BASELINES_BY_SIZE: ReadonlyMap<number, BaselineTable> = new Map(
  Object.entries(REPLACEMENT_BASELINES).map(([size, table]) => [Number(size), createBaselineTable(table)])
)

export const DEFAULT_BASELINES: BaselineTable = baselinesForLeagueSize(12)

/** Nearest tabulated league size; ties go to the smaller league. */
export function baselinesForLeagueSize(leagueSize: number): BaselineTable {
  let best = 12
  let bestDistance = Infinity
  for (const size of BASELINES_BY_SIZE.keys()) {
    const distance = Math.abs(size - leagueSize)
    if (distance < bestDistance) {
      best = size
      bestDistance = distance
    }
  }
  const table = BASELINES_BY_SIZE.get(best)
  if (!table) throw new InvalidConfigurationError(`No baseline table for league size ${leagueSize}`)
  return table
}

export function flexValue(projection: number, baseline: number, scarcity: number): number {
  const vor = projection - baseline
  return vor * scarcity * FLEX_VOR_WEIGHT + projection * FLEX_PROJECTION_WEIGHT
}

export function computePositionValue(
  projection: number,
  position: Position,
  baselines: BaselineTable = DEFAULT_BASELINES,
  scarcity: Readonly<Record<Position, number>> = STATIC_SCARCITY
): PositionValue {
  const baseline = baselines[position]
  const factor = scarcity[position]
  return {
    baseline,
    vor: projection - baseline,
    scarcity: factor,
    flexValue: flexValue(projection, baseline, factor),
  }
}

/**
 * Scarcity from the current pool: how far the top players at a position sit
 * above replacement, relative to the average drop-off across positions.
 * Positions with no players keep their static factor.
 */
export function derivePoolScarcity(
  pool: ReadonlyArray<{ position: Position; projection: number }>,
  baselines: BaselineTable = DEFAULT_BASELINES,
  topN = 5
): Record<Position, number> {
  const dropOffs = new Map<Position, number>()

  for (const position of POSITIONS) {
    const top = pool
      .filter((p) => p.position === position)
      .map((p) => p.projection)
      .sort((a, b) => b - a)
      .slice(0, topN)
    if (!top.length) continue
    const mean = top.reduce((acc, v) => acc + v, 0) / top.length
    dropOffs.set(position, Math.max(0, mean - baselines[position]))
  }

  const values = [...dropOffs.values()]
  const leagueMean = values.length ? values.reduce((acc, v) => acc + v, 0) / values.length : 0

  const result = { ...STATIC_SCARCITY }
  if (leagueMean <= 0) return result
  for (const [position, dropOff] of dropOffs) {
    result[position] = clamp(dropOff / leagueMean, 0.8, 1.3)
  }
  return result
}

// Any scored player qualifies.
export type FlexCandidate = {
  name: string
  position: Position
  adjustedProjection: number
  positionValue: PositionValue
}

/**
 * Returns -1 when `a` is the better flex play, 1 when `b` is. Flex values
 * within 0.3 points fall back to raw projection.
 */
export function compareForFlex(a: FlexCandidate, b: FlexCandidate): -1 | 1 {
  const va = a.positionValue.flexValue
  const vb = b.positionValue.flexValue
  if (Math.abs(va - vb) < FLEX_TIE_MARGIN) return a.adjustedProjection >= b.adjustedProjection ? -1 : 1
  return va > vb ? -1 : 1
}

export function explainFlexComparison(a: FlexCandidate, b: FlexCandidate): string {
  const aWins = compareForFlex(a, b) === -1
  const winner = aWins ? a : b
  const loser = aWins ? b : a
  const wv = winner.positionValue
  const lv = loser.positionValue

  if (Math.abs(wv.flexValue - lv.flexValue) < FLEX_TIE_MARGIN) {
    return `${winner.name} (${winner.position}) edges ${loser.name} (${loser.position}) on raw projection, ${winner.adjustedProjection.toFixed(1)} vs ${loser.adjustedProjection.toFixed(1)}`
  }
  return `${winner.name} (${winner.position}) is ${wv.vor.toFixed(1)} pts over replacement vs ${lv.vor.toFixed(1)} for ${loser.name} (${loser.position}); flex value ${wv.flexValue.toFixed(2)} vs ${lv.flexValue.toFixed(2)}`
}
