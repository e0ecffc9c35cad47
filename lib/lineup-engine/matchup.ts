import type { Position } from './types'
import { clamp, isFiniteNumber, NEUTRAL_SCORE } from './signal-normalizer'

export const MATCHUP_STEEPNESS = 0.05
const LEAGUE_AVERAGE_DIFFICULTY = 50

export type MatchupResult = {
  score: number
  known: boolean
  label: string
}

/**
 * Maps a difficulty percentile (0 = softest defense, 100 = toughest) onto a
 * 0-100 favorability score with a logistic curve centered on league average.
 * Inputs outside 0-100 are clamped first.
 */
export function transformMatchup(difficulty: number | null, opponent: string | null = null): MatchupResult {
  if (!isFiniteNumber(difficulty)) {
    return { score: NEUTRAL_SCORE, known: false, label: 'Unknown matchup' }
  }
  const favorability = 100 - clamp(difficulty, 0, 100)
  const raw = 100 / (1 + Math.exp(-MATCHUP_STEEPNESS * (favorability - LEAGUE_AVERAGE_DIFFICULTY)))
  const score = clamp(raw, 0, 100)
  return { score, known: true, label: describeMatchup(score, opponent) }
}

// rank 1 allows the fewest points, so it is the hardest matchup
export function defenseRankToDifficulty(rank: number, teams = 32): number | null {
  if (!isFiniteNumber(rank) || teams < 2 || rank < 1 || rank > teams) return null
  return ((teams - rank) / (teams - 1)) * 100
}

export function describeMatchup(score: number, opponent: string | null): string {
  const vs = opponent ? ` vs ${opponent}` : ''
  if (score >= 90) return `SMASH SPOT${vs}`
  if (score >= 80) return `Elite matchup${vs}`
  if (score >= 70) return `Great matchup${vs}`
  if (score >= 60) return `Good matchup${vs}`
  if (score >= 50) return `Neutral matchup${vs}`
  if (score >= 40) return `Below average${vs}`
  if (score >= 30) return `Tough matchup${vs}`
  if (score >= 20) return `Bad matchup${vs}`
  if (score >= 10) return `Terrible matchup${vs}`
  return `AVOID - elite defense${vs}`
}

const SINGLE_STARTER: ReadonlySet<Position> = new Set<Position>(['QB', 'TE', 'K', 'DEF'])

export function matchupAdvice(score: number, position: Position): string {
  if (SINGLE_STARTER.has(position)) {
    if (score >= 70) return 'START - Great matchup'
    if (score >= 40) return 'START - Decent matchup'
    if (score >= 25) return 'RISKY - Monitor for better options'
    return 'SIT - Find alternative if possible'
  }
  if (score >= 80) return 'MUST START - Elite matchup'
  if (score >= 65) return 'START - Favorable matchup'
  if (score >= 50) return 'FLEX - Solid play'
  if (score >= 35) return 'BENCH - Only if desperate'
  return 'SIT - Avoid this matchup'
}
