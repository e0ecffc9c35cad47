import { engineConfig, type EngineConfig } from '@/lib/config'
import { getDefaultByeResolver, type ByeWeekResolver } from './bye-weeks'
import { scorePlayers, type ScoringContext } from './composite-scoring'
import { summarizeDataQuality } from './data-quality'
import { rankDraftCandidates, computeDraftPosition } from './draft-ranker'
import { assignLineup, buildSlots } from './lineup-assigner'
import { baselinesForLeagueSize, derivePoolScarcity, STATIC_SCARCITY } from './position-value'
import { currentNflWeek, describeWeek } from './schedule'
import { normalizeProjections } from './signal-normalizer'
import { parseSnapshot, type ParsedSnapshot } from './snapshot'
import { getStrategyProfile, withTierMode } from './strategy-profiles'
import type { DraftRankingResult, EngineResponse, LineupResult } from './types'

export type EngineDeps = {
  byeResolver?: ByeWeekResolver
  config?: EngineConfig
  now?: () => Date
}

function errorResponse<T>(message: string, warnings: string[] = []): EngineResponse<T> {
  return { status: 'error', payload: null, warnings, dataQuality: null, error: message }
}

// The caller always gets a structured response, never a thrown error.
function guard<T>(label: string, handler: () => EngineResponse<T>): EngineResponse<T> {
  try {
    return handler()
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e)
    console.error(`[lineup-engine] ${label} failed:`, message)
    return errorResponse<T>(message)
  }
}

function resolveContext(snapshot: ParsedSnapshot, deps: EngineDeps) {
  const config = deps.config ?? engineConfig
  const byeResolver = deps.byeResolver ?? getDefaultByeResolver()
  const season = snapshot.season ?? config.season
  const week = snapshot.week ?? currentNflWeek((deps.now ?? (() => new Date()))(), season)
  const leagueSize = snapshot.leagueSize ?? config.leagueSize
  const warnings = [...snapshot.warnings]
  if (byeResolver.season !== season) {
    warnings.push(`Bye-week table covers ${byeResolver.season}; request is for ${season}`)
  }
  return { config, byeResolver, season, week, leagueSize, warnings }
}

export function runLineupRequest(input: unknown, deps: EngineDeps = {}): EngineResponse<LineupResult> {
  return guard('lineup request', () => {
    const snapshot = parseSnapshot(input)
    const profile = withTierMode(getStrategyProfile(snapshot.strategy), snapshot.tierMode)
    const { config, byeResolver, season, week, leagueSize, warnings } = resolveContext(snapshot, deps)
    const baselines = baselinesForLeagueSize(leagueSize)

    const scarcity =
      snapshot.scarcityMode === 'pool'
        ? derivePoolScarcity(
            snapshot.players.flatMap((p) => {
              const avg = normalizeProjections(p.projections).average
              return avg.kind === 'known' ? [{ position: p.position, projection: avg.value }] : []
            }),
            baselines
          )
        : STATIC_SCARCITY

    const ctx: ScoringContext = {
      profile,
      week,
      byeResolver,
      baselines,
      scarcity,
      restRiskWeeks: config.restRiskWeeks,
    }
    const scored = scorePlayers(snapshot.players, ctx)
    const assignment = assignLineup(scored, snapshot.slots ?? buildSlots(), profile)
    const dataQuality = summarizeDataQuality(snapshot.players)

    if (!snapshot.players.length) warnings.push('No players in snapshot')
    warnings.push(...assignment.warnings)

    const result: LineupResult = {
      strategy: profile.name,
      week,
      starters: assignment.starters,
      bench: assignment.bench,
      totalCompositeValue: assignment.totalCompositeValue,
      recommendations: assignment.recommendations,
      warnings,
      dataQuality,
    }

    const complete =
      snapshot.players.length > 0 &&
      dataQuality.projectionCoverage === 1 &&
      assignment.starters.every((s) => s.player !== null) &&
      !snapshot.warnings.length
    const status = complete ? 'success' : 'partial'

    console.log(
      `[lineup-engine] Lineup ${profile.name} ${describeWeek(week, season)}: ${scored.length} players, total ${result.totalCompositeValue}, status ${status}`
    )
    if (status === 'partial') {
      console.warn(`[lineup-engine] Degraded lineup with ${warnings.length} warnings`)
    }

    return { status, payload: result, warnings, dataQuality }
  })
}

export function runDraftRequest(input: unknown, deps: EngineDeps = {}): EngineResponse<DraftRankingResult> {
  return guard('draft request', () => {
    const snapshot = parseSnapshot(input)
    const profile = getStrategyProfile(snapshot.strategy)
    const { byeResolver, leagueSize, warnings } = resolveContext(snapshot, deps)

    const rankings = rankDraftCandidates({
      available: snapshot.players,
      roster: snapshot.roster,
      overallPick: snapshot.overallPick,
      leagueSize,
      profile,
      baselines: baselinesForLeagueSize(leagueSize),
      byeResolver,
      limit: snapshot.limit ?? undefined,
    })
    const dataQuality = summarizeDataQuality(snapshot.players)
    const missing = dataQuality.totalPlayers - dataQuality.withProjection
    if (missing > 0) warnings.push(`${missing} available players have no projection; replacement level assumed`)
    if (!snapshot.players.length) warnings.push('No available players in snapshot')

    const result: DraftRankingResult = {
      strategy: profile.name,
      draftPosition: computeDraftPosition(snapshot.overallPick, leagueSize),
      rankings,
      warnings,
      dataQuality,
    }
    const status = snapshot.players.length > 0 && missing === 0 && !snapshot.warnings.length ? 'success' : 'partial'

    console.log(
      `[lineup-engine] Draft ${profile.name} pick ${snapshot.overallPick}: ranked ${rankings.length} of ${snapshot.players.length}, status ${status}`
    )
    return { status, payload: result, warnings, dataQuality }
  })
}

export function runRequest(
  input: unknown,
  deps: EngineDeps = {}
): EngineResponse<LineupResult> | EngineResponse<DraftRankingResult> {
  const mode =
    input !== null && typeof input === 'object' && 'mode' in input && input.mode === 'draft' ? 'draft' : 'lineup'
  return mode === 'draft' ? runDraftRequest(input, deps) : runLineupRequest(input, deps)
}
