export type {
  Position,
  StrategyName,
  Tier,
  RiskDirection,
  PlayerFlag,
  Signal,
  RecentPerformance,
  RawPlayerSignals,
  BlendWeights,
  DraftWeights,
  StrategyProfile,
  TierMode,
  TierThresholds,
  PositionValue,
  ScoredPlayer,
  RosterSlot,
  SlotAssignment,
  DataQualitySummary,
  LineupResult,
  NeedLevel,
  ScarcityTier,
  DraftRosterPlayer,
  DraftPosition,
  DraftRankingEntry,
  DraftRankingResult,
  ResponseStatus,
  EngineResponse,
} from './types'
export { POSITIONS, STRATEGY_NAMES, TIERS, TIER_MODES } from './types'

export { InvalidConfigurationError, UnknownStrategyError } from './errors'
export { STRATEGY_PROFILES, createStrategyProfile, getStrategyProfile, withTierMode } from './strategy-profiles'
export { normalizeProjections, scaleProjection, trendingScore } from './signal-normalizer'
export { transformMatchup, defenseRankToDifficulty, describeMatchup, matchupAdvice } from './matchup'
export {
  DEFAULT_BASELINES,
  STATIC_SCARCITY,
  baselinesForLeagueSize,
  createBaselineTable,
  computePositionValue,
  derivePoolScarcity,
  flexValue,
  compareForFlex,
  explainFlexComparison,
} from './position-value'
export type { BaselineTable, FlexCandidate } from './position-value'
export { ByeWeekResolver, getDefaultByeResolver, parseReportedByeWeek } from './bye-weeks'
export { assessRecentForm, momentumScore, consistencyScore, floorCeiling } from './recent-form'
export {
  scorePlayer,
  scorePlayers,
  classifyTier,
  poolTierThresholds,
  applyTierMultiplier,
  COMPOSITE_CAP,
  TIER_SCORE_FLOORS,
  PERCENTILE_MIN_POOL,
  DO_NOT_START,
} from './composite-scoring'
export type { ScoringContext } from './composite-scoring'
export { assignLineup, buildSlots, DEFAULT_LINEUP_TEMPLATE } from './lineup-assigner'
export type { LineupTemplate, LineupAssignment } from './lineup-assigner'
export {
  rankDraftCandidates,
  computeDraftPosition,
  analyzeRosterNeeds,
  STANDARD_ROSTER_REQUIREMENTS,
} from './draft-ranker'
export type { DraftState, RosterRequirement } from './draft-ranker'
export { parseSnapshot, parsePlayerRecord, SnapshotParseError } from './snapshot'
export type { ParsedSnapshot } from './snapshot'
export { summarizeDataQuality } from './data-quality'
export { currentNflWeek, seasonKickoff, describeWeek } from './schedule'
export { runLineupRequest, runDraftRequest, runRequest } from './service'
export type { EngineDeps } from './service'
