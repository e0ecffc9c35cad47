import { z } from 'zod'
import { normalizePlayerName, normalizePosition, normalizeTeamAbbrev } from '@/lib/team-abbrev'
import { defenseRankToDifficulty } from './matchup'
import { isFiniteNumber } from './signal-normalizer'
import {
  TIER_MODES,
  type DraftRosterPlayer,
  type Position,
  type RawPlayerSignals,
  type RecentPerformance,
  type RosterSlot,
  type TierMode,
} from './types'

export type ParsedSnapshot = {
  mode: 'lineup' | 'draft'
  strategy: string
  tierMode: TierMode | null
  week: number | null
  season: number | null
  leagueSize: number | null
  slots: RosterSlot[] | null
  scarcityMode: 'static' | 'pool'
  players: RawPlayerSignals[]
  roster: DraftRosterPlayer[]
  overallPick: number
  limit: number | null
  warnings: string[]
}

export class SnapshotParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SnapshotParseError'
  }
}

const envelopeSchema = z.object({
  mode: z.enum(['lineup', 'draft']).default('lineup'),
  strategy: z.string().min(1).default('balanced'),
  tierMode: z.enum(TIER_MODES).optional(),
  week: z.number().int().min(1).max(18).optional(),
  season: z.number().int().optional(),
  leagueSize: z.number().int().min(2).max(32).optional(),
  slots: z.array(z.unknown()).optional(),
  scarcity: z.enum(['static', 'pool']).default('static'),
  players: z.array(z.unknown()),
  roster: z.array(z.unknown()).default([]),
  overallPick: z.number().int().min(1).default(1),
  limit: z.number().int().min(0).optional(),
  upstreamWarnings: z.array(z.string()).default([]),
})

const identitySchema = z.object({
  name: z.string().trim().min(1),
  position: z.string().min(1),
  team: z.string().min(1),
})

const slotSchema = z.object({
  name: z.string().trim().min(1),
  accepts: z.array(z.string()).min(1),
})

const recentSchema = z.object({
  period: z.number().int(),
  points: z.number().finite(),
})

// Accepts numbers and numeric strings; everything else is missing.
function toFiniteNumber(value: unknown): number | null {
  if (isFiniteNumber(value)) return value
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isFinite(n) ? n : null
  }
  return null
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return null
  const record: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(value)) record[k] = v
  return record
}

function parseProjections(value: unknown): Record<string, number> {
  const record = asRecord(value)
  const result: Record<string, number> = {}
  if (!record) return result
  for (const [provider, raw] of Object.entries(record)) {
    const n = toFiniteNumber(raw)
    if (n !== null) result[provider] = n
  }
  return result
}

function parseRecent(value: unknown): RecentPerformance[] {
  if (!Array.isArray(value)) return []
  return value.flatMap((item) => {
    const parsed = recentSchema.safeParse(item)
    return parsed.success ? [parsed.data] : []
  })
}

function parseDifficulty(record: Record<string, unknown>): number | null {
  const difficulty = toFiniteNumber(record.matchupDifficulty)
  if (difficulty !== null) return difficulty
  const rank = toFiniteNumber(record.defenseRank)
  return rank === null ? null : defenseRankToDifficulty(rank)
}

type Identity = { name: string; position: Position; team: string }

function parseIdentity(value: unknown): Identity | string {
  const parsed = identitySchema.safeParse(value)
  if (!parsed.success) return 'missing name, position or team'
  const position = normalizePosition(parsed.data.position)
  if (!position) return `unsupported position "${parsed.data.position}"`
  const team = normalizeTeamAbbrev(parsed.data.team)
  if (!team) return 'missing team'
  return { name: parsed.data.name, position, team }
}

export function parsePlayerRecord(value: unknown): RawPlayerSignals | string {
  const identity = parseIdentity(value)
  if (typeof identity === 'string') return identity
  const record = asRecord(value) ?? {}
  const opponent = typeof record.opponent === 'string' ? normalizeTeamAbbrev(record.opponent) : null
  return {
    ...identity,
    opponent,
    projections: parseProjections(record.projections),
    matchupDifficulty: parseDifficulty(record),
    trendingDelta: toFiniteNumber(record.trendingDelta),
    recentPerformance: parseRecent(record.recentPerformance),
    reportedByeWeek: record.byeWeek ?? null,
    teamClinched: record.teamClinched === true,
  }
}

function parseSlots(values: unknown[], warnings: string[]): RosterSlot[] {
  const slots: RosterSlot[] = []
  values.forEach((value, i) => {
    const parsed = slotSchema.safeParse(value)
    if (!parsed.success) {
      warnings.push(`Slot #${i + 1} skipped: malformed slot definition`)
      return
    }
    const accepts = parsed.data.accepts.flatMap((p) => {
      const position = normalizePosition(p)
      return position ? [position] : []
    })
    if (parsed.data.name.toUpperCase() !== 'BENCH' && !accepts.length) {
      warnings.push(`Slot ${parsed.data.name} skipped: accepts no supported position`)
      return
    }
    slots.push({ name: parsed.data.name, accepts })
  })
  return slots
}

/**
 * Turns a loosely typed request payload into engine input. Bad fields become
 * missing signals and bad player records are skipped with a warning; only a
 * payload without a player list is rejected.
 */
export function parseSnapshot(input: unknown): ParsedSnapshot {
  const envelope = envelopeSchema.safeParse(input)
  if (!envelope.success) {
    const detail = envelope.error.issues.map((i) => `${i.path.join('.') || 'snapshot'}: ${i.message}`).join('; ')
    throw new SnapshotParseError(`Invalid snapshot: ${detail}`)
  }
  const data = envelope.data
  const warnings: string[] = [...data.upstreamWarnings]
  const players: RawPlayerSignals[] = []
  const seen = new Set<string>()

  data.players.forEach((value, i) => {
    const player = parsePlayerRecord(value)
    if (typeof player === 'string') {
      warnings.push(`Player #${i + 1} skipped: ${player}`)
      return
    }
    const key = `${normalizePlayerName(player.name)}__${player.position}__${player.team}`
    if (seen.has(key)) {
      warnings.push(`Duplicate player ${player.name} (${player.position}, ${player.team}) skipped`)
      return
    }
    seen.add(key)
    players.push(player)
  })

  const roster: DraftRosterPlayer[] = []
  data.roster.forEach((value, i) => {
    const identity = parseIdentity(value)
    if (typeof identity === 'string') {
      warnings.push(`Roster entry #${i + 1} skipped: ${identity}`)
      return
    }
    roster.push(identity)
  })

  return {
    mode: data.mode,
    strategy: data.strategy,
    tierMode: data.tierMode ?? null,
    week: data.week ?? null,
    season: data.season ?? null,
    leagueSize: data.leagueSize ?? null,
    slots: data.slots ? parseSlots(data.slots, warnings) : null,
    scarcityMode: data.scarcity,
    players,
    roster,
    overallPick: data.overallPick,
    limit: data.limit ?? null,
    warnings,
  }
}
