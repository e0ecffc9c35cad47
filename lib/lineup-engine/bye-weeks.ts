import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { engineConfig } from '@/lib/config'
import { normalizeTeamAbbrev } from '@/lib/team-abbrev'
import { InvalidConfigurationError } from './errors'

export const MIN_BYE_WEEK = 1
export const MAX_BYE_WEEK = 18

const byeWeek = z.number().int().min(MIN_BYE_WEEK).max(MAX_BYE_WEEK)

const byeTableSchema = z
  .object({
    season: z.number().int(),
    byeWeeks: z.record(z.string().min(1), byeWeek),
  })
  .strict()

export type ByeTable = z.infer<typeof byeTableSchema>

const DEFAULT_TABLE_URL = new URL('../../data/bye-weeks-2025.json', import.meta.url)

/**
 * Externally reported bye weeks are only trusted when they are an integer in
 * 1..18. Numeric strings are accepted; anything else is "no data".
 */
export function parseReportedByeWeek(value: unknown): number | null {
  let n: number
  if (typeof value === 'number') {
    n = value
  } else if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    n = Number(value)
  } else {
    return null
  }
  return byeWeek.safeParse(n).success ? n : null
}

export class ByeWeekResolver {
  readonly season: number
  private readonly table: ReadonlyMap<string, number>

  constructor(table: ByeTable) {
    this.season = table.season
    const entries = new Map<string, number>()
    for (const [team, week] of Object.entries(table.byeWeeks)) {
      const canonical = normalizeTeamAbbrev(team)
      if (canonical) entries.set(canonical, week)
    }
    this.table = entries
  }

  static fromJson(input: unknown): ByeWeekResolver {
    const parsed = byeTableSchema.safeParse(input)
    if (!parsed.success) {
      throw new InvalidConfigurationError(
        'Malformed bye-week table',
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'table'}: ${issue.message}`)
      )
    }
    return new ByeWeekResolver(parsed.data)
  }

  static fromFile(path: string | URL): ByeWeekResolver {
    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'))
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new InvalidConfigurationError(`Unable to read bye-week table at ${String(path)}`, [reason])
    }
    return ByeWeekResolver.fromJson(raw)
  }

  /**
   * The curated table wins for every team it lists. A reported value is only
   * consulted for teams missing from it.
   */
  resolve(team: string, reported?: unknown): number | null {
    const canonical = normalizeTeamAbbrev(team)
    if (canonical) {
      const curated = this.table.get(canonical)
      if (curated !== undefined) return curated
    }
    return parseReportedByeWeek(reported)
  }

  isOnBye(team: string, week: number, reported?: unknown): boolean {
    const bye = this.resolve(team, reported)
    return bye !== null && bye === week
  }
}

function loadDefaultByeResolver(): ByeWeekResolver {
  const path = engineConfig.byeTablePath ?? fileURLToPath(DEFAULT_TABLE_URL)
  const resolver = ByeWeekResolver.fromFile(path)
  console.log(`[lineup-engine] Loaded ${resolver.season} bye-week table from ${path}`)
  return resolver
}

// Loaded at import, like the engine config: a bad table throws before any
// request is scored. Never mutated after load.
const defaultResolver = loadDefaultByeResolver()

export function getDefaultByeResolver(): ByeWeekResolver {
  return defaultResolver
}
