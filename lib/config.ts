import { z } from 'zod'
import { InvalidConfigurationError } from '@/lib/lineup-engine/errors'

const weekList = z
  .string()
  .transform((raw) =>
    raw
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map((part) => Number(part))
  )
  .pipe(z.array(z.number().int().min(1).max(18)))

const envSchema = z.object({
  LINEUP_SEASON: z.coerce.number().int().min(2000).default(2025),
  LINEUP_BYE_TABLE: z.string().min(1).optional(),
  LINEUP_PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  LINEUP_FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  LINEUP_RATE_LIMIT_PER_HOUR: z.coerce.number().int().positive().default(1000),
  LINEUP_REST_RISK_WEEKS: weekList.default('17,18'),
  LINEUP_LEAGUE_SIZE: z.coerce.number().int().min(4).max(32).default(12),
})

export type EngineConfig = {
  season: number
  byeTablePath: string | null
  providerTimeoutMs: number
  fetchConcurrency: number
  rateLimitPerHour: number
  restRiskWeeks: readonly number[]
  leagueSize: number
}

export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      'Invalid engine environment',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const data = parsed.data
  return Object.freeze({
    season: data.LINEUP_SEASON,
    byeTablePath: data.LINEUP_BYE_TABLE ?? null,
    providerTimeoutMs: data.LINEUP_PROVIDER_TIMEOUT_MS,
    fetchConcurrency: data.LINEUP_FETCH_CONCURRENCY,
    rateLimitPerHour: data.LINEUP_RATE_LIMIT_PER_HOUR,
    restRiskWeeks: Object.freeze([...data.LINEUP_REST_RISK_WEEKS]),
    leagueSize: data.LINEUP_LEAGUE_SIZE,
  })
}

export const engineConfig: EngineConfig = loadEngineConfig()
