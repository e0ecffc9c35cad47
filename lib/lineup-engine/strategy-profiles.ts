import { z } from 'zod'
import { InvalidConfigurationError, UnknownStrategyError } from './errors'
import {
  STRATEGY_NAMES,
  TIER_MODES,
  TIERS,
  type StrategyName,
  type StrategyProfile,
  type TierMode,
  type TierThresholds,
} from './types'

export const WEIGHT_EPSILON = 1e-6

const TIER_MULTIPLIERS = {
  elite: 3.0,
  stud: 2.0,
  solid: 1.3,
  flex: 1.0,
  bench: 0.5,
}

// Weekly points by position; tight ends and kickers score on a lower scale.
const TIER_THRESHOLDS = {
  QB: { elite: 22, stud: 18, solid: 15, flex: 12 },
  RB: { elite: 18, stud: 14, solid: 10, flex: 7 },
  WR: { elite: 16, stud: 12, solid: 9, flex: 6 },
  TE: { elite: 12, stud: 9, solid: 6, flex: 4 },
  K: { elite: 10, stud: 8, solid: 6, flex: 5 },
  DEF: { elite: 10, stud: 8, solid: 6, flex: 4 },
}

const unitWeight = z.number().finite().min(0).max(1)

function sumsToOne(values: number[]): boolean {
  const total = values.reduce((acc, v) => acc + v, 0)
  return Math.abs(total - 1) <= WEIGHT_EPSILON
}

function strictlyDecreasing(values: number[]): boolean {
  return values.every((v, i) => i === 0 || v < values[i - 1])
}

const thresholdSchema = z
  .object({
    elite: z.number().finite().min(0),
    stud: z.number().finite().min(0),
    solid: z.number().finite().min(0),
    flex: z.number().finite().min(0),
  })
  .strict()
  .refine((t) => strictlyDecreasing([t.elite, t.stud, t.solid, t.flex]), {
    message: 'tier thresholds must decrease from elite to flex',
  })

const profileSchema = z.object({
  name: z.enum(STRATEGY_NAMES),
  weights: z
    .object({
      projection: unitWeight,
      matchup: unitWeight,
      trending: unitWeight,
      momentum: unitWeight,
    })
    .strict()
    .refine((w) => sumsToOne([w.projection, w.matchup, w.trending, w.momentum]), {
      message: 'blend weights must sum to 1',
    }),
  riskDirection: z.enum(['floor', 'neutral', 'ceiling']),
  tierMode: z.enum(TIER_MODES).default('fixed'),
  tierThresholds: z
    .object({
      QB: thresholdSchema,
      RB: thresholdSchema,
      WR: thresholdSchema,
      TE: thresholdSchema,
      K: thresholdSchema,
      DEF: thresholdSchema,
    })
    .strict(),
  tierMultipliers: z
    .object({
      elite: z.number().finite().positive(),
      stud: z.number().finite().positive(),
      solid: z.number().finite().positive(),
      flex: z.number().finite().positive(),
      bench: z.number().finite().positive(),
    })
    .strict()
    .refine((m) => strictlyDecreasing(TIERS.map((tier) => m[tier])), {
      message: 'tier multipliers must decrease from elite to bench',
    }),
  draftWeights: z
    .object({ vor: unitWeight, scarcity: unitWeight, need: unitWeight })
    .strict()
    .refine((w) => sumsToOne([w.vor, w.scarcity, w.need]), {
      message: 'draft weights must sum to 1',
    }),
})

/**
 * Validates a profile and returns a frozen copy. Weights that do not sum to 1
 * are rejected rather than renormalized.
 */
export function createStrategyProfile(input: unknown): StrategyProfile {
  const parsed = profileSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      'Invalid strategy profile',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'profile'}: ${issue.message}`)
    )
  }
  const p = parsed.data
  const t = p.tierThresholds
  const freeze = (row: TierThresholds): Readonly<TierThresholds> => Object.freeze({ ...row })
  return Object.freeze({
    name: p.name,
    weights: Object.freeze({ ...p.weights }),
    riskDirection: p.riskDirection,
    tierMode: p.tierMode,
    tierThresholds: Object.freeze({
      QB: freeze(t.QB),
      RB: freeze(t.RB),
      WR: freeze(t.WR),
      TE: freeze(t.TE),
      K: freeze(t.K),
      DEF: freeze(t.DEF),
    }),
    tierMultipliers: Object.freeze({ ...p.tierMultipliers }),
    draftWeights: Object.freeze({ ...p.draftWeights }),
  })
}

export const STRATEGY_PROFILES: Readonly<Record<StrategyName, StrategyProfile>> = Object.freeze({
  conservative: createStrategyProfile({
    name: 'conservative',
    weights: { projection: 0.7, matchup: 0.2, trending: 0.05, momentum: 0.05 },
    riskDirection: 'floor',
    tierThresholds: TIER_THRESHOLDS,
    tierMultipliers: TIER_MULTIPLIERS,
    draftWeights: { vor: 0.6, scarcity: 0.2, need: 0.2 },
  }),
  balanced: createStrategyProfile({
    name: 'balanced',
    weights: { projection: 0.8, matchup: 0.1, trending: 0.05, momentum: 0.05 },
    riskDirection: 'neutral',
    tierThresholds: TIER_THRESHOLDS,
    tierMultipliers: TIER_MULTIPLIERS,
    draftWeights: { vor: 0.5, scarcity: 0.25, need: 0.25 },
  }),
  aggressive: createStrategyProfile({
    name: 'aggressive',
    weights: { projection: 0.4, matchup: 0.35, trending: 0.15, momentum: 0.1 },
    riskDirection: 'ceiling',
    tierThresholds: TIER_THRESHOLDS,
    tierMultipliers: TIER_MULTIPLIERS,
    draftWeights: { vor: 0.4, scarcity: 0.35, need: 0.25 },
  }),
})

function isStrategyName(value: string): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value)
}

// floor_focused / ceiling_focused are accepted as aliases
const STRATEGY_ALIASES: Record<string, StrategyName> = {
  floor_focused: 'conservative',
  ceiling_focused: 'aggressive',
  safe: 'conservative',
  upside: 'aggressive',
}

// Same profile with a different tier mode, validated like any other.
export function withTierMode(profile: StrategyProfile, mode: TierMode | null): StrategyProfile {
  if (!mode || mode === profile.tierMode) return profile
  return createStrategyProfile({ ...profile, tierMode: mode })
}

export function getStrategyProfile(name: string): StrategyProfile {
  const key = name.trim().toLowerCase()
  if (isStrategyName(key)) return STRATEGY_PROFILES[key]
  const alias = STRATEGY_ALIASES[key]
  if (alias) return STRATEGY_PROFILES[alias]
  throw new UnknownStrategyError(name)
}
