export type {
  ProviderKind,
  PlayerRef,
  SnapshotRequest,
  SignalProvider,
  ProjectionProvider,
  MatchupProvider,
  TrendingProvider,
  RecentFormProvider,
  ProviderRecord,
} from './types'
export { UpstreamError, providerRecordSchema } from './types'
export { ResponseCache, PROVIDER_TTL_MS, getProviderTTL, computeRequestSignature, stableStringify } from './response-cache'
export { SlidingWindowRateLimiter } from './rate-limit'
export type { RateLimitResult } from './rate-limit'
export { buildSnapshot } from './snapshot-builder'
export type { BuiltSnapshot, SnapshotPlayer, ProviderStatus, SnapshotBuilderOptions } from './snapshot-builder'
