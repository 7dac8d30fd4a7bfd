export * from './types.js';
export { loadConfig, validateConfig, assertValidConfig } from './config.js';
export { SourceError, ConfigError, toSourceError } from './utils/errors.js';
export type { SourceErrorCode } from './utils/errors.js';
export { withRetry } from './utils/retry.js';
export type { RetryOptions } from './utils/retry.js';
export { Semaphore } from './utils/semaphore.js';
export { RateLimiter } from './utils/rate-limiter.js';
export type { RateLimitPolicy, RateLimiterStats, RateLimiterOptions } from './utils/rate-limiter.js';
export { ResultCache, cacheKey } from './data/result-cache.js';
export type { ResultCacheOptions } from './data/result-cache.js';
export { VerifierEmitter } from './events/verifier-emitter.js';
export { HttpSource } from './sources/http-source.js';
export type { FetchFn, SourceDeps } from './sources/http-source.js';
export { GoPlusSource } from './sources/goplus-source.js';
export { ExplorerSource } from './sources/explorer-source.js';
export { HoneypotSource } from './sources/honeypot-source.js';
export { SolanaSource } from './sources/solana-source.js';
export type { AccountInfoReader, SolanaSourceOptions } from './sources/solana-source.js';
export { BatchVerifier } from './verification/batch-verifier.js';
export type { BatchVerifierDeps } from './verification/batch-verifier.js';
export { mergeOutcomes, SOURCE_PRIORITY } from './verification/merge.js';
export { LiquidityLockEvaluator, lockScore } from './analysis/liquidity-lock.js';
export type { LockQuery } from './analysis/liquidity-lock.js';
export { analyzeHolderDistribution, giniCoefficient, herfindahlIndex } from './analysis/holder-distribution.js';
export { analyzeTradingPatterns } from './analysis/trading-patterns.js';
export { FakeTokenDetector, loadKnownTokens } from './analysis/fake-token-detector.js';
export type { KnownTokens } from './analysis/fake-token-detector.js';
export { RiskScorer } from './analysis/risk-scorer.js';
export type { RiskInput } from './analysis/risk-scorer.js';
export { decodeFeed, readFeed } from './pipeline/feed.js';
export { TokenRiskPipeline, summarizeReports } from './pipeline/token-risk-pipeline.js';
export type { PipelineDeps, ReportSummary, RunOptions } from './pipeline/token-risk-pipeline.js';
export { createPipeline } from './pipeline/create-pipeline.js';
export type { PipelineBundle, PipelineOverrides } from './pipeline/create-pipeline.js';
