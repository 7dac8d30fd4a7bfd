import { RateLimiter } from '../utils/rate-limiter.js';
import { ResultCache } from '../data/result-cache.js';
import { VerifierEmitter } from '../events/verifier-emitter.js';
import { GoPlusSource } from '../sources/goplus-source.js';
import { ExplorerSource } from '../sources/explorer-source.js';
import { HoneypotSource } from '../sources/honeypot-source.js';
import { SolanaSource } from '../sources/solana-source.js';
import type { AccountInfoReader } from '../sources/solana-source.js';
import type { FetchFn, SourceDeps } from '../sources/http-source.js';
import { BatchVerifier } from '../verification/batch-verifier.js';
import { LiquidityLockEvaluator } from '../analysis/liquidity-lock.js';
import { RiskScorer } from '../analysis/risk-scorer.js';
import { FakeTokenDetector } from '../analysis/fake-token-detector.js';
import type { KnownTokens } from '../analysis/fake-token-detector.js';
import { TokenRiskPipeline } from './token-risk-pipeline.js';
import type { LiquidityLockInfo, SourceName, SourceOutcome, VerifierConfig } from '../types.js';

export interface PipelineOverrides {
  fetchFn?: FetchFn;
  connectionFactory?: (url: string) => AccountInfoReader;
  events?: VerifierEmitter;
  knownTokens?: KnownTokens;
  now?: () => number;
  random?: () => number;
}

export interface PipelineBundle {
  pipeline: TokenRiskPipeline;
  verifier: BatchVerifier;
  limiter: RateLimiter;
  events: VerifierEmitter;
  verificationCache: ResultCache<SourceOutcome>;
  lockCache: ResultCache<LiquidityLockInfo>;
}

/** Wires every component from one config. Tests swap fetch, RPC and clock. */
export function createPipeline(config: VerifierConfig, overrides: PipelineOverrides = {}): PipelineBundle {
  const { now, random } = overrides;
  const events = overrides.events ?? new VerifierEmitter();

  const limiter = new RateLimiter({}, { now, random });
  for (const [name, limits] of Object.entries(config.sources)) {
    limiter.register(name, limits);
  }
  const deps: SourceDeps = { limiter, fetchFn: overrides.fetchFn };
  const limits = (name: SourceName) => config.sources[name];

  const verificationCache = new ResultCache<SourceOutcome>({
    ttlSeconds: config.cache.verificationTtlSeconds,
    maxEntries: config.cache.maxEntries,
    now,
  });
  const lockCache = new ResultCache<LiquidityLockInfo>({
    ttlSeconds: config.cache.lockTtlSeconds,
    maxEntries: config.cache.maxEntries,
    now,
  });

  const verifier = new BatchVerifier({
    goplus: new GoPlusSource(limits('goplus'), deps),
    explorers: [
      new ExplorerSource('etherscan', config.explorers.etherscan, limits('etherscan'), deps),
      new ExplorerSource('bscscan', config.explorers.bscscan, limits('bscscan'), deps),
    ],
    honeypot: new HoneypotSource(limits('honeypot'), deps),
    solana: new SolanaSource(limits('solana'), deps, {
      rpcUrls: config.solana.rpcUrls,
      tokenListUrl: config.solana.tokenListUrl,
      tokenListTtlSeconds: config.cache.tokenListTtlSeconds,
      connectionFactory: overrides.connectionFactory,
    }),
    cache: verificationCache,
    batchSize: config.batchSize,
    events,
    now,
  });

  const pipeline = new TokenRiskPipeline({
    verifier,
    lockEvaluator: new LiquidityLockEvaluator(config.lock, lockCache, now),
    scorer: new RiskScorer(config.scoring, events, now),
    fakeDetector: new FakeTokenDetector(overrides.knownTokens),
    now,
  });

  return { pipeline, verifier, limiter, events, verificationCache, lockCache };
}
