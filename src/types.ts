// ─── Configuration ───────────────────────────────────────────────────

export type SourceName = 'goplus' | 'etherscan' | 'bscscan' | 'honeypot' | 'solana';

export interface AdaptiveDelayConfig {
  floorMs: number;
  stepMs: number;       // first increment when throttled from a zero delay
  maxMs: number;
  decay: number;        // multiplier applied on every clean success
}

export interface SourceLimits {
  enabled: boolean;
  requestsPerMinute: number;
  minIntervalMs: number;
  concurrency: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  adaptive: AdaptiveDelayConfig;
}

export interface ExplorerConfig {
  chain: string;
  baseUrl: string;
  apiKey: string;
}

export interface LockRegistryEntry {
  chain: string;
  tokenAddress: string;
  lockedPercentage: number;
  lockDurationDays: number;
  platformName: string;
  lockContractAddress: string | null;
}

export interface LockPolicy {
  minLockPercentage: number;
  minLockDays: number;
  safeLockDays: number;
  expiryWarningDays: number;
  trustedPlatforms: string[];
  registry: LockRegistryEntry[];
}

export interface ScoringWeights {
  contractVerification: number;
  ownership: number;
  liquidityLock: number;
  holderDistribution: number;
  tradingPatterns: number;
  codeAudit: number;
  marketSignals: number;
}

export interface RiskThresholds {
  moderate: number;
  medium: number;
  high: number;
  scamLikely: number;
}

export interface RiskPenalties {
  ageUnder24h: number;
  ageUnder7d: number;
  noLock: number;
  weakLock: number;       // lockScore < 60
  partialLock: number;    // lockScore < 80
  unconfirmed: number;    // no source confirmed the token
  fakeToken: number;
}

export interface LiquidityGates {
  safeMinUsd: number;
  mediumMinUsd: number;
  highMinUsd: number;
}

export interface ScoringConfig {
  weights: ScoringWeights;
  thresholds: RiskThresholds;
  penalties: RiskPenalties;
  liquidityGates: LiquidityGates;
  highTaxPercent: number;
}

export interface VerifierConfig {
  batchSize: number;
  sources: Record<SourceName, SourceLimits>;
  explorers: Record<'etherscan' | 'bscscan', ExplorerConfig>;
  solana: {
    rpcUrls: string[];
    tokenListUrl: string;
  };
  cache: {
    verificationTtlSeconds: number;
    lockTtlSeconds: number;
    tokenListTtlSeconds: number;
    maxEntries: number;
  };
  lock: LockPolicy;
  scoring: ScoringConfig;
  feedPath: string;
}

// ─── Discovery feed ──────────────────────────────────────────────────

export interface MarketMetrics {
  liquidityUsd: number | null;
  volume24hUsd: number | null;
  priceChange24hPct: number | null;
  marketCapUsd: number | null;
  pairCreatedAt: number | null;   // ms epoch
  buys24h: number | null;
  sells24h: number | null;
  websites: number;
  socials: number;
  dexId: string | null;
  top10HolderPct: number | null;
  holderBalances: number[];
}

export interface TokenCandidate {
  address: string;
  chain: string;
  symbol: string;
  name: string | null;
  pairAddress: string | null;
  market: MarketMetrics;
}

export interface TokenTarget {
  address: string;
  chain: string;
}

// ─── Verification ────────────────────────────────────────────────────

export interface LpHolder {
  address: string;
  percent: number;           // 0..1 share of LP supply
  isLocked: boolean;
  tag: string | null;
  unlockTimestamps: number[]; // ms epoch, from locker details
}

/** Partial record produced by one source; absent fields mean "not reported". */
export interface SourceFindings {
  isVerified?: boolean;
  isHoneypot?: boolean;
  buyTaxPercent?: number;
  sellTaxPercent?: number;
  transferTaxPercent?: number;
  ownerAddress?: string;
  canReclaimOwnership?: boolean;
  hasMintFunction?: boolean;
  hasBlacklistFunction?: boolean;
  isProxyContract?: boolean;
  tokenName?: string;
  tokenSymbol?: string;
  holderCount?: number;
  lpHolders?: LpHolder[];
}

export type SourceOutcome =
  | { status: 'found'; source: string; findings: SourceFindings; rawPayload: unknown }
  | { status: 'not_found'; source: string; reason: string }
  | { status: 'unavailable'; source: string; reason: string };

export interface VerificationResult {
  address: string;
  chain: string;
  isVerified: boolean;
  isHoneypot: boolean;
  buyTaxPercent: number | null;
  sellTaxPercent: number | null;
  transferTaxPercent: number | null;
  ownerAddress: string | null;
  canReclaimOwnership: boolean | null;
  hasMintFunction: boolean | null;
  hasBlacklistFunction: boolean | null;
  isProxyContract: boolean | null;
  tokenName: string | null;
  tokenSymbol: string | null;
  holderCount: number | null;
  lpHolders: LpHolder[];
  sourceName: string;
  errorMessage: string | null;
  rawPayload: Record<string, unknown>;
  dataAvailable: boolean;
  checkedAt: number;
}

// ─── Liquidity lock ──────────────────────────────────────────────────

export type LockEvidence = 'registry' | 'lp-holders' | 'none';

export interface LiquidityLockInfo {
  isLocked: boolean;
  lockedPercentage: number;
  unlockTimestamp: number | null;   // ms epoch; null when permanent or unknown
  lockDurationDays: number;
  platformName: string | null;
  lockContractAddress: string | null;
  warnings: string[];
  notes: string[];                  // favourable findings, e.g. a safe lock duration
  evidence: LockEvidence;
  checkedAt: number;
}

// ─── Supplementary analyses ──────────────────────────────────────────

export interface HolderDistribution {
  available: boolean;
  giniCoefficient: number;
  herfindahlIndex: number;
  top10HolderPct: number;
  holderCount: number;
}

export interface TradingPatterns {
  available: boolean;
  washTradingScore: number;      // 0..1, higher = more suspicious
  organicVolumeRatio: number;    // 0..1
  buySellImbalance: boolean;
}

export interface FakeTokenResult {
  isFake: boolean;
  confidence: number;
  reason: string;
  detectionMethod: string;
  originalToken?: string;
  originalChain?: string;
  originalAddress?: string;
}

// ─── Risk ────────────────────────────────────────────────────────────

export const RISK_LEVELS = ['Safe', 'Moderate', 'Medium', 'High', 'ScamLikely'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export type RiskSignal = keyof ScoringWeights;

export interface RiskAssessment {
  overallScore: number;      // 0..1, higher = riskier
  compositeScore: number;    // weighted sum before penalties and overrides
  riskLevel: RiskLevel;
  confidence: number;
  scoreBreakdown: Record<RiskSignal, number>;
  penalties: Record<string, number>;
  recommendations: string[];
  warnings: string[];
}

export interface TokenReport {
  address: string;
  chain: string;
  symbol: string;
  name: string | null;
  pairAddress: string | null;
  market: MarketMetrics;
  verification: VerificationResult;
  liquidityLock: LiquidityLockInfo;
  lockScore: number;
  holderDistribution: HolderDistribution;
  tradingPatterns: TradingPatterns;
  fakeToken: FakeTokenResult;
  risk: RiskAssessment;
  analyzedAt: number;
}

// ─── Events ──────────────────────────────────────────────────────────

export interface VerifierEvents {
  'chunk:done': (info: { source: string; chain: string; size: number; ok: boolean }) => void;
  'source:unavailable': (info: { source: string; chain: string; address: string; reason: string }) => void;
  'batch:done': (info: { targets: number; verified: number; unavailable: number; durationMs: number }) => void;
  'token:scored': (info: { chain: string; address: string; riskLevel: RiskLevel; overallScore: number }) => void;
}
