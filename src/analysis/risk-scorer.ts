import { logger } from '../utils/logger.js';
import { clamp, formatUsd, shortenAddress } from '../utils/helpers.js';
import { BURN_ADDRESSES, DAY_MS, HOUR_MS } from '../constants.js';
import type { VerifierEmitter } from '../events/verifier-emitter.js';
import type {
  FakeTokenResult,
  HolderDistribution,
  LiquidityLockInfo,
  MarketMetrics,
  RiskAssessment,
  RiskLevel,
  RiskSignal,
  ScoringConfig,
  TradingPatterns,
  VerificationResult,
} from '../types.js';

export interface RiskInput {
  verification: VerificationResult;
  lock: LiquidityLockInfo;
  lockScore: number;
  holders: HolderDistribution;
  trading: TradingPatterns;
  fakeToken: FakeTokenResult;
  market: MarketMetrics;
}

// Locked share a token needs before it can be rated Safe
const SAFE_MIN_LOCKED_PCT = 30;

// Contribution used when a signal has no data behind it
const UNKNOWN = 0.5;

const SIGNALS: readonly RiskSignal[] = [
  'contractVerification',
  'ownership',
  'liquidityLock',
  'holderDistribution',
  'tradingPatterns',
  'codeAudit',
  'marketSignals',
];

const RECOMMENDATIONS: Record<RiskSignal, string> = {
  contractVerification: 'Contract source is not verified; review the bytecode before interacting',
  ownership: 'Owner retains control of the contract; check what privileged functions it can call',
  liquidityLock: 'Liquidity is not meaningfully locked; the pool can be withdrawn at any time',
  holderDistribution: 'Supply is concentrated in a few wallets; large holders can dump on the market',
  tradingPatterns: 'Volume looks inorganic; treat reported activity with suspicion',
  codeAudit: 'Contract exposes risky functions (mint, blacklist, proxy or high tax)',
  marketSignals: 'Weak market profile: thin liquidity, extreme price action or no public presence',
};

export function contractVerificationRisk(v: VerificationResult): number {
  return v.isVerified ? 0.1 : 0.8;
}

/** Renounced (owner is a burn address) is 0; an owner able to reclaim is 1. */
export function ownershipRisk(v: VerificationResult): number {
  if (v.canReclaimOwnership === true) return 1;
  if (v.ownerAddress === null) return UNKNOWN;
  if (BURN_ADDRESSES.has(v.ownerAddress.toLowerCase())) return 0;
  return 0.6;
}

export function holderDistributionRisk(h: HolderDistribution): number {
  if (!h.available) return UNKNOWN;
  const { giniCoefficient: gini, top10HolderPct: top10 } = h;
  if (gini > 0.8 || top10 > 80) return 0.9;
  if (gini > 0.6 || top10 > 60) return 0.7;
  if (gini > 0.4 || top10 > 40) return 0.5;
  return 0.2;
}

export function tradingPatternRisk(t: TradingPatterns): number {
  if (!t.available) return UNKNOWN;
  let risk = 0.2;
  if (t.washTradingScore > 0.7) risk = 0.9;
  else if (t.washTradingScore > 0.5) risk = 0.7;
  else if (t.washTradingScore > 0.3) risk = 0.5;
  if (t.buySellImbalance) risk += 0.1;
  return clamp(risk);
}

export function codeAuditRisk(v: VerificationResult, highTaxPercent: number): number {
  const fields = [v.hasMintFunction, v.hasBlacklistFunction, v.isProxyContract, v.buyTaxPercent, v.sellTaxPercent];
  if (fields.every((f) => f === null)) return UNKNOWN;

  let risk = 0;
  if (v.hasMintFunction === true) risk += 0.3;
  if (v.hasBlacklistFunction === true) risk += 0.3;
  if (v.isProxyContract === true) risk += 0.2;
  const maxTax = Math.max(v.buyTaxPercent ?? 0, v.sellTaxPercent ?? 0);
  if (maxTax > highTaxPercent) risk += 0.3;
  return risk === 0 ? 0.1 : clamp(risk);
}

export function marketSignalRisk(m: MarketMetrics): number {
  let risk = 0.2;
  const liquidity = m.liquidityUsd ?? 0;
  if (liquidity < 25_000) risk += 0.3;
  else if (liquidity < 100_000) risk += 0.15;

  if (m.priceChange24hPct !== null && (m.priceChange24hPct > 300 || m.priceChange24hPct < -50)) risk += 0.1;

  if (m.volume24hUsd !== null && liquidity > 0) {
    const ratio = m.volume24hUsd / liquidity;
    if (ratio < 0.05 || ratio > 2) risk += 0.1;
  }

  if (m.websites === 0 && m.socials === 0) risk += 0.1;
  return clamp(risk);
}

/**
 * Weighted composite over seven 0..1 signals, then additive penalties on the
 * same 0..1 scale, then the honeypot override and per-level liquidity gates.
 */
export class RiskScorer {
  private readonly now: () => number;

  constructor(
    private readonly config: ScoringConfig,
    private readonly events?: VerifierEmitter,
    now?: () => number,
  ) {
    this.now = now ?? (() => Date.now());
  }

  assess(input: RiskInput): RiskAssessment {
    const { verification: v, lock, market } = input;
    const { weights, highTaxPercent } = this.config;

    const scoreBreakdown: Record<RiskSignal, number> = {
      contractVerification: contractVerificationRisk(v),
      ownership: ownershipRisk(v),
      liquidityLock: clamp(1 - input.lockScore / 100),
      holderDistribution: holderDistributionRisk(input.holders),
      tradingPatterns: tradingPatternRisk(input.trading),
      codeAudit: codeAuditRisk(v, highTaxPercent),
      marketSignals: marketSignalRisk(market),
    };

    const compositeScore = round(SIGNALS.reduce((sum, s) => sum + weights[s] * scoreBreakdown[s], 0));
    const penalties = this.penalties(input);
    const penaltyTotal = Object.values(penalties).reduce((a, b) => a + b, 0);

    const warnings = [...lock.warnings];
    if (v.errorMessage) warnings.push(`Verification: ${v.errorMessage}`);
    if (input.fakeToken.isFake) warnings.push(`Possible fake token: ${input.fakeToken.reason}`);

    let overallScore = round(clamp(compositeScore + penaltyTotal));
    let riskLevel: RiskLevel;
    if (v.isHoneypot) {
      overallScore = 1;
      riskLevel = 'ScamLikely';
      warnings.unshift('CRITICAL: honeypot detected, tokens cannot be sold');
    } else {
      riskLevel = this.applyLiquidityGates(this.levelFor(overallScore), input, warnings);
    }

    const recommendations = SIGNALS.filter((s) => scoreBreakdown[s] >= 0.5).map((s) => RECOMMENDATIONS[s]);
    if (v.isHoneypot) recommendations.unshift('Do not buy: sells are blocked');
    if (!v.dataAvailable) recommendations.push('No source could confirm this token; treat it as unverified');
    if (input.fakeToken.isFake) recommendations.push('Check the contract address against the official project before trading');

    const assessment: RiskAssessment = {
      overallScore,
      compositeScore,
      riskLevel,
      confidence: this.confidence(input),
      scoreBreakdown,
      penalties,
      recommendations,
      warnings,
    };

    logger.debug(`[risk] ${v.chain}:${shortenAddress(v.address)} ${riskLevel} score=${overallScore} composite=${compositeScore}`, {
      penalties,
    });
    this.events?.emit('token:scored', { chain: v.chain, address: v.address, riskLevel, overallScore });
    return assessment;
  }

  levelFor(score: number): RiskLevel {
    const { moderate, medium, high, scamLikely } = this.config.thresholds;
    if (score >= scamLikely) return 'ScamLikely';
    if (score >= high) return 'High';
    if (score >= medium) return 'Medium';
    if (score >= moderate) return 'Moderate';
    return 'Safe';
  }

  private penalties(input: RiskInput): Record<string, number> {
    const p = this.config.penalties;
    const out: Record<string, number> = {};

    const created = input.market.pairCreatedAt;
    if (created !== null) {
      const age = this.now() - created;
      if (age < 24 * HOUR_MS) out.ageUnder24h = p.ageUnder24h;
      else if (age < 7 * DAY_MS) out.ageUnder7d = p.ageUnder7d;
    }

    if (!input.lock.isLocked) out.noLock = p.noLock;
    else if (input.lockScore < 60) out.weakLock = p.weakLock;
    else if (input.lockScore < 80) out.partialLock = p.partialLock;

    if (!input.verification.dataAvailable) out.unconfirmed = p.unconfirmed;
    if (input.fakeToken.isFake) out.fakeToken = p.fakeToken;

    return out;
  }

  /** A level may only be kept when the pool is deep enough for it. */
  private applyLiquidityGates(level: RiskLevel, input: RiskInput, warnings: string[]): RiskLevel {
    const { safeMinUsd, mediumMinUsd, highMinUsd } = this.config.liquidityGates;
    const liquidity = input.market.liquidityUsd ?? 0;
    const lockedPct = input.lock.isLocked ? input.lock.lockedPercentage : 0;

    if (level === 'Safe') {
      if (liquidity < safeMinUsd) {
        level = 'Moderate';
        warnings.push(`Liquidity ${formatUsd(liquidity)} is below ${formatUsd(safeMinUsd)} required for Safe`);
      } else if (lockedPct === 0) {
        level = input.verification.isVerified ? 'Moderate' : 'Medium';
        warnings.push('Liquidity is not locked; a token without a lock cannot be rated Safe');
      } else if (lockedPct < SAFE_MIN_LOCKED_PCT) {
        level = 'Moderate';
      }
    }

    if (level === 'Medium' && liquidity < mediumMinUsd) {
      level = 'High';
      warnings.push(`Liquidity ${formatUsd(liquidity)} is below ${formatUsd(mediumMinUsd)} required for Medium`);
    }

    if (level === 'High' && liquidity < highMinUsd) {
      level = 'ScamLikely';
      warnings.push(`Critically low liquidity (${formatUsd(liquidity)})`);
    }

    return level;
  }

  /** 0.5 with no signal data at all, 1 with every signal backed by data. */
  private confidence(input: RiskInput): number {
    const { verification: v } = input;
    const available = [
      v.dataAvailable,
      v.ownerAddress !== null || v.canReclaimOwnership !== null,
      input.lock.evidence !== 'none',
      input.holders.available,
      input.trading.available,
      v.hasMintFunction !== null || v.hasBlacklistFunction !== null || v.isProxyContract !== null,
      input.market.liquidityUsd !== null,
    ].filter(Boolean).length;
    return round(0.5 + 0.5 * (available / SIGNALS.length));
  }
}

function round(n: number): number {
  return Math.round(n * 1000) / 1000;
}
