import { logger } from '../utils/logger.js';
import { targetKey } from '../utils/helpers.js';
import { analyzeHolderDistribution } from '../analysis/holder-distribution.js';
import { analyzeTradingPatterns } from '../analysis/trading-patterns.js';
import type { BatchVerifier } from '../verification/batch-verifier.js';
import type { LiquidityLockEvaluator } from '../analysis/liquidity-lock.js';
import type { RiskScorer } from '../analysis/risk-scorer.js';
import type { FakeTokenDetector } from '../analysis/fake-token-detector.js';
import type {
  LiquidityLockInfo,
  RiskLevel,
  TokenCandidate,
  TokenReport,
  VerificationResult,
} from '../types.js';
import { RISK_LEVELS } from '../types.js';

export interface PipelineDeps {
  verifier: BatchVerifier;
  lockEvaluator: LiquidityLockEvaluator;
  scorer: RiskScorer;
  fakeDetector: FakeTokenDetector;
  now?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface ReportSummary {
  total: number;
  byLevel: Record<RiskLevel, number>;
  byChain: Record<string, number>;
}

/**
 * Candidates in, one report per distinct (chain, address) out, in input
 * order. Verification runs as one batch; each token is then joined with its
 * lock evaluation and scored.
 */
export class TokenRiskPipeline {
  private readonly now: () => number;

  constructor(private readonly deps: PipelineDeps) {
    this.now = deps.now ?? (() => Date.now());
  }

  async run(candidates: TokenCandidate[], opts: RunOptions = {}): Promise<TokenReport[]> {
    const unique = new Map<string, TokenCandidate>();
    for (const c of candidates) {
      const key = targetKey(c.chain, c.address);
      if (!unique.has(key)) unique.set(key, c);
    }
    if (unique.size === 0) return [];

    logger.info(`[pipeline] analyzing ${unique.size} token(s)`);
    const verifications = await this.deps.verifier.verify(
      [...unique.values()].map((c) => ({ chain: c.chain, address: c.address })),
      opts.signal,
    );

    const reports: TokenReport[] = [];
    for (const [key, candidate] of unique) {
      const verification = verifications.get(key);
      if (!verification) {
        throw new Error(`verification result missing for ${key}`);
      }
      reports.push(this.report(candidate, verification));
    }

    logger.info(`[pipeline] done: ${formatSummary(summarizeReports(reports))}`);
    return reports;
  }

  private report(candidate: TokenCandidate, verification: VerificationResult): TokenReport {
    const { lockEvaluator, scorer, fakeDetector } = this.deps;

    const liquidityLock = this.evaluateLock(candidate, verification);
    const lockScore = lockEvaluator.score(liquidityLock);
    const holderDistribution = analyzeHolderDistribution(candidate.market, verification.holderCount);
    const tradingPatterns = analyzeTradingPatterns(candidate.market);
    const symbol = candidate.symbol || verification.tokenSymbol || '';
    const fakeToken = fakeDetector.detect(symbol, verification.address, verification.chain);

    const risk = scorer.assess({
      verification,
      lock: liquidityLock,
      lockScore,
      holders: holderDistribution,
      trading: tradingPatterns,
      fakeToken,
      market: candidate.market,
    });

    return {
      address: verification.address,
      chain: verification.chain,
      symbol,
      name: candidate.name ?? verification.tokenName,
      pairAddress: candidate.pairAddress,
      market: candidate.market,
      verification,
      liquidityLock,
      lockScore,
      holderDistribution,
      tradingPatterns,
      fakeToken,
      risk,
      analyzedAt: this.now(),
    };
  }

  private evaluateLock(candidate: TokenCandidate, verification: VerificationResult): LiquidityLockInfo {
    try {
      return this.deps.lockEvaluator.evaluate({
        chain: verification.chain,
        tokenAddress: verification.address,
        pairAddress: candidate.pairAddress,
        lpHolders: verification.lpHolders,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`[pipeline] lock evaluation failed for ${verification.chain}:${verification.address}: ${message}`);
      return {
        isLocked: false,
        lockedPercentage: 0,
        unlockTimestamp: null,
        lockDurationDays: 0,
        platformName: null,
        lockContractAddress: null,
        warnings: [`Lock evaluation failed: ${message}`],
        notes: [],
        evidence: 'none',
        checkedAt: this.now(),
      };
    }
  }
}

export function summarizeReports(reports: readonly TokenReport[]): ReportSummary {
  const byLevel: Record<RiskLevel, number> = { Safe: 0, Moderate: 0, Medium: 0, High: 0, ScamLikely: 0 };
  const byChain = new Map<string, number>();
  for (const r of reports) {
    byLevel[r.risk.riskLevel]++;
    byChain.set(r.chain, (byChain.get(r.chain) ?? 0) + 1);
  }
  return { total: reports.length, byLevel, byChain: Object.fromEntries(byChain) };
}

function formatSummary(summary: ReportSummary): string {
  const levels = RISK_LEVELS.map((l) => `${l}=${summary.byLevel[l]}`).join(' ');
  return `${summary.total} report(s), ${levels}`;
}
