import { logger } from '../utils/logger.js';
import { shortenAddress } from '../utils/helpers.js';
import { cacheKey } from '../data/result-cache.js';
import type { ResultCache } from '../data/result-cache.js';
import {
  BURN_ADDRESSES,
  BURN_PLATFORM,
  DAY_MS,
  LOCK_PLATFORM_CONTRACTS,
  PERMANENT_LOCK_DAYS,
} from '../constants.js';
import type { LiquidityLockInfo, LockPolicy, LpHolder } from '../types.js';

export interface LockQuery {
  chain: string;
  tokenAddress: string;
  pairAddress: string | null;
  /** LP token holders reported by the primary source, if any. */
  lpHolders?: LpHolder[];
}

/**
 * 0..100 safety score. Base 30 for any lock, then locked share, duration and
 * platform bands. Unlocked is always 0.
 */
export function lockScore(info: LiquidityLockInfo, trustedPlatforms: readonly string[]): number {
  if (!info.isLocked) return 0;

  let score = 30;

  const pct = info.lockedPercentage;
  if (pct >= 90) score += 25;
  else if (pct >= 80) score += 20;
  else if (pct >= 50) score += 10;

  const days = info.lockDurationDays;
  if (days >= 365) score += 25;
  else if (days >= 180) score += 20;
  else if (days >= 90) score += 15;
  else if (days >= 30) score += 10;

  const trusted = info.platformName !== null && trustedPlatforms.includes(info.platformName);
  score += trusted ? 20 : 10;

  return Math.min(score, 100);
}

interface LockedPosition {
  holder: LpHolder;
  platform: string;
  burned: boolean;
  unlockAt: number | null;
}

export class LiquidityLockEvaluator {
  private readonly now: () => number;

  constructor(
    private readonly policy: LockPolicy,
    private readonly cache: ResultCache<LiquidityLockInfo>,
    now?: () => number,
  ) {
    this.now = now ?? (() => Date.now());
  }

  score(info: LiquidityLockInfo): number {
    return lockScore(info, this.policy.trustedPlatforms);
  }

  /**
   * Registry first, then the LP-holder heuristic, else unlocked with a
   * critical warning. Every call returns a fresh record.
   */
  evaluate(query: LockQuery): LiquidityLockInfo {
    const chain = query.chain.toLowerCase();
    const token = query.tokenAddress.toLowerCase();
    const pair = query.pairAddress?.toLowerCase() ?? null;
    const key = cacheKey('lock', chain, `${token}:${pair ?? '-'}`);

    const cached = this.cache.get(key);
    if (cached) return { ...cached, warnings: [...cached.warnings], notes: [...cached.notes] };

    const info = this.fromRegistry(chain, token, pair)
      ?? this.fromLpHolders(query.lpHolders ?? [])
      ?? this.unlocked();

    const safety = this.analyzeSafety(info);
    info.warnings.push(...safety.warnings);
    info.notes.push(...safety.notes);
    this.cache.put(key, info);

    logger.debug(`[lock] ${chain}:${shortenAddress(token)} locked=${info.isLocked} pct=${info.lockedPercentage} days=${info.lockDurationDays}`, {
      platform: info.platformName,
      evidence: info.evidence,
    });
    return { ...info, warnings: [...info.warnings], notes: [...info.notes] };
  }

  private fromRegistry(chain: string, token: string, pair: string | null): LiquidityLockInfo | null {
    const entry = this.policy.registry.find(
      (r) => r.chain === chain && (r.tokenAddress === token || (pair !== null && r.tokenAddress === pair)),
    );
    if (!entry) return null;

    const now = this.now();
    return {
      isLocked: true,
      lockedPercentage: entry.lockedPercentage,
      unlockTimestamp: now + entry.lockDurationDays * DAY_MS,
      lockDurationDays: entry.lockDurationDays,
      platformName: entry.platformName,
      lockContractAddress: entry.lockContractAddress,
      warnings: [],
      notes: [],
      evidence: 'registry',
      checkedAt: now,
    };
  }

  /** Locked share = LP held by burn addresses, known lockers, or flagged locked. */
  private fromLpHolders(holders: LpHolder[]): LiquidityLockInfo | null {
    const now = this.now();
    const positions: LockedPosition[] = [];

    for (const holder of holders) {
      const address = holder.address.toLowerCase();
      const burned = BURN_ADDRESSES.has(address);
      const knownLocker = LOCK_PLATFORM_CONTRACTS.get(address);
      if (!burned && !knownLocker && !holder.isLocked) continue;

      const future = holder.unlockTimestamps.filter((t) => t > now);
      // Locker details that all lie in the past mean the lock already lapsed
      if (!burned && holder.unlockTimestamps.length > 0 && future.length === 0) continue;

      positions.push({
        holder,
        platform: burned ? BURN_PLATFORM : (knownLocker ?? holder.tag ?? 'Unknown locker'),
        burned,
        unlockAt: future.length > 0 ? Math.min(...future) : null,
      });
    }

    if (positions.length === 0) return null;

    const share = Math.min(positions.reduce((sum, p) => sum + p.holder.percent, 0), 1);
    const dominant = positions.reduce((a, b) => (b.holder.percent > a.holder.percent ? b : a));

    // Earliest lapse among time-locked positions governs; burned-only never lapses
    const timed = positions.filter((p) => !p.burned && p.unlockAt !== null);
    let unlockTimestamp: number | null = null;
    let lockDurationDays = 0;
    if (timed.length > 0) {
      unlockTimestamp = Math.min(...timed.map((p) => p.unlockAt ?? Infinity));
      lockDurationDays = Math.floor((unlockTimestamp - now) / DAY_MS);
    } else if (positions.every((p) => p.burned)) {
      lockDurationDays = PERMANENT_LOCK_DAYS;
    }

    return {
      isLocked: share > 0,
      lockedPercentage: Math.round(share * 10_000) / 100,
      unlockTimestamp,
      lockDurationDays,
      platformName: dominant.platform,
      lockContractAddress: dominant.holder.address.toLowerCase(),
      warnings: [],
      notes: [],
      evidence: 'lp-holders',
      checkedAt: now,
    };
  }

  private unlocked(): LiquidityLockInfo {
    return {
      isLocked: false,
      lockedPercentage: 0,
      unlockTimestamp: null,
      lockDurationDays: 0,
      platformName: null,
      lockContractAddress: null,
      warnings: [],
      notes: [],
      evidence: 'none',
      checkedAt: this.now(),
    };
  }

  private analyzeSafety(info: LiquidityLockInfo): { warnings: string[]; notes: string[] } {
    if (!info.isLocked) {
      return { warnings: ['CRITICAL: liquidity is not locked, high rug pull risk'], notes: [] };
    }

    const { minLockPercentage, minLockDays, safeLockDays, expiryWarningDays, trustedPlatforms } = this.policy;
    const warnings: string[] = [];
    const notes: string[] = [];

    if (info.lockedPercentage < minLockPercentage) {
      warnings.push(`Locked percentage ${info.lockedPercentage}% is below the recommended minimum of ${minLockPercentage}%`);
    }
    if (info.lockDurationDays < minLockDays) {
      warnings.push(`Lock duration ${info.lockDurationDays} days is below the recommended minimum of ${minLockDays} days`);
    } else if (info.lockDurationDays >= safeLockDays) {
      notes.push(`Lock duration ${info.lockDurationDays} days meets the safe minimum of ${safeLockDays} days`);
    }
    if (info.platformName === null || !trustedPlatforms.includes(info.platformName)) {
      warnings.push(`Lock platform ${info.platformName ?? 'unknown'} is not on the trusted list`);
    }
    if (info.unlockTimestamp !== null && info.unlockTimestamp - info.checkedAt < expiryWarningDays * DAY_MS) {
      warnings.push(`Lock expires within ${expiryWarningDays} days`);
    }

    return { warnings, notes };
  }
}
