import type { HolderDistribution, MarketMetrics } from '../types.js';

/**
 * Gini coefficient over holder balances.
 * 0 = perfectly equal, approaching 1 = one wallet holds everything.
 */
export function giniCoefficient(balances: readonly number[]): number {
  const sorted = balances.map((b) => Math.max(b, 0)).sort((a, b) => a - b);
  const n = sorted.length;
  const total = sorted.reduce((s, b) => s + b, 0);
  if (n < 2 || total <= 0) return 0;
  let weighted = 0;
  sorted.forEach((b, i) => {
    weighted += (i + 1) * b;
  });
  return (2 * weighted) / (n * total) - (n + 1) / n;
}

/**
 * Herfindahl-Hirschman Index: sum of squared shares.
 * Range: 1/n (even) to 1 (single holder). >0.25 = highly concentrated.
 */
export function herfindahlIndex(balances: readonly number[]): number {
  const total = balances.reduce((s, b) => s + Math.max(b, 0), 0);
  if (total <= 0) return 0;
  return balances.reduce((sum, b) => {
    const share = Math.max(b, 0) / total;
    return sum + share * share;
  }, 0);
}

/** Percent of supply held by the `n` largest holders. */
export function topHoldersPct(balances: readonly number[], n = 10): number {
  const total = balances.reduce((s, b) => s + Math.max(b, 0), 0);
  if (total <= 0) return 0;
  const top = [...balances].sort((a, b) => b - a).slice(0, n).reduce((s, b) => s + Math.max(b, 0), 0);
  return (top / total) * 100;
}

/**
 * Uses the full balance list when the feed has one; otherwise approximates
 * the Gini from the reported top-10 share.
 */
export function analyzeHolderDistribution(market: MarketMetrics, holderCount: number | null): HolderDistribution {
  const balances = market.holderBalances;
  if (balances.length >= 2) {
    return {
      available: true,
      giniCoefficient: giniCoefficient(balances),
      herfindahlIndex: herfindahlIndex(balances),
      top10HolderPct: topHoldersPct(balances),
      holderCount: holderCount ?? balances.length,
    };
  }

  if (market.top10HolderPct !== null) {
    return {
      available: true,
      giniCoefficient: Math.min(market.top10HolderPct / 100, 1),
      herfindahlIndex: 0,
      top10HolderPct: market.top10HolderPct,
      holderCount: holderCount ?? 0,
    };
  }

  return { available: false, giniCoefficient: 0, herfindahlIndex: 0, top10HolderPct: 0, holderCount: holderCount ?? 0 };
}
