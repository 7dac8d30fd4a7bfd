import { clamp } from '../utils/helpers.js';
import type { MarketMetrics, TradingPatterns } from '../types.js';

// 24h volume above this multiple of pool liquidity is churn, not demand
const HEALTHY_TURNOVER = 1;
const MAX_TURNOVER = 10;

/**
 * Wash-trading heuristic from 24h aggregates.
 *
 * Turnover (volume / liquidity) beyond 1x scales the score up to 1 at 10x.
 * High turnover with near-perfectly balanced buys and sells adds 0.2: the
 * same wallets cycling in and out.
 */
export function analyzeTradingPatterns(market: MarketMetrics): TradingPatterns {
  const buys = market.buys24h ?? 0;
  const sells = market.sells24h ?? 0;
  const total = buys + sells;
  const liquidity = market.liquidityUsd ?? 0;
  const volume = market.volume24hUsd;

  const hasTurnover = volume !== null && liquidity > 0;
  if (!hasTurnover && total === 0) {
    return { available: false, washTradingScore: 0, organicVolumeRatio: 0, buySellImbalance: false };
  }

  const turnover = hasTurnover ? volume / liquidity : 0;
  let wash = clamp((turnover - HEALTHY_TURNOVER) / (MAX_TURNOVER - HEALTHY_TURNOVER));

  if (turnover > 2 && total >= 20 && Math.abs(buys - sells) / total < 0.1) {
    wash = clamp(wash + 0.2);
  }

  return {
    available: true,
    washTradingScore: Math.round(wash * 1000) / 1000,
    organicVolumeRatio: Math.round((1 - wash) * 1000) / 1000,
    buySellImbalance: total > 0 && (buys === 0 || sells === 0),
  };
}
