import { readFileSync } from 'fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { normalizeAddress, normalizeChain } from '../utils/helpers.js';
import type { MarketMetrics, TokenCandidate } from '../types.js';

const num = z.union([z.number(), z.string()]).nullish();

// Flat record written by our own discovery step
const flatSchema = z.object({
  address: z.string().min(1),
  chain: z.string().min(1),
  symbol: z.string().default(''),
  name: z.string().nullish(),
  pairAddress: z.string().nullish(),
  market: z.object({
    liquidityUsd: num,
    volume24hUsd: num,
    priceChange24hPct: num,
    marketCapUsd: num,
    pairCreatedAt: num,
    buys24h: num,
    sells24h: num,
    websites: z.number().int().nonnegative().nullish(),
    socials: z.number().int().nonnegative().nullish(),
    dexId: z.string().nullish(),
    top10HolderPct: num,
    holderBalances: z.array(z.number()).nullish(),
  }).nullish(),
});

// DexScreener pair object, as returned by /latest/dex/pairs and /search
const dexPairSchema = z.object({
  chainId: z.string().min(1),
  dexId: z.string().nullish(),
  pairAddress: z.string().nullish(),
  baseToken: z.object({
    address: z.string().min(1),
    symbol: z.string().nullish(),
    name: z.string().nullish(),
  }),
  priceChange: z.object({ h24: num }).partial().nullish(),
  volume: z.object({ h24: num }).partial().nullish(),
  liquidity: z.object({ usd: num }).partial().nullish(),
  txns: z.object({
    h24: z.object({ buys: num, sells: num }).partial().nullish(),
  }).partial().nullish(),
  fdv: num,
  marketCap: num,
  pairCreatedAt: num,
  info: z.object({
    websites: z.array(z.unknown()).nullish(),
    socials: z.array(z.unknown()).nullish(),
  }).partial().nullish(),
});

const feedSchema = z.union([
  z.array(z.unknown()),
  z.object({ tokens: z.array(z.unknown()) }).transform((f) => f.tokens),
  z.object({ pairs: z.array(z.unknown()) }).transform((f) => f.pairs),
]);

function toNumber(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

export function emptyMarket(): MarketMetrics {
  return {
    liquidityUsd: null,
    volume24hUsd: null,
    priceChange24hPct: null,
    marketCapUsd: null,
    pairCreatedAt: null,
    buys24h: null,
    sells24h: null,
    websites: 0,
    socials: 0,
    dexId: null,
    top10HolderPct: null,
    holderBalances: [],
  };
}

function fromFlat(r: z.infer<typeof flatSchema>): TokenCandidate {
  const m = r.market;
  return {
    address: normalizeAddress(r.address),
    chain: normalizeChain(r.chain),
    symbol: r.symbol,
    name: r.name ?? null,
    pairAddress: r.pairAddress ? normalizeAddress(r.pairAddress) : null,
    market: m
      ? {
          liquidityUsd: toNumber(m.liquidityUsd),
          volume24hUsd: toNumber(m.volume24hUsd),
          priceChange24hPct: toNumber(m.priceChange24hPct),
          marketCapUsd: toNumber(m.marketCapUsd),
          pairCreatedAt: toNumber(m.pairCreatedAt),
          buys24h: toNumber(m.buys24h),
          sells24h: toNumber(m.sells24h),
          websites: m.websites ?? 0,
          socials: m.socials ?? 0,
          dexId: m.dexId ?? null,
          top10HolderPct: toNumber(m.top10HolderPct),
          holderBalances: m.holderBalances ?? [],
        }
      : emptyMarket(),
  };
}

function fromDexPair(p: z.infer<typeof dexPairSchema>): TokenCandidate {
  return {
    address: normalizeAddress(p.baseToken.address),
    chain: normalizeChain(p.chainId),
    symbol: p.baseToken.symbol ?? '',
    name: p.baseToken.name ?? null,
    pairAddress: p.pairAddress ? normalizeAddress(p.pairAddress) : null,
    market: {
      ...emptyMarket(),
      liquidityUsd: toNumber(p.liquidity?.usd),
      volume24hUsd: toNumber(p.volume?.h24),
      priceChange24hPct: toNumber(p.priceChange?.h24),
      marketCapUsd: toNumber(p.marketCap) ?? toNumber(p.fdv),
      pairCreatedAt: toNumber(p.pairCreatedAt),
      buys24h: toNumber(p.txns?.h24?.buys),
      sells24h: toNumber(p.txns?.h24?.sells),
      websites: p.info?.websites?.length ?? 0,
      socials: p.info?.socials?.length ?? 0,
      dexId: p.dexId ?? null,
    },
  };
}

/**
 * Decodes a discovery feed: an array (or `{ tokens }` / `{ pairs }`) of flat
 * candidate records or DexScreener pairs. Records matching neither shape are
 * logged and skipped.
 */
export function decodeFeed(raw: unknown): TokenCandidate[] {
  const feed = feedSchema.safeParse(raw);
  if (!feed.success) {
    throw new TypeError('Discovery feed must be an array, { tokens: [] } or { pairs: [] }');
  }

  const candidates: TokenCandidate[] = [];
  feed.data.forEach((record, i) => {
    const flat = flatSchema.safeParse(record);
    if (flat.success) {
      candidates.push(fromFlat(flat.data));
      return;
    }
    const pair = dexPairSchema.safeParse(record);
    if (pair.success) {
      candidates.push(fromDexPair(pair.data));
      return;
    }
    logger.warn(`[pipeline] feed record ${i} skipped: ${flat.error.issues[0]?.message ?? 'unrecognized shape'}`);
  });
  return candidates;
}

export function readFeed(path: string): TokenCandidate[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return decodeFeed(raw);
}
