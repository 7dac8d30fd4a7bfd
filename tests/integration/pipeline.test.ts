import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../../src/config.js';
import { createPipeline } from '../../src/pipeline/create-pipeline.js';
import { summarizeReports } from '../../src/pipeline/token-risk-pipeline.js';
import type { FetchFn } from '../../src/sources/http-source.js';
import { DAY_MS } from '../../src/constants.js';
import type { TokenCandidate, VerifierConfig } from '../../src/types.js';
import { ADDR, jsonResponse, market, routeFetch, testLimits } from '../helpers/fixtures.js';

const NOW = Date.UTC(2026, 0, 1);

function testConfig(): VerifierConfig {
  const limits = testLimits({ maxRetries: 0 });
  return {
    ...loadConfig(),
    sources: { goplus: limits, etherscan: limits, bscscan: limits, honeypot: limits, solana: limits },
  };
}

const baseSecurity = {
  is_open_source: '1',
  is_honeypot: '0',
  buy_tax: '0.02',
  sell_tax: '0.02',
  owner_address: ADDR.zero,
  can_take_back_ownership: '0',
  is_mintable: '0',
  is_blacklisted: '0',
  is_proxy: '0',
  holder_count: '1500',
};

const GOPLUS_INDEX: Record<string, object> = {
  [ADDR.token]: {
    ...baseSecurity,
    token_symbol: 'ALP',
    lp_holders: [{
      address: ADDR.unicrypt,
      percent: '0.95',
      is_locked: 1,
      tag: 'UniCrypt',
      locked_detail: [{ amount: '1000', end_time: String((NOW + 400 * DAY_MS) / 1000) }],
    }],
  },
  [ADDR.other]: { ...baseSecurity, is_honeypot: '1', sell_tax: '1' },
};

const goplus = routeFetch([
  ['gopluslabs', (url) => {
    const result: Record<string, object> = {};
    for (const addr of (url.searchParams.get('contract_addresses') ?? '').split(',')) {
      const entry = GOPLUS_INDEX[addr];
      if (entry) result[addr] = entry;
    }
    return jsonResponse({ code: 1, message: 'OK', result });
  }],
]);

const established: TokenCandidate = {
  address: ADDR.token,
  chain: 'ethereum',
  symbol: 'ALP',
  name: 'Alpha',
  pairAddress: ADDR.pair,
  market: market({
    liquidityUsd: 250_000,
    volume24hUsd: 100_000,
    priceChange24hPct: 12,
    pairCreatedAt: NOW - 30 * DAY_MS,
    buys24h: 120,
    sells24h: 100,
    websites: 1,
    socials: 2,
    top10HolderPct: 30,
  }),
};

const honeypot: TokenCandidate = {
  address: ADDR.other,
  chain: 'ethereum',
  symbol: 'BET',
  name: null,
  pairAddress: null,
  market: market({ liquidityUsd: 400_000, volume24hUsd: 90_000, websites: 1 }),
};

const unknown: TokenCandidate = {
  address: ADDR.owner,
  chain: 'polygon',
  symbol: 'ZED',
  name: null,
  pairAddress: null,
  market: market({ liquidityUsd: 10_000 }),
};

function build(fetchFn: FetchFn = goplus) {
  return createPipeline(testConfig(), {
    fetchFn,
    connectionFactory: () => ({ getAccountInfo: vi.fn(async () => null) }),
    now: () => NOW,
  });
}

describe('TokenRiskPipeline', () => {
  it('should produce one report per distinct token, in input order', async () => {
    const { pipeline } = build();

    const reports = await pipeline.run([
      established,
      honeypot,
      { ...established, address: ADDR.token.toUpperCase().replace('0X', '0x') },
      unknown,
    ]);

    expect(reports.map((r) => `${r.chain}:${r.address}`)).toEqual([
      `ethereum:${ADDR.token}`,
      `ethereum:${ADDR.other}`,
      `polygon:${ADDR.owner}`,
    ]);
  });

  it('should rate a verified token with locked, deep liquidity Safe', async () => {
    const { pipeline } = build();

    const [report] = await pipeline.run([established]);

    expect(report.verification.sourceName).toBe('GoPlus Security');
    expect(report.verification.buyTaxPercent).toBe(2);
    expect(report.liquidityLock).toMatchObject({
      isLocked: true,
      lockedPercentage: 95,
      lockDurationDays: 400,
      platformName: 'Unicrypt',
      evidence: 'lp-holders',
    });
    expect(report.lockScore).toBe(100);
    expect(report.fakeToken.detectionMethod).toBe('all_checks_passed');
    expect(report.risk.compositeScore).toBe(0.093);
    expect(report.risk.riskLevel).toBe('Safe');
    expect(report.risk.confidence).toBe(1);
    expect(report.analyzedAt).toBe(NOW);
  });

  it('should rate a honeypot ScamLikely whatever else it has going for it', async () => {
    const { pipeline } = build();

    const [report] = await pipeline.run([honeypot]);

    expect(report.verification.isHoneypot).toBe(true);
    expect(report.risk.overallScore).toBe(1);
    expect(report.risk.riskLevel).toBe('ScamLikely');
  });

  it('should rate a token no source confirms ScamLikely', async () => {
    const { pipeline } = build();

    const [report] = await pipeline.run([unknown]);

    expect(report.verification.dataAvailable).toBe(false);
    expect(report.verification.errorMessage).toBe('GoPlus Security: not indexed');
    expect(report.liquidityLock.isLocked).toBe(false);
    expect(report.risk.compositeScore).toBe(0.655);
    expect(report.risk.penalties).toEqual({ noLock: 0.25, unconfirmed: 0.2 });
    expect(report.risk.riskLevel).toBe('ScamLikely');
  });

  it('should still report every token when all sources are down', async () => {
    const { pipeline } = build(routeFetch([]));

    const reports = await pipeline.run([established, unknown]);

    expect(reports).toHaveLength(2);
    expect(reports.every((r) => !r.verification.dataAvailable)).toBe(true);
    expect(reports[0].verification.errorMessage).toMatch(/^GoPlus Security: NETWORK: /);
  });

  it('should return nothing for an empty feed', async () => {
    const fetchFn = routeFetch([]);
    const { pipeline } = build(fetchFn);

    expect(await pipeline.run([])).toEqual([]);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should summarize reports by level and chain', async () => {
    const { pipeline, events } = build();
    const scored = vi.fn();
    events.on('token:scored', scored);

    const summary = summarizeReports(await pipeline.run([established, honeypot, unknown]));

    expect(summary).toEqual({
      total: 3,
      byLevel: { Safe: 1, Moderate: 0, Medium: 0, High: 0, ScamLikely: 2 },
      byChain: { ethereum: 2, polygon: 1 },
    });
    expect(scored).toHaveBeenCalledTimes(3);
  });
});
