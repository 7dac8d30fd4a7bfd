import { ResultCache } from '../../src/data/result-cache.js';
import { VerifierEmitter } from '../../src/events/verifier-emitter.js';
import { GoPlusSource } from '../../src/sources/goplus-source.js';
import { ExplorerSource } from '../../src/sources/explorer-source.js';
import { HoneypotSource } from '../../src/sources/honeypot-source.js';
import { SolanaSource } from '../../src/sources/solana-source.js';
import type { AccountInfoReader } from '../../src/sources/solana-source.js';
import { BatchVerifier } from '../../src/verification/batch-verifier.js';
import type { FetchFn } from '../../src/sources/http-source.js';
import type { SourceOutcome } from '../../src/types.js';
import { testLimiter, testLimits } from './fixtures.js';

export const ETHERSCAN_URL = 'https://etherscan.test/api';
export const TOKEN_LIST_URL = 'https://tokens.test/strict';

export interface VerifierHarnessOptions {
  fetchFn: FetchFn;
  batchSize?: number;
  rpc?: AccountInfoReader;
  maxRetries?: number;
}

/** A BatchVerifier over real source clients, talking to an in-process fetch. */
export function buildVerifier(opts: VerifierHarnessOptions) {
  const limits = testLimits({ maxRetries: opts.maxRetries ?? 0 });
  const limiter = testLimiter(limits);
  const deps = { limiter, fetchFn: opts.fetchFn };
  const rpc: AccountInfoReader = opts.rpc ?? {
    getAccountInfo: async () => {
      throw new Error('rpc offline');
    },
  };

  const events = new VerifierEmitter();
  const cache = new ResultCache<SourceOutcome>({ ttlSeconds: 3600 });
  const verifier = new BatchVerifier({
    goplus: new GoPlusSource(limits, deps),
    explorers: [
      new ExplorerSource('etherscan', { chain: 'ethereum', baseUrl: ETHERSCAN_URL, apiKey: 'test-key' }, limits, deps),
    ],
    honeypot: new HoneypotSource(limits, deps),
    solana: new SolanaSource(limits, deps, {
      rpcUrls: ['https://rpc.test'],
      tokenListUrl: TOKEN_LIST_URL,
      tokenListTtlSeconds: 60,
      connectionFactory: () => rpc,
    }),
    cache,
    batchSize: opts.batchSize ?? 25,
    events,
  });
  return { verifier, events, cache, limiter };
}
