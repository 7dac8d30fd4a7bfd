import { readFileSync } from 'fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { normalizeAddress, normalizeChain, shortenAddress } from '../utils/helpers.js';
import { ConfigError } from '../utils/errors.js';
import { EVM_ADDRESS_RE, GOPLUS_CHAIN_IDS, SOLANA_ADDRESS_RE } from '../constants.js';
import type { FakeTokenResult } from '../types.js';

const knownTokensSchema = z.object({
  tokens: z.array(z.object({
    symbol: z.string().min(1),
    chains: z.record(z.string()),
  })),
  blacklist: z.array(z.string()),
  suspiciousPatterns: z.object({
    high: z.array(z.string()),
    medium: z.array(z.string()),
    low: z.array(z.string()),
  }),
});

export type KnownTokens = z.infer<typeof knownTokensSchema>;

const DEFAULT_KNOWN_TOKENS = new URL('../../data/known-tokens.json', import.meta.url);

export function loadKnownTokens(path: string | URL = DEFAULT_KNOWN_TOKENS): KnownTokens {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const parsed = knownTokensSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `known tokens ${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data;
}

/** Normalized edit-distance similarity in 0..1. Strings under 3 chars never match. */
export function similarity(a: string, b: string): number {
  if (a.length < 3 || b.length < 3) return 0;
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      row[j] = a[i - 1] === b[j - 1]
        ? prev[j - 1]
        : Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + 1);
    }
    prev = row;
  }
  return 1 - prev[b.length] / Math.max(a.length, b.length);
}

const PASS = (method: string): FakeTokenResult => ({ isFake: false, confidence: 0, reason: '', detectionMethod: method });

/**
 * Flags tokens that impersonate well-known assets.
 *
 * Each check yields a confidence. Any check that calls the token fake wins
 * outright (highest confidence); otherwise the checks above 0.3 are averaged
 * and must clear 0.7.
 */
export class FakeTokenDetector {
  private readonly bySymbol = new Map<string, Map<string, string>>();
  private readonly genuine = new Set<string>();
  private readonly blacklist: Set<string>;

  constructor(private readonly table: KnownTokens = loadKnownTokens()) {
    for (const token of table.tokens) {
      const chains = new Map<string, string>();
      for (const [chain, address] of Object.entries(token.chains)) {
        chains.set(normalizeChain(chain), normalizeAddress(address));
        this.genuine.add(`${normalizeChain(chain)}:${normalizeAddress(address)}`);
      }
      this.bySymbol.set(token.symbol.toUpperCase(), chains);
    }
    this.blacklist = new Set(table.blacklist.map((s) => s.toUpperCase()));
  }

  detect(symbol: string, address: string, chain: string): FakeTokenResult {
    const sym = symbol.trim().toUpperCase();
    const net = normalizeChain(chain);
    const addr = normalizeAddress(address);

    if (this.genuine.has(`${net}:${addr}`)) {
      return { isFake: false, confidence: 1, reason: 'Matches a known token contract', detectionMethod: 'known_token' };
    }

    const checks = [
      this.knownTokenMismatch(sym, net),
      this.blacklisted(sym),
      this.suspiciousPatterns(sym),
      this.addressFormat(addr, net),
      this.similarNames(sym, net),
    ];

    const fakes = checks.filter((c) => c.isFake);
    if (fakes.length > 0) {
      const best = fakes.reduce((a, b) => (b.confidence > a.confidence ? b : a));
      logger.debug(`[fake] ${symbol} ${net}:${shortenAddress(addr)} flagged by ${best.detectionMethod}`);
      return { ...best, confidence: Math.min(best.confidence, 1) };
    }

    const suspicious = checks.filter((c) => c.confidence > 0.3);
    if (suspicious.length > 0) {
      const avg = suspicious.reduce((s, c) => s + c.confidence, 0) / suspicious.length;
      return {
        isFake: avg > 0.7,
        confidence: avg,
        reason: `Suspicious signals: ${suspicious.length} check(s)`,
        detectionMethod: 'suspicious_patterns',
      };
    }

    return { isFake: false, confidence: 1, reason: 'Passed all checks', detectionMethod: 'all_checks_passed' };
  }

  /** Known symbol at an address that is not the real contract. */
  private knownTokenMismatch(sym: string, chain: string): FakeTokenResult {
    const chains = this.bySymbol.get(sym);
    if (!chains) return PASS('known_token_mismatch');

    const real = chains.get(chain);
    if (real !== undefined) {
      return {
        isFake: true,
        confidence: 0.95,
        reason: `${sym} on ${chain} lives at ${real}`,
        detectionMethod: 'known_token_mismatch',
        originalToken: sym,
        originalChain: chain,
        originalAddress: real,
      };
    }

    // Bridged copies exist; on a chain the table does not list this is only a hint
    const [home] = chains;
    const homeChain = home?.[0];
    const homeAddress = home?.[1];
    return {
      isFake: false,
      confidence: 0.4,
      reason: `${sym} is native to ${homeChain ?? 'another chain'}`,
      detectionMethod: 'known_token_mismatch',
      originalToken: sym,
      originalChain: homeChain,
      originalAddress: homeAddress,
    };
  }

  private blacklisted(sym: string): FakeTokenResult {
    if (!this.blacklist.has(sym)) return PASS('blacklisted_token');
    return { isFake: true, confidence: 0.9, reason: `${sym} is blacklisted`, detectionMethod: 'blacklisted_token' };
  }

  private suspiciousPatterns(sym: string): FakeTokenResult {
    const { high, medium, low } = this.table.suspiciousPatterns;
    const count = (patterns: string[]) => patterns.filter((p) => sym.includes(p.toUpperCase())).length;
    const h = count(high);
    const m = count(medium);
    const total = h + m + count(low);

    let confidence = 0;
    if (h >= 2) confidence = 0.85;
    else if (h === 1 && m >= 1) confidence = 0.7;
    else if (total >= 3) confidence = 0.6;
    else if (total >= 2) confidence = 0.4;
    else if (total === 1) confidence = 0.2;

    if (confidence === 0) return PASS('suspicious_patterns');
    return {
      isFake: confidence > 0.6,
      confidence,
      reason: `Suspicious name patterns: ${total} match(es)`,
      detectionMethod: 'suspicious_patterns',
    };
  }

  private addressFormat(address: string, chain: string): FakeTokenResult {
    let pattern: RegExp | null = null;
    if (GOPLUS_CHAIN_IDS.has(chain)) pattern = EVM_ADDRESS_RE;
    else if (chain === 'solana') pattern = SOLANA_ADDRESS_RE;
    if (pattern === null || pattern.test(address)) return PASS('address_format');
    return { isFake: true, confidence: 0.8, reason: `Malformed address for ${chain}`, detectionMethod: 'address_format' };
  }

  private similarNames(sym: string, chain: string): FakeTokenResult {
    for (const [known, chains] of this.bySymbol) {
      if (known === sym || similarity(sym, known) <= 0.8) continue;
      const [home] = chains;
      const sameChain = chains.get(chain);
      return {
        isFake: true,
        confidence: 0.75,
        reason: `Name resembles ${known}`,
        detectionMethod: 'similar_names',
        originalToken: known,
        originalChain: sameChain !== undefined ? chain : home?.[0],
        originalAddress: sameChain ?? home?.[1],
      };
    }
    return PASS('similar_names');
  }
}
