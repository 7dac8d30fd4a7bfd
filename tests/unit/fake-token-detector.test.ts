import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FakeTokenDetector, loadKnownTokens, similarity } from '../../src/analysis/fake-token-detector.js';
import { ConfigError } from '../../src/utils/errors.js';
import { ADDR } from '../helpers/fixtures.js';

const WETH = '0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2';

describe('similarity', () => {
  it('should score one edit in four characters as 0.75', () => {
    expect(similarity('USDT', 'USDC')).toBe(0.75);
  });

  it('should never match strings shorter than three characters', () => {
    expect(similarity('OP', 'OP')).toBe(0);
  });
});

describe('loadKnownTokens', () => {
  it('should load the bundled table', () => {
    const table = loadKnownTokens();
    expect(table.tokens.find((t) => t.symbol === 'WETH')?.chains.ethereum).toBe(WETH);
    expect(table.blacklist).toContain('SCAM');
  });

  it('should reject a malformed table', () => {
    const dir = mkdtempSync(join(tmpdir(), 'known-tokens-'));
    const path = join(dir, 'known.json');
    writeFileSync(path, JSON.stringify({ tokens: [{ symbol: 'X' }], blacklist: [] }));

    expect(() => loadKnownTokens(path)).toThrow(ConfigError);
  });
});

describe('FakeTokenDetector', () => {
  const detector = new FakeTokenDetector();

  it('should pass the genuine contract of a known token', () => {
    expect(detector.detect('WETH', WETH, 'ethereum')).toEqual({
      isFake: false,
      confidence: 1,
      reason: 'Matches a known token contract',
      detectionMethod: 'known_token',
    });
  });

  it('should flag a known symbol at the wrong address', () => {
    expect(detector.detect('weth', ADDR.token, 'ethereum')).toEqual({
      isFake: true,
      confidence: 0.95,
      reason: `WETH on ethereum lives at ${WETH}`,
      detectionMethod: 'known_token_mismatch',
      originalToken: 'WETH',
      originalChain: 'ethereum',
      originalAddress: WETH,
    });
  });

  it('should only hint when a known symbol appears on a chain it is not listed for', () => {
    const result = detector.detect('WSOL', ADDR.token, 'ethereum');
    expect(result.isFake).toBe(false);
    expect(result.confidence).toBe(0.4);
    expect(result.detectionMethod).toBe('suspicious_patterns');
  });

  it('should flag blacklisted symbols', () => {
    const result = detector.detect('SCAM', ADDR.token, 'ethereum');
    expect(result).toMatchObject({ isFake: true, confidence: 0.9, detectionMethod: 'blacklisted_token' });
  });

  it('should not mistake object built-ins for listed chains', () => {
    expect(detector.detect('WETH', ADDR.token, 'constructor')).toEqual({
      isFake: false,
      confidence: 0.4,
      reason: 'Suspicious signals: 1 check(s)',
      detectionMethod: 'suspicious_patterns',
    });
    expect(detector.detect('ALPHA', ADDR.token, 'toString').detectionMethod).toBe('all_checks_passed');
  });

  it('should flag names built from several high-risk patterns', () => {
    const result = detector.detect('FAKEHONEY', ADDR.token, 'bsc');
    expect(result).toMatchObject({ isFake: true, confidence: 0.85, detectionMethod: 'suspicious_patterns' });
  });

  it('should keep milder pattern matches below the fake threshold', () => {
    expect(detector.detect('SAFEMOONELON', ADDR.token, 'ethereum')).toEqual({
      isFake: false,
      confidence: 0.6,
      reason: 'Suspicious signals: 1 check(s)',
      detectionMethod: 'suspicious_patterns',
    });
  });

  it('should flag an address that does not fit the chain', () => {
    const result = detector.detect('ALPHA', 'not-an-address', 'ethereum');
    expect(result).toMatchObject({ isFake: true, confidence: 0.8, detectionMethod: 'address_format' });
  });

  it('should flag names one edit away from a known token', () => {
    const custom = new FakeTokenDetector({
      tokens: [{ symbol: 'ORBITAL', chains: { ethereum: ADDR.other } }],
      blacklist: [],
      suspiciousPatterns: { high: [], medium: [], low: [] },
    });

    expect(custom.detect('ORBITAI', ADDR.token, 'ethereum')).toEqual({
      isFake: true,
      confidence: 0.75,
      reason: 'Name resembles ORBITAL',
      detectionMethod: 'similar_names',
      originalToken: 'ORBITAL',
      originalChain: 'ethereum',
      originalAddress: ADDR.other,
    });
  });

  it('should pass an unremarkable token', () => {
    expect(detector.detect('ALPHA', ADDR.token, 'ethereum')).toEqual({
      isFake: false,
      confidence: 1,
      reason: 'Passed all checks',
      detectionMethod: 'all_checks_passed',
    });
  });
});
