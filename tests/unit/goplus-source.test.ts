import { describe, it, expect } from 'vitest';
import { GoPlusSource, toFindings } from '../../src/sources/goplus-source.js';
import { ADDR, jsonResponse, routeFetch, testLimiter, testLimits } from '../helpers/fixtures.js';

const security = {
  is_honeypot: '0',
  is_open_source: '1',
  buy_tax: '0.02',
  sell_tax: '0.05',
  owner_address: ADDR.zero,
  creator_address: ADDR.owner,
  can_take_back_ownership: '0',
  is_mintable: '0',
  is_blacklisted: '1',
  is_proxy: '0',
  token_name: 'Alpha',
  token_symbol: 'ALP',
  holder_count: '1532',
};

function source(fetchFn: ReturnType<typeof routeFetch>, limits = testLimits()) {
  const limiter = testLimiter(limits);
  return { goplus: new GoPlusSource(limits, { limiter, fetchFn }), limiter };
}

describe('GoPlusSource', () => {
  it('should decode found addresses and mark missing ones not found', async () => {
    const fetchFn = routeFetch([
      ['token_security/1', () => jsonResponse({ code: 1, message: 'OK', result: { [ADDR.token]: security } })],
    ]);
    const { goplus } = source(fetchFn);

    const outcomes = await goplus.checkBatch('ethereum', [ADDR.token, ADDR.other.toUpperCase().replace('0X', '0x')]);

    const found = outcomes.get(ADDR.token);
    expect(found?.status).toBe('found');
    if (found?.status !== 'found') return;
    expect(found.source).toBe('GoPlus Security');
    expect(found.findings.isVerified).toBe(true);
    expect(found.findings.isHoneypot).toBe(false);
    expect(found.findings.buyTaxPercent).toBeCloseTo(2);
    expect(found.findings.sellTaxPercent).toBeCloseTo(5);
    expect(found.findings.ownerAddress).toBe(ADDR.zero);
    expect(found.findings.hasBlacklistFunction).toBe(true);
    expect(found.findings.holderCount).toBe(1532);

    expect(outcomes.get(ADDR.other)).toEqual({ status: 'not_found', source: 'GoPlus Security', reason: 'not indexed' });
  });

  it('should send one request per chunk with the chain id and lowercase addresses', async () => {
    const fetchFn = routeFetch([['gopluslabs', () => jsonResponse({ code: 1, result: {} })]]);
    const { goplus } = source(fetchFn);

    await goplus.checkBatch('bsc', [ADDR.token, ADDR.other]);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe(
      `https://api.gopluslabs.io/api/v1/token_security/56?contract_addresses=${ADDR.token},${ADDR.other}`,
    );
  });

  it('should mark the whole chunk unavailable when the API reports an error code', async () => {
    const fetchFn = routeFetch([['gopluslabs', () => jsonResponse({ code: 2, message: 'bad params' })]]);
    const { goplus } = source(fetchFn);

    const outcomes = await goplus.checkBatch('ethereum', [ADDR.token, ADDR.other]);

    for (const addr of [ADDR.token, ADDR.other]) {
      expect(outcomes.get(addr)).toEqual({ status: 'unavailable', source: 'GoPlus Security', reason: 'API error (code 2)' });
    }
  });

  it('should retry server errors and then report the chunk unavailable', async () => {
    const fetchFn = routeFetch([['gopluslabs', () => jsonResponse({}, 500)]]);
    const { goplus } = source(fetchFn);

    const outcomes = await goplus.checkBatch('ethereum', [ADDR.token]);

    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(outcomes.get(ADDR.token)).toEqual({ status: 'unavailable', source: 'GoPlus Security', reason: 'HTTP: HTTP 500' });
  });

  it('should back off and retry after HTTP 429', async () => {
    let calls = 0;
    const fetchFn = routeFetch([['gopluslabs', () => {
      calls++;
      return calls === 1 ? jsonResponse({}, 429) : jsonResponse({ code: 1, result: { [ADDR.token]: security } });
    }]]);
    const { goplus, limiter } = source(fetchFn);

    const outcomes = await goplus.checkBatch('ethereum', [ADDR.token]);

    expect(outcomes.get(ADDR.token)?.status).toBe('found');
    expect(limiter.stats('goplus').throttled).toBe(1);
  });

  it('should treat the in-band throttle code as rate limiting', async () => {
    const fetchFn = routeFetch([['gopluslabs', () => jsonResponse({ code: 4029, message: 'too many requests' })]]);
    const { goplus, limiter } = source(fetchFn, testLimits({ maxRetries: 0 }));

    const outcomes = await goplus.checkBatch('ethereum', [ADDR.token]);

    expect(outcomes.get(ADDR.token)).toEqual({
      status: 'unavailable',
      source: 'GoPlus Security',
      reason: 'RATE_LIMITED: rate limit reached',
    });
    expect(limiter.stats('goplus').throttled).toBe(1);
  });

  it('should not retry a malformed payload', async () => {
    const fetchFn = routeFetch([['gopluslabs', () => jsonResponse({ result: 'nope' })]]);
    const { goplus } = source(fetchFn);

    const outcomes = await goplus.checkBatch('ethereum', [ADDR.token]);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const outcome = outcomes.get(ADDR.token);
    expect(outcome?.status).toBe('unavailable');
    if (outcome?.status === 'unavailable') expect(outcome.reason.startsWith('MALFORMED')).toBe(true);
  });

  it('should report network failures as unavailable', async () => {
    const fetchFn = routeFetch([]);
    const { goplus } = source(fetchFn, testLimits({ maxRetries: 0 }));

    const outcomes = await goplus.checkBatch('ethereum', [ADDR.token]);

    const outcome = outcomes.get(ADDR.token);
    expect(outcome?.status).toBe('unavailable');
    if (outcome?.status === 'unavailable') expect(outcome.reason.startsWith('NETWORK')).toBe(true);
  });

  it('should not call out for unsupported chains', async () => {
    const fetchFn = routeFetch([]);
    const { goplus } = source(fetchFn);

    const outcomes = await goplus.checkBatch('solana', ['So11111111111111111111111111111111111111112']);

    expect(fetchFn).not.toHaveBeenCalled();
    expect(outcomes.get('so11111111111111111111111111111111111111112')?.status).toBe('not_found');
  });

  it('should not take object built-ins for chain names', async () => {
    const fetchFn = routeFetch([]);
    const { goplus } = source(fetchFn);

    expect(goplus.supports('constructor')).toBe(false);
    expect(goplus.supports('toString')).toBe(false);
    const outcomes = await goplus.checkBatch('constructor', [ADDR.token]);

    expect(fetchFn).not.toHaveBeenCalled();
    expect(outcomes.get(ADDR.token.toLowerCase())?.status).toBe('not_found');
  });
});

describe('toFindings', () => {
  it('should fall back to the creator when no owner is reported', () => {
    const findings = toFindings({ ...security, owner_address: '' });
    expect(findings.ownerAddress).toBe(ADDR.owner);
  });

  it('should read taxes that are already percentages', () => {
    const findings = toFindings({ ...security, buy_tax: '12', sell_tax: 1 });
    expect(findings.buyTaxPercent).toBe(12);
    expect(findings.sellTaxPercent).toBe(100);
  });

  it('should decode LP holders with locker end times', () => {
    const findings = toFindings({
      ...security,
      lp_holders: [
        {
          address: ADDR.unicrypt.toUpperCase().replace('0X', '0x'),
          percent: '0.85',
          is_locked: 1,
          tag: 'UniCrypt',
          locked_detail: [{ amount: '100', end_time: '2027-01-01T00:00:00Z', opt_time: '2025-01-01T00:00:00Z' }],
        },
        { address: ADDR.dead, percent: '0.1', is_locked: 0, tag: '' },
      ],
    });

    expect(findings.lpHolders).toEqual([
      {
        address: ADDR.unicrypt,
        percent: 0.85,
        isLocked: true,
        tag: 'UniCrypt',
        unlockTimestamps: [Date.parse('2027-01-01T00:00:00Z')],
      },
      { address: ADDR.dead, percent: 0.1, isLocked: false, tag: null, unlockTimestamps: [] },
    ]);
  });
});
