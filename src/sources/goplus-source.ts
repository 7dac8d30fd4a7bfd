import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { GOPLUS_CHAIN_IDS, GOPLUS_TOKEN_SECURITY_API, SOURCE_LABELS } from '../constants.js';
import { HttpSource, nonEmpty, parseFlag, parseNumber, parseTaxPercent } from './http-source.js';
import type { LpHolder, SourceFindings, SourceOutcome } from '../types.js';

const flag = z.union([z.string(), z.number()]).nullish();

const lockedDetailSchema = z.object({
  amount: z.union([z.string(), z.number()]).nullish(),
  end_time: z.union([z.string(), z.number()]).nullish(),
  opt_time: z.union([z.string(), z.number()]).nullish(),
}).passthrough();

const lpHolderSchema = z.object({
  address: z.string(),
  percent: z.union([z.string(), z.number()]).nullish(),
  is_locked: flag,
  tag: z.string().nullish(),
  locked_detail: z.array(lockedDetailSchema).nullish(),
}).passthrough();

const tokenSecuritySchema = z.object({
  is_honeypot: flag,
  is_open_source: flag,
  buy_tax: flag,
  sell_tax: flag,
  transfer_tax: flag,
  owner_address: z.string().nullish(),
  creator_address: z.string().nullish(),
  can_take_back_ownership: flag,
  is_mintable: flag,
  is_blacklisted: flag,
  is_proxy: flag,
  token_name: z.string().nullish(),
  token_symbol: z.string().nullish(),
  holder_count: flag,
  lp_holders: z.array(lpHolderSchema).nullish(),
}).passthrough();

const responseSchema = z.object({
  code: z.number(),
  message: z.string().nullish(),
  result: z.record(z.string(), tokenSecuritySchema).nullish(),
});

export type GoPlusTokenSecurity = z.infer<typeof tokenSecuritySchema>;

// GoPlus signals throttling in-band with this code
const GOPLUS_RATE_LIMIT_CODE = 4029;

/** Locker end times come as ISO strings or unix seconds. */
function parseTimestamp(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const n = Number(value);
  if (Number.isFinite(n)) return n < 1e12 ? n * 1000 : n;
  const parsed = Date.parse(String(value));
  return Number.isNaN(parsed) ? undefined : parsed;
}

function toLpHolder(raw: z.infer<typeof lpHolderSchema>): LpHolder {
  const unlockTimestamps: number[] = [];
  for (const detail of raw.locked_detail ?? []) {
    const end = parseTimestamp(detail.end_time);
    if (end !== undefined) unlockTimestamps.push(end);
  }
  return {
    address: raw.address.toLowerCase(),
    percent: parseNumber(raw.percent) ?? 0,
    isLocked: parseFlag(raw.is_locked) === true,
    tag: nonEmpty(raw.tag) ?? null,
    unlockTimestamps,
  };
}

export function toFindings(data: GoPlusTokenSecurity): SourceFindings {
  const findings: SourceFindings = {
    isVerified: parseFlag(data.is_open_source),
    isHoneypot: parseFlag(data.is_honeypot),
    buyTaxPercent: parseTaxPercent(data.buy_tax),
    sellTaxPercent: parseTaxPercent(data.sell_tax),
    transferTaxPercent: parseTaxPercent(data.transfer_tax),
    ownerAddress: nonEmpty(data.owner_address) ?? nonEmpty(data.creator_address),
    canReclaimOwnership: parseFlag(data.can_take_back_ownership),
    hasMintFunction: parseFlag(data.is_mintable),
    hasBlacklistFunction: parseFlag(data.is_blacklisted),
    isProxyContract: parseFlag(data.is_proxy),
    tokenName: nonEmpty(data.token_name),
    tokenSymbol: nonEmpty(data.token_symbol),
    holderCount: parseNumber(data.holder_count),
    lpHolders: data.lp_holders ? data.lp_holders.map(toLpHolder) : undefined,
  };
  return findings;
}

/**
 * GoPlus token security: the primary, batch-capable source for EVM chains.
 * One HTTP round trip per chunk; the result is keyed by lowercase address.
 *
 * Free tier: ~30 req/min. Unknown tokens are simply missing from `result`.
 */
export class GoPlusSource extends HttpSource {
  readonly name = 'goplus' as const;
  readonly label = SOURCE_LABELS.goplus;

  supports(chain: string): boolean {
    return GOPLUS_CHAIN_IDS.has(chain);
  }

  protected override detectThrottle(body: unknown): boolean {
    return typeof body === 'object' && body !== null && 'code' in body && body.code === GOPLUS_RATE_LIMIT_CODE;
  }

  /** Returns one outcome per requested address, keyed by lowercase address. */
  async checkBatch(chain: string, addresses: string[], signal?: AbortSignal): Promise<Map<string, SourceOutcome>> {
    const outcomes = new Map<string, SourceOutcome>();
    const keys = addresses.map((a) => a.toLowerCase());
    const chainId = GOPLUS_CHAIN_IDS.get(chain);

    if (!chainId) {
      for (const key of keys) outcomes.set(key, this.notFound(`chain ${chain} not supported`));
      return outcomes;
    }

    const url = `${GOPLUS_TOKEN_SECURITY_API}/${chainId}?contract_addresses=${keys.join(',')}`;

    let data: z.infer<typeof responseSchema>;
    try {
      data = await this.getJson(url, responseSchema, signal);
    } catch (err) {
      const outcome = this.unavailable(err, `${chain} batch of ${keys.length}`);
      for (const key of keys) outcomes.set(key, outcome);
      return outcomes;
    }

    if (data.code !== 1 || !data.result) {
      logger.warn(`[goplus] ${chain} batch rejected: code=${data.code} ${data.message ?? ''}`.trim());
      for (const key of keys) {
        outcomes.set(key, { status: 'unavailable', source: this.label, reason: `API error (code ${data.code})` });
      }
      return outcomes;
    }

    const result = new Map<string, GoPlusTokenSecurity>();
    for (const [addr, entry] of Object.entries(data.result)) result.set(addr.toLowerCase(), entry);

    let found = 0;
    for (const key of keys) {
      const entry = result.get(key);
      if (!entry) {
        outcomes.set(key, this.notFound('not indexed'));
        continue;
      }
      found++;
      outcomes.set(key, { status: 'found', source: this.label, findings: toFindings(entry), rawPayload: entry });
    }

    logger.debug(`[goplus] ${chain} batch: ${found}/${keys.length} found`);
    return outcomes;
  }
}
