import { z } from 'zod';
import { HONEYPOT_API, HONEYPOT_CHAIN_IDS, SOURCE_LABELS } from '../constants.js';
import { SourceError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { HttpSource, nonEmpty, parseNumber } from './http-source.js';
import type { SourceFindings, SourceOutcome } from '../types.js';

const responseSchema = z.object({
  token: z.object({
    name: z.string().nullish(),
    symbol: z.string().nullish(),
  }).passthrough().nullish(),
  simulationSuccess: z.boolean().nullish(),
  honeypotResult: z.object({
    isHoneypot: z.boolean(),
    honeypotReason: z.string().nullish(),
  }).passthrough().nullish(),
  simulationResult: z.object({
    buyTax: z.number().nullish(),
    sellTax: z.number().nullish(),
    transferTax: z.number().nullish(),
  }).passthrough().nullish(),
}).passthrough();

/**
 * Honeypot.is buy/sell simulation. Taxes are reported in percent.
 * Covers ethereum, bsc and base.
 */
export class HoneypotSource extends HttpSource {
  readonly name = 'honeypot' as const;
  readonly label = SOURCE_LABELS.honeypot;

  supports(chain: string): boolean {
    return HONEYPOT_CHAIN_IDS.has(chain);
  }

  async check(chain: string, address: string, signal?: AbortSignal): Promise<SourceOutcome> {
    const chainId = HONEYPOT_CHAIN_IDS.get(chain);
    if (!chainId) return this.notFound(`chain ${chain} not supported`);

    const url = `${HONEYPOT_API}?address=${address}&chainID=${chainId}`;
    let data: z.infer<typeof responseSchema>;
    try {
      data = await this.getJson(url, responseSchema, signal);
    } catch (err) {
      // Unknown tokens come back as 404
      if (err instanceof SourceError && err.code === 'HTTP' && err.status === 404) {
        return this.notFound('no pair to simulate');
      }
      return this.unavailable(err, `${chain}:${address}`);
    }

    if (!data.honeypotResult) return this.notFound('simulation did not run');

    const findings: SourceFindings = {
      isHoneypot: data.honeypotResult.isHoneypot,
      buyTaxPercent: parseNumber(data.simulationResult?.buyTax),
      sellTaxPercent: parseNumber(data.simulationResult?.sellTax),
      transferTaxPercent: parseNumber(data.simulationResult?.transferTax),
      tokenName: nonEmpty(data.token?.name),
      tokenSymbol: nonEmpty(data.token?.symbol),
    };

    if (findings.isHoneypot) {
      logger.warn(`[honeypot] ${chain}:${address.slice(0, 10)}... HONEYPOT`, {
        reason: data.honeypotResult.honeypotReason ?? undefined,
      });
    }
    return { status: 'found', source: this.label, findings, rawPayload: data };
  }
}
