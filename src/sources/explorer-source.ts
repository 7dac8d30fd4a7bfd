import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { SOURCE_LABELS } from '../constants.js';
import { HttpSource, nonEmpty } from './http-source.js';
import type { SourceDeps } from './http-source.js';
import type { ExplorerConfig, SourceFindings, SourceLimits, SourceOutcome } from '../types.js';

const sourceCodeEntrySchema = z.object({
  SourceCode: z.string().nullish(),
  ContractName: z.string().nullish(),
  Proxy: z.string().nullish(),
  Implementation: z.string().nullish(),
}).passthrough();

const getSourceCodeSchema = z.object({
  status: z.string(),
  message: z.string().nullish(),
  result: z.union([z.array(sourceCodeEntrySchema), z.string()]),
});

const contractCreationSchema = z.object({
  status: z.string(),
  result: z.union([
    z.array(z.object({ contractAddress: z.string(), contractCreator: z.string() }).passthrough()),
    z.string(),
    z.null(),
  ]),
});

type ExplorerName = 'etherscan' | 'bscscan';

/**
 * Etherscan-family explorer: one address per call, ~1 request every 5s.
 * Verified means the explorer holds published source code.
 */
export class ExplorerSource extends HttpSource {
  readonly label: string;

  constructor(
    readonly name: ExplorerName,
    private readonly explorer: ExplorerConfig,
    limits: SourceLimits,
    deps: SourceDeps,
  ) {
    super(limits, deps);
    this.label = SOURCE_LABELS[name];
  }

  get chain(): string {
    return this.explorer.chain;
  }

  supports(chain: string): boolean {
    return chain === this.explorer.chain;
  }

  protected override detectThrottle(body: unknown): boolean {
    return typeof body === 'object' && body !== null && 'result' in body
      && typeof body.result === 'string' && /rate limit/i.test(body.result);
  }

  private url(params: Record<string, string>): string {
    const query = new URLSearchParams({ ...params, apikey: this.explorer.apiKey });
    return `${this.explorer.baseUrl}?${query.toString()}`;
  }

  async check(address: string, signal?: AbortSignal): Promise<SourceOutcome> {
    const subject = `${this.explorer.chain}:${address}`;
    let data: z.infer<typeof getSourceCodeSchema>;
    try {
      data = await this.getJson(
        this.url({ module: 'contract', action: 'getsourcecode', address }),
        getSourceCodeSchema,
        signal,
      );
    } catch (err) {
      return this.unavailable(err, subject);
    }

    if (data.status !== '1' || typeof data.result === 'string') {
      const detail = typeof data.result === 'string' ? data.result : (data.message ?? 'NOTOK');
      if (/invalid address/i.test(detail)) return this.notFound(detail);
      return { status: 'unavailable', source: this.label, reason: `API error: ${detail}` };
    }

    const entry = data.result[0];
    if (!entry) return this.notFound('no contract at address');

    const findings: SourceFindings = {
      isVerified: nonEmpty(entry.SourceCode) !== undefined,
      isProxyContract: entry.Proxy === '1',
    };

    const creator = await this.fetchCreator(address, signal);
    if (creator) findings.ownerAddress = creator;

    logger.debug(`[${this.name}] ${subject} verified=${String(findings.isVerified)}`);
    return { status: 'found', source: this.label, findings, rawPayload: entry };
  }

  /** Best effort; a missing creator does not fail the verification. */
  private async fetchCreator(address: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const data = await this.getJson(
        this.url({ module: 'contract', action: 'getcontractcreation', contractaddresses: address }),
        contractCreationSchema,
        signal,
      );
      if (data.status !== '1' || !Array.isArray(data.result)) return undefined;
      return nonEmpty(data.result[0]?.contractCreator)?.toLowerCase();
    } catch (err) {
      logger.debug(`[${this.name}] creator lookup failed for ${address}: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
  }
}
