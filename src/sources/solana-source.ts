import { Connection, PublicKey } from '@solana/web3.js';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { SOURCE_LABELS } from '../constants.js';
import { ResultCache } from '../data/result-cache.js';
import { HttpSource, nonEmpty, withTimeout } from './http-source.js';
import type { SourceDeps } from './http-source.js';
import type { SourceLimits, SourceOutcome } from '../types.js';

const tokenListSchema = z.array(
  z.object({
    address: z.string(),
    symbol: z.string().nullish(),
    name: z.string().nullish(),
  }).passthrough(),
);

interface ListedToken {
  symbol?: string;
  name?: string;
}

type TokenList = Map<string, ListedToken>;

/** The one RPC call this source needs; a Connection satisfies it. */
export type AccountInfoReader = Pick<Connection, 'getAccountInfo'>;

export interface SolanaSourceOptions {
  rpcUrls: string[];
  tokenListUrl: string;
  tokenListTtlSeconds: number;
  connectionFactory?: (url: string) => AccountInfoReader;
}

/**
 * Solana has no contract-verification model. A mint on the strict token list
 * counts as verified; otherwise an account-info probe only confirms existence.
 */
export class SolanaSource extends HttpSource {
  readonly name = 'solana' as const;
  readonly label = SOURCE_LABELS.solana;

  private readonly listCache: ResultCache<TokenList>;
  private listLoad: Promise<TokenList | undefined> | null = null;
  private readonly connections = new Map<string, AccountInfoReader>();
  private readonly connectionFactory: (url: string) => AccountInfoReader;

  constructor(limits: SourceLimits, deps: SourceDeps, private readonly opts: SolanaSourceOptions) {
    super(limits, deps);
    this.listCache = new ResultCache<TokenList>({ ttlSeconds: opts.tokenListTtlSeconds });
    this.connectionFactory = opts.connectionFactory ?? ((url) => new Connection(url, 'confirmed'));
  }

  supports(chain: string): boolean {
    return chain === 'solana';
  }

  async check(mint: string, signal?: AbortSignal): Promise<SourceOutcome> {
    let pubkey: PublicKey;
    try {
      pubkey = new PublicKey(mint);
    } catch {
      return this.notFound('invalid mint address');
    }

    const list = await this.tokenList(signal);
    const listed = list?.get(pubkey.toBase58());
    if (listed) {
      return {
        status: 'found',
        source: `${this.label} (token list)`,
        findings: { isVerified: true, tokenSymbol: listed.symbol, tokenName: listed.name },
        rawPayload: { listed: true, ...listed },
      };
    }

    return this.probeAccount(pubkey, signal);
  }

  /** Loads the strict list once per TTL; concurrent callers share one request. */
  private async tokenList(signal?: AbortSignal): Promise<TokenList | undefined> {
    const cached = this.listCache.get('strict');
    if (cached) return cached;

    if (!this.listLoad) {
      this.listLoad = this.getJson(this.opts.tokenListUrl, tokenListSchema, signal)
        .then((tokens) => {
          const list: TokenList = new Map();
          for (const t of tokens) {
            list.set(t.address, { symbol: nonEmpty(t.symbol), name: nonEmpty(t.name) });
          }
          this.listCache.put('strict', list);
          logger.info(`[solana] token list loaded (${list.size} mints)`);
          return list;
        })
        .catch((err: unknown) => {
          logger.warn(`[solana] token list unavailable, falling back to RPC: ${err instanceof Error ? err.message : String(err)}`);
          return undefined;
        })
        .finally(() => {
          this.listLoad = null;
        });
    }
    return this.listLoad;
  }

  private connection(url: string): AccountInfoReader {
    let conn = this.connections.get(url);
    if (!conn) {
      conn = this.connectionFactory(url);
      this.connections.set(url, conn);
    }
    return conn;
  }

  /** First endpoint that answers wins. */
  private async probeAccount(pubkey: PublicKey, signal?: AbortSignal): Promise<SourceOutcome> {
    let lastError: unknown = new Error('no RPC endpoints configured');

    for (const url of this.opts.rpcUrls) {
      try {
        const info = await this.deps.limiter.schedule(
          this.name,
          () => withTimeout(this.connection(url).getAccountInfo(pubkey), this.limits.timeoutMs, this.name),
          signal,
        );
        this.deps.limiter.reportSuccess(this.name);
        if (!info) return this.notFound('no account for mint');
        return {
          status: 'found',
          source: `${this.label} (RPC)`,
          findings: { isVerified: false },
          rawPayload: { owner: info.owner.toBase58(), lamports: info.lamports, executable: info.executable },
        };
      } catch (err) {
        if (signal?.aborted) return this.unavailable(err, pubkey.toBase58());
        lastError = err;
        logger.debug(`[solana] getAccountInfo failed on ${url}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    return this.unavailable(lastError, pubkey.toBase58());
  }
}
