import type {
  SourceFindings,
  SourceOutcome,
  TokenTarget,
  VerificationResult,
} from '../types.js';

/** Lower runs first: earlier sources win field conflicts. */
export const SOURCE_PRIORITY = {
  primary: 0,
  explorer: 1,
  honeypot: 2,
  solana: 3,
  trustedNetwork: 4,
} as const;

export interface RankedOutcome {
  priority: number;
  outcome: SourceOutcome;
}

function firstDefined<K extends keyof SourceFindings>(
  findings: SourceFindings[],
  key: K,
): SourceFindings[K] | undefined {
  for (const f of findings) {
    if (f[key] !== undefined) return f[key];
  }
  return undefined;
}

/**
 * Folds per-source outcomes into one record. Conflicts are settled by source
 * priority, field by field; nothing is voted on.
 */
export function mergeOutcomes(target: TokenTarget, ranked: RankedOutcome[], checkedAt: number): VerificationResult {
  const ordered = [...ranked].sort((a, b) => a.priority - b.priority).map((r) => r.outcome);
  const found = ordered.filter((o): o is Extract<SourceOutcome, { status: 'found' }> => o.status === 'found');
  const failures = ordered.filter((o): o is Exclude<SourceOutcome, { status: 'found' }> => o.status !== 'found');
  const findings = found.map((o) => o.findings);

  const rawPayload: Record<string, unknown> = {};
  for (const o of found) rawPayload[o.source] = o.rawPayload;

  let sourceName: string;
  if (found.length > 0) {
    sourceName = [...new Set(found.map((o) => o.source))].join('+');
  } else if (ordered.length > 0) {
    const first = ordered[0];
    sourceName = `${first.source} (${first.status === 'not_found' ? 'not found' : 'unavailable'})`;
  } else {
    sourceName = 'unsupported';
  }

  const firstFailure = failures[0];
  const errorMessage = firstFailure
    ? `${firstFailure.source}: ${firstFailure.reason}`
    : (ordered.length === 0 ? `no source covers chain ${target.chain}` : null);

  return {
    address: target.address,
    chain: target.chain,
    isVerified: firstDefined(findings, 'isVerified') ?? false,
    isHoneypot: firstDefined(findings, 'isHoneypot') ?? false,
    buyTaxPercent: firstDefined(findings, 'buyTaxPercent') ?? null,
    sellTaxPercent: firstDefined(findings, 'sellTaxPercent') ?? null,
    transferTaxPercent: firstDefined(findings, 'transferTaxPercent') ?? null,
    ownerAddress: firstDefined(findings, 'ownerAddress') ?? null,
    canReclaimOwnership: firstDefined(findings, 'canReclaimOwnership') ?? null,
    hasMintFunction: firstDefined(findings, 'hasMintFunction') ?? null,
    hasBlacklistFunction: firstDefined(findings, 'hasBlacklistFunction') ?? null,
    isProxyContract: firstDefined(findings, 'isProxyContract') ?? null,
    tokenName: firstDefined(findings, 'tokenName') ?? null,
    tokenSymbol: firstDefined(findings, 'tokenSymbol') ?? null,
    holderCount: firstDefined(findings, 'holderCount') ?? null,
    lpHolders: firstDefined(findings, 'lpHolders') ?? [],
    sourceName,
    errorMessage,
    rawPayload,
    dataAvailable: found.length > 0,
    checkedAt,
  };
}
