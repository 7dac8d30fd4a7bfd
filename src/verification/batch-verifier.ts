import { logger } from '../utils/logger.js';
import { chunk, normalizeAddress, normalizeChain, targetKey } from '../utils/helpers.js';
import { TRUSTED_NETWORKS } from '../constants.js';
import { cacheKey } from '../data/result-cache.js';
import type { ResultCache } from '../data/result-cache.js';
import { VerifierEmitter } from '../events/verifier-emitter.js';
import { mergeOutcomes, SOURCE_PRIORITY } from './merge.js';
import type { RankedOutcome } from './merge.js';
import type { GoPlusSource } from '../sources/goplus-source.js';
import type { ExplorerSource } from '../sources/explorer-source.js';
import type { HoneypotSource } from '../sources/honeypot-source.js';
import type { SolanaSource } from '../sources/solana-source.js';
import type { SourceOutcome, TokenTarget, VerificationResult } from '../types.js';

export interface BatchVerifierDeps {
  goplus: GoPlusSource;
  explorers?: ExplorerSource[];
  honeypot?: HoneypotSource;
  solana?: SolanaSource;
  cache: ResultCache<SourceOutcome>;
  batchSize: number;
  events?: VerifierEmitter;
  now?: () => number;
}

/**
 * Verifies (address, chain) pairs against every source that covers the chain.
 *
 * Primary chains go out in fixed-size GoPlus chunks, all dispatched at once
 * and paced by the rate limiter's per-source semaphore. Addresses the primary
 * could not confirm, and chains it does not cover, walk the fallback chain.
 * The result holds exactly one record per requested target.
 */
export class BatchVerifier {
  private readonly events: VerifierEmitter;
  private readonly now: () => number;

  constructor(private readonly deps: BatchVerifierDeps) {
    this.events = deps.events ?? new VerifierEmitter();
    this.now = deps.now ?? (() => Date.now());
  }

  /** Keyed by `chain:address` (see targetKey), in input order. */
  async verify(targets: TokenTarget[], signal?: AbortSignal): Promise<Map<string, VerificationResult>> {
    const started = this.now();
    const normalized = new Map<string, TokenTarget>();
    for (const t of targets) {
      const target = { chain: normalizeChain(t.chain), address: normalizeAddress(t.address) };
      normalized.set(targetKey(target.chain, target.address), target);
    }

    const outcomes = new Map<string, RankedOutcome[]>();
    for (const key of normalized.keys()) outcomes.set(key, []);
    const record = (target: TokenTarget, priority: number, outcome: SourceOutcome) => {
      outcomes.get(targetKey(target.chain, target.address))?.push({ priority, outcome });
      if (outcome.status === 'unavailable') {
        this.events.emit('source:unavailable', {
          source: outcome.source,
          chain: target.chain,
          address: target.address,
          reason: outcome.reason,
        });
      }
    };

    const byChain = new Map<string, TokenTarget[]>();
    for (const target of normalized.values()) {
      const group = byChain.get(target.chain) ?? [];
      group.push(target);
      byChain.set(target.chain, group);
    }

    await this.runPrimary(byChain, record, signal);

    const fallbackTargets = [...normalized.values()].filter((t) => {
      const got = outcomes.get(targetKey(t.chain, t.address)) ?? [];
      return !got.some((r) => r.outcome.status === 'found');
    });
    await this.runFallbacks(fallbackTargets, record, signal);

    signal?.throwIfAborted();

    const checkedAt = this.now();
    const results = new Map<string, VerificationResult>();
    let verified = 0;
    let unavailable = 0;
    for (const [key, target] of normalized) {
      const result = mergeOutcomes(target, outcomes.get(key) ?? [], checkedAt);
      if (result.dataAvailable) verified++;
      else unavailable++;
      results.set(key, result);
    }

    const durationMs = this.now() - started;
    this.events.emit('batch:done', { targets: results.size, verified, unavailable, durationMs });
    logger.info(`[batch] verified ${results.size} targets (${verified} confirmed, ${unavailable} without data) in ${durationMs}ms`);
    return results;
  }

  private async runPrimary(
    byChain: Map<string, TokenTarget[]>,
    record: (target: TokenTarget, priority: number, outcome: SourceOutcome) => void,
    signal?: AbortSignal,
  ): Promise<void> {
    const { goplus, cache } = this.deps;
    if (!goplus.enabled) return;

    const tasks: Array<{ chain: string; targets: TokenTarget[] }> = [];
    for (const [chain, group] of byChain) {
      if (!goplus.supports(chain)) continue;

      const uncached: TokenTarget[] = [];
      for (const target of group) {
        const hit = cache.get(cacheKey(goplus.name, chain, target.address));
        if (hit) record(target, SOURCE_PRIORITY.primary, hit);
        else uncached.push(target);
      }
      for (const part of chunk(uncached, this.deps.batchSize)) tasks.push({ chain, targets: part });
    }
    if (tasks.length === 0) return;

    logger.debug(`[batch] dispatching ${tasks.length} primary chunk(s)`);
    const settled = await Promise.allSettled(
      tasks.map((task) => goplus.checkBatch(task.chain, task.targets.map((t) => t.address), signal)),
    );

    settled.forEach((res, i) => {
      const task = tasks[i];
      if (res.status === 'rejected') {
        const reason = res.reason instanceof Error ? res.reason.message : String(res.reason);
        logger.warn(`[batch] primary chunk failed on ${task.chain}: ${reason}`);
        for (const target of task.targets) {
          record(target, SOURCE_PRIORITY.primary, { status: 'unavailable', source: goplus.label, reason });
        }
        this.events.emit('chunk:done', { source: goplus.label, chain: task.chain, size: task.targets.length, ok: false });
        return;
      }

      let ok = false;
      for (const target of task.targets) {
        const outcome: SourceOutcome = res.value.get(target.address.toLowerCase())
          ?? { status: 'not_found', source: goplus.label, reason: 'missing from response' };
        if (outcome.status !== 'unavailable') {
          ok = true;
          cache.put(cacheKey(goplus.name, task.chain, target.address), outcome);
        }
        record(target, SOURCE_PRIORITY.primary, outcome);
      }
      this.events.emit('chunk:done', { source: goplus.label, chain: task.chain, size: task.targets.length, ok });
    });
  }

  private async runFallbacks(
    targets: TokenTarget[],
    record: (target: TokenTarget, priority: number, outcome: SourceOutcome) => void,
    signal?: AbortSignal,
  ): Promise<void> {
    if (targets.length === 0) return;
    logger.debug(`[batch] ${targets.length} target(s) on the fallback chain`);

    const settled = await Promise.allSettled(
      targets.map((target) => this.fallbackChain(target, record, signal)),
    );
    settled.forEach((res, i) => {
      if (res.status === 'rejected') {
        const target = targets[i];
        const reason = res.reason instanceof Error ? res.reason.message : String(res.reason);
        logger.warn(`[batch] fallback failed for ${target.chain}:${target.address}: ${reason}`);
      }
    });
  }

  /**
   * Chain heuristics first (trusted networks, Solana), then the explorer and
   * honeypot oracle for the chain. A found heuristic stops the walk; explorer
   * and oracle run side by side.
   */
  private async fallbackChain(
    target: TokenTarget,
    record: (target: TokenTarget, priority: number, outcome: SourceOutcome) => void,
    signal?: AbortSignal,
  ): Promise<void> {
    const trusted = TRUSTED_NETWORKS.get(target.chain);
    if (trusted !== undefined) {
      record(target, SOURCE_PRIORITY.trustedNetwork, {
        status: 'found',
        source: trusted,
        findings: { isVerified: true },
        rawPayload: { trustedNetwork: target.chain },
      });
      return;
    }

    const { solana, honeypot } = this.deps;
    if (solana?.enabled && solana.supports(target.chain)) {
      const outcome = await this.cached(solana.name, target, () => solana.check(target.address, signal));
      record(target, SOURCE_PRIORITY.solana, outcome);
      if (outcome.status === 'found') return;
    }

    const calls: Array<Promise<void>> = [];
    const explorer = this.deps.explorers?.find((e) => e.enabled && e.supports(target.chain));
    if (explorer) {
      calls.push(
        this.cached(explorer.name, target, () => explorer.check(target.address, signal))
          .then((outcome) => record(target, SOURCE_PRIORITY.explorer, outcome)),
      );
    }
    if (honeypot?.enabled && honeypot.supports(target.chain)) {
      calls.push(
        this.cached(honeypot.name, target, () => honeypot.check(target.chain, target.address, signal))
          .then((outcome) => record(target, SOURCE_PRIORITY.honeypot, outcome)),
      );
    }
    const settled = await Promise.allSettled(calls);
    const failed = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (failed) throw failed.reason;
  }

  /** Only definitive answers are cached; `unavailable` is retried next run. */
  private async cached(
    source: string,
    target: TokenTarget,
    call: () => Promise<SourceOutcome>,
  ): Promise<SourceOutcome> {
    const key = cacheKey(source, target.chain, target.address);
    const hit = this.deps.cache.get(key);
    if (hit) return hit;
    const outcome = await call();
    if (outcome.status !== 'unavailable') this.deps.cache.put(key, outcome);
    return outcome;
  }
}
