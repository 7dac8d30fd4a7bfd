import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { BSCSCAN_API, ETHERSCAN_API, JUPITER_STRICT_LIST } from './constants.js';
import { ConfigError } from './utils/errors.js';
import type {
  LockRegistryEntry,
  ScoringWeights,
  SourceLimits,
  SourceName,
  VerifierConfig,
} from './types.js';

dotenvConfig();

// ─── File schema (every key optional; defaults applied below) ────────

const adaptiveSchema = z.object({
  floor_ms: z.number().nonnegative().optional(),
  step_ms: z.number().positive().optional(),
  max_ms: z.number().positive().optional(),
  decay: z.number().positive().max(1).optional(),
});

const sourceSchema = z.object({
  enabled: z.boolean().optional(),
  requests_per_minute: z.number().optional(),
  min_interval_ms: z.number().optional(),
  concurrency: z.number().int().optional(),
  timeout_ms: z.number().optional(),
  max_retries: z.number().int().optional(),
  retry_base_delay_ms: z.number().optional(),
  adaptive: adaptiveSchema.optional(),
});

const explorerSchema = z.object({
  chain: z.string().optional(),
  base_url: z.string().optional(),
});

const registrySchema = z.object({
  chain: z.string(),
  token: z.string(),
  percentage: z.number().min(0).max(100),
  days: z.number().nonnegative(),
  platform: z.string(),
  lock_contract: z.string().optional(),
});

const fileSchema = z.object({
  verification: z.object({ batch_size: z.number().int().optional() }).optional(),
  sources: z.record(z.string(), sourceSchema).optional(),
  explorers: z.record(z.string(), explorerSchema).optional(),
  solana: z.object({
    rpc_urls: z.array(z.string()).optional(),
    token_list_url: z.string().optional(),
  }).optional(),
  cache: z.object({
    verification_ttl_seconds: z.number().optional(),
    lock_ttl_seconds: z.number().optional(),
    token_list_ttl_seconds: z.number().optional(),
    max_entries: z.number().int().optional(),
  }).optional(),
  liquidity_lock: z.object({
    min_lock_percentage: z.number().optional(),
    min_lock_days: z.number().optional(),
    safe_lock_days: z.number().optional(),
    expiry_warning_days: z.number().optional(),
    trusted_platforms: z.array(z.string()).optional(),
    registry: z.array(registrySchema).optional(),
  }).optional(),
  risk: z.object({
    weights: z.record(z.string(), z.number()).optional(),
    thresholds: z.record(z.string(), z.number()).optional(),
    penalties: z.record(z.string(), z.number()).optional(),
    liquidity_gates: z.record(z.string(), z.number()).optional(),
    high_tax_percent: z.number().optional(),
  }).optional(),
  feed: z.object({ path: z.string().optional() }).optional(),
});

type ConfigFile = z.infer<typeof fileSchema>;

function loadYaml(filePath: string): ConfigFile {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return {}; // no file: built-in defaults
  }
  const parsed = fileSchema.safeParse(parseYaml(content) ?? {});
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${filePath}: ${i.path.join('.')} ${i.message}`));
  }
  return parsed.data;
}

function env(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val === 'true' || val === '1';
}

function envNum(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined) return fallback;
  const n = Number(val);
  return isNaN(n) ? fallback : n;
}

function envList(key: string, fallback: string[]): string[] {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val.split(',').map((s) => s.trim()).filter(Boolean);
}

// ─── Defaults ────────────────────────────────────────────────────────

const DEFAULT_LIMITS: Record<SourceName, Omit<SourceLimits, 'adaptive'>> = {
  goplus: { enabled: true, requestsPerMinute: 30, minIntervalMs: 0, concurrency: 8, timeoutMs: 30_000, maxRetries: 3, retryBaseDelayMs: 1000 },
  etherscan: { enabled: true, requestsPerMinute: 12, minIntervalMs: 5000, concurrency: 1, timeoutMs: 10_000, maxRetries: 3, retryBaseDelayMs: 1000 },
  bscscan: { enabled: true, requestsPerMinute: 12, minIntervalMs: 5000, concurrency: 1, timeoutMs: 10_000, maxRetries: 3, retryBaseDelayMs: 1000 },
  honeypot: { enabled: true, requestsPerMinute: 30, minIntervalMs: 0, concurrency: 4, timeoutMs: 10_000, maxRetries: 2, retryBaseDelayMs: 1000 },
  solana: { enabled: true, requestsPerMinute: 60, minIntervalMs: 100, concurrency: 10, timeoutMs: 8000, maxRetries: 2, retryBaseDelayMs: 500 },
};

const DEFAULT_WEIGHTS: ScoringWeights = {
  contractVerification: 0.15,
  ownership: 0.20,
  liquidityLock: 0.20,
  holderDistribution: 0.13,
  tradingPatterns: 0.10,
  codeAudit: 0.12,
  marketSignals: 0.10,
};

function sourceLimits(name: SourceName, raw: z.infer<typeof sourceSchema> | undefined, enabledOverride?: boolean): SourceLimits {
  const d = DEFAULT_LIMITS[name];
  const adaptive = raw?.adaptive ?? {};
  return {
    enabled: enabledOverride ?? raw?.enabled ?? d.enabled,
    requestsPerMinute: raw?.requests_per_minute ?? d.requestsPerMinute,
    minIntervalMs: raw?.min_interval_ms ?? d.minIntervalMs,
    concurrency: raw?.concurrency ?? d.concurrency,
    timeoutMs: raw?.timeout_ms ?? d.timeoutMs,
    maxRetries: raw?.max_retries ?? d.maxRetries,
    retryBaseDelayMs: raw?.retry_base_delay_ms ?? d.retryBaseDelayMs,
    adaptive: {
      floorMs: adaptive.floor_ms ?? 0,
      stepMs: adaptive.step_ms ?? 2000,
      maxMs: adaptive.max_ms ?? 15_000,
      decay: adaptive.decay ?? 0.95,
    },
  };
}

export function loadConfig(yamlPath = resolve(process.cwd(), 'config', 'default.yaml')): VerifierConfig {
  const yaml = loadYaml(yamlPath);

  const rawSources = yaml.sources ?? {};
  const explorerFallback = process.env.EXPLORER_FALLBACK === undefined ? undefined : envBool('EXPLORER_FALLBACK', true);
  const honeypotCheck = process.env.HONEYPOT_CHECK === undefined ? undefined : envBool('HONEYPOT_CHECK', true);
  const sources: Record<SourceName, SourceLimits> = {
    goplus: sourceLimits('goplus', rawSources.goplus),
    etherscan: sourceLimits('etherscan', rawSources.etherscan, explorerFallback),
    bscscan: sourceLimits('bscscan', rawSources.bscscan, explorerFallback),
    honeypot: sourceLimits('honeypot', rawSources.honeypot, honeypotCheck),
    solana: sourceLimits('solana', rawSources.solana),
  };
  sources.goplus.concurrency = envNum('GOPLUS_CONCURRENCY', sources.goplus.concurrency);

  const explorers = yaml.explorers ?? {};
  const cache = yaml.cache ?? {};
  const lock = yaml.liquidity_lock ?? {};
  const risk = yaml.risk ?? {};
  const w = risk.weights ?? {};
  const t = risk.thresholds ?? {};
  const p = risk.penalties ?? {};
  const g = risk.liquidity_gates ?? {};

  const registry = (lock.registry ?? []).map(
    (r): LockRegistryEntry => ({
      chain: r.chain.toLowerCase(),
      tokenAddress: r.token.toLowerCase(),
      lockedPercentage: r.percentage,
      lockDurationDays: r.days,
      platformName: r.platform,
      lockContractAddress: r.lock_contract?.toLowerCase() ?? null,
    }),
  );

  const config: VerifierConfig = {
    batchSize: envNum('GOPLUS_BATCH_SIZE', yaml.verification?.batch_size ?? 25),
    sources,
    explorers: {
      etherscan: {
        chain: explorers.etherscan?.chain ?? 'ethereum',
        baseUrl: explorers.etherscan?.base_url ?? ETHERSCAN_API,
        apiKey: env('ETHERSCAN_API_KEY'),
      },
      bscscan: {
        chain: explorers.bscscan?.chain ?? 'bsc',
        baseUrl: explorers.bscscan?.base_url ?? BSCSCAN_API,
        apiKey: env('BSCSCAN_API_KEY'),
      },
    },
    solana: {
      rpcUrls: envList('SOLANA_RPC_URLS', yaml.solana?.rpc_urls ?? ['https://api.mainnet-beta.solana.com']),
      tokenListUrl: yaml.solana?.token_list_url ?? JUPITER_STRICT_LIST,
    },
    cache: {
      verificationTtlSeconds: envNum('VERIFICATION_CACHE_TTL', cache.verification_ttl_seconds ?? 3600),
      lockTtlSeconds: cache.lock_ttl_seconds ?? 3600,
      tokenListTtlSeconds: cache.token_list_ttl_seconds ?? 7200,
      maxEntries: cache.max_entries ?? 10_000,
    },
    lock: {
      minLockPercentage: lock.min_lock_percentage ?? 80,
      minLockDays: lock.min_lock_days ?? 30,
      safeLockDays: lock.safe_lock_days ?? 180,
      expiryWarningDays: lock.expiry_warning_days ?? 7,
      trustedPlatforms: lock.trusted_platforms ?? ['Team Finance', 'Unicrypt', 'PinkSale', 'LP Burned'],
      registry,
    },
    scoring: {
      weights: {
        contractVerification: w.contract_verification ?? DEFAULT_WEIGHTS.contractVerification,
        ownership: w.ownership ?? DEFAULT_WEIGHTS.ownership,
        liquidityLock: w.liquidity_lock ?? DEFAULT_WEIGHTS.liquidityLock,
        holderDistribution: w.holder_distribution ?? DEFAULT_WEIGHTS.holderDistribution,
        tradingPatterns: w.trading_patterns ?? DEFAULT_WEIGHTS.tradingPatterns,
        codeAudit: w.code_audit ?? DEFAULT_WEIGHTS.codeAudit,
        marketSignals: w.market_signals ?? DEFAULT_WEIGHTS.marketSignals,
      },
      thresholds: {
        moderate: t.moderate ?? 0.25,
        medium: t.medium ?? 0.40,
        high: t.high ?? 0.60,
        scamLikely: t.scam_likely ?? 0.80,
      },
      penalties: {
        ageUnder24h: p.age_under_24h ?? 0.25,
        ageUnder7d: p.age_under_7d ?? 0.08,
        noLock: p.no_lock ?? 0.25,
        weakLock: p.weak_lock ?? 0.15,
        partialLock: p.partial_lock ?? 0.05,
        unconfirmed: p.unconfirmed ?? 0.20,
        fakeToken: p.fake_token ?? 0.30,
      },
      liquidityGates: {
        safeMinUsd: g.safe_min_usd ?? 100_000,
        mediumMinUsd: g.medium_min_usd ?? 50_000,
        highMinUsd: g.high_min_usd ?? 25_000,
      },
      highTaxPercent: risk.high_tax_percent ?? 10,
    },
    feedPath: env('DISCOVERY_FEED_PATH', yaml.feed?.path ?? 'data/candidates.json'),
  };

  return config;
}

export function validateConfig(config: VerifierConfig): string[] {
  const errors: string[] = [];

  if (config.batchSize < 1) errors.push('batch size must be at least 1');

  for (const [name, limits] of Object.entries(config.sources)) {
    if (limits.requestsPerMinute < 1) errors.push(`sources.${name}.requests_per_minute must be >= 1`);
    if (limits.concurrency < 1) errors.push(`sources.${name}.concurrency must be >= 1`);
    if (limits.timeoutMs <= 0) errors.push(`sources.${name}.timeout_ms must be > 0`);
    if (limits.maxRetries < 0) errors.push(`sources.${name}.max_retries must be >= 0`);
  }

  if (config.sources.etherscan.enabled && !config.explorers.etherscan.apiKey) {
    errors.push('ETHERSCAN_API_KEY is required while the etherscan explorer is enabled');
  }
  if (config.sources.bscscan.enabled && !config.explorers.bscscan.apiKey) {
    errors.push('BSCSCAN_API_KEY is required while the bscscan explorer is enabled');
  }
  if (config.sources.solana.enabled && config.solana.rpcUrls.length === 0) {
    errors.push('SOLANA_RPC_URLS needs at least one endpoint');
  }

  const weightSum = Object.values(config.scoring.weights).reduce((a, b) => a + b, 0);
  if (Math.abs(weightSum - 1) > 1e-6) {
    errors.push(`risk weights must sum to 1 (got ${weightSum.toFixed(3)})`);
  }

  const { moderate, medium, high, scamLikely } = config.scoring.thresholds;
  if (!(0 < moderate && moderate < medium && medium < high && high < scamLikely && scamLikely <= 1)) {
    errors.push('risk thresholds must be ascending within (0, 1]');
  }

  const { safeMinUsd, mediumMinUsd, highMinUsd } = config.scoring.liquidityGates;
  if (!(safeMinUsd >= mediumMinUsd && mediumMinUsd >= highMinUsd)) {
    errors.push('liquidity gates must not increase with risk level');
  }

  if (config.cache.verificationTtlSeconds <= 0 || config.cache.lockTtlSeconds <= 0) {
    errors.push('cache TTLs must be > 0');
  }

  return errors;
}

/** Fails fast at startup instead of degrading per call. */
export function assertValidConfig(config: VerifierConfig): VerifierConfig {
  const errors = validateConfig(config);
  if (errors.length > 0) throw new ConfigError(errors);
  return config;
}
