// GoPlus token security (EVM). Batch endpoint, up to ~25 addresses per call.
export const GOPLUS_TOKEN_SECURITY_API = 'https://api.gopluslabs.io/api/v1/token_security';

// Honeypot.is simulation oracle
export const HONEYPOT_API = 'https://api.honeypot.is/v2/IsHoneypot';

// Jupiter strict token list (Solana)
export const JUPITER_STRICT_LIST = 'https://token.jup.ag/strict';

export const ETHERSCAN_API = 'https://api.etherscan.io/api';
export const BSCSCAN_API = 'https://api.bscscan.com/api';

// Chains covered by the primary batch source, by its chain id
export const GOPLUS_CHAIN_IDS: ReadonlyMap<string, string> = new Map([
  ['ethereum', '1'],
  ['bsc', '56'],
  ['polygon', '137'],
  ['arbitrum', '42161'],
  ['avalanche', '43114'],
  ['fantom', '250'],
  ['optimism', '10'],
  ['base', '8453'],
  ['linea', '59144'],
  ['cronos', '25'],
]);

// Chains the honeypot simulator covers
export const HONEYPOT_CHAIN_IDS: ReadonlyMap<string, string> = new Map([
  ['ethereum', '1'],
  ['bsc', '56'],
  ['base', '8453'],
]);

// Networks without a contract-verification model; listed tokens are treated as verified
export const TRUSTED_NETWORKS: ReadonlyMap<string, string> = new Map([
  ['ton', 'TON Network'],
  ['sonic', 'Sonic Network'],
]);

export const SOURCE_LABELS = {
  goplus: 'GoPlus Security',
  etherscan: 'Etherscan',
  bscscan: 'BscScan',
  honeypot: 'Honeypot.is',
  solana: 'Solana',
} as const;

// Liquidity locker contracts (lowercase) → platform name
export const LOCK_PLATFORM_CONTRACTS: ReadonlyMap<string, string> = new Map([
  ['0xe2fe530c047f2d85298b07d9333c05737f1435fb', 'Team Finance'],
  ['0x2d045410f002a95efcee67759a92518fa3fce677', 'DxSale'],
  ['0x663a5c229c09b049e36dcc11a9b0d4a8eb9db214', 'Unicrypt'],
  ['0x7ee058420e5937496f5a2096f04caa7721cf70cc', 'PinkSale'],
  ['0x7536592bb74b5d62eb82e8b93b17eed4eed9a85c', 'Mudra'],
]);

// LP tokens sent here are gone for good
export const BURN_ADDRESSES: ReadonlySet<string> = new Set([
  '0x0000000000000000000000000000000000000000',
  '0x000000000000000000000000000000000000dead',
  '0xdead000000000000000042069420694206942069',
]);
export const BURN_PLATFORM = 'LP Burned';

// A burned LP position never unlocks; reported with this duration
export const PERMANENT_LOCK_DAYS = 36_500;

export const EVM_ADDRESS_RE = /^0x[a-fA-F0-9]{40}$/;
export const SOLANA_ADDRESS_RE = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

export const MINUTE_MS = 60_000;
export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;
