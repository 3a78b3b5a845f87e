export const ENGINE_VERSION = '1.0.0';

// Upstream APIs
export const BIRDEYE_API_BASE = 'https://public-api.birdeye.so';
export const MORALIS_SOLANA_BASE = 'https://solana-gateway.moralis.io';
export const MORALIS_EVM_BASE = 'https://deep-index.moralis.io/api/v2.2';

// Birdeye pages are fixed at 100 items; Moralis swaps cap at 25 per page
export const BIRDEYE_PAGE_SIZE = 100;
export const MORALIS_MAX_PAGE_SIZE = 25;

export const SECONDS_PER_DAY = 86_400;

// Number of early transactions examined per run
export const FIRST_N_TRANSACTIONS = 300;

export const MAX_SAMPLE_TXS = 5;

// Chain name → Birdeye x-chain header
export const BIRDEYE_CHAINS: Record<string, string> = {
  solana: 'solana',
  ethereum: 'ethereum',
  base: 'base',
  bsc: 'bsc',
  shibarium: 'shibarium',
};

// Chain name → Moralis EVM chain param (Solana has its own gateway, Shibarium is unsupported)
export const MORALIS_EVM_CHAINS: Record<string, string> = {
  ethereum: 'eth',
  base: 'base',
  bsc: 'bsc',
};
