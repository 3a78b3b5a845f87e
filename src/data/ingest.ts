import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { safeFloat } from '../utils/helpers.js';
import type { Candle, CreationInfo, HolderStats, Transaction, TxType } from '../types.js';

// Upstream APIs send amounts as numbers or numeric strings
const looseNumber = z.union([z.number(), z.string()]).nullish().transform((v) => safeFloat(v));

const txTypeSchema = z.enum(['buy', 'sell']);

// ─── Internal shape ──────────────────────────────────────────────────

export const transactionSchema = z.object({
  txHash: z.string().min(1),
  wallet: z.string().min(1),
  timestamp: z.number().finite().nonnegative(),
  txType: txTypeSchema,
  tokenAmount: z.number().finite().catch(0),
  volumeUsd: z.number().finite().catch(0),
});

// ─── Moralis swaps ───────────────────────────────────────────────────

const moralisTokenLeg = z.object({
  address: z.string().nullish(),
  amount: looseNumber,
  usdAmount: looseNumber,
}).passthrough();

export const moralisSwapSchema = z.object({
  transactionHash: z.string().min(1),
  blockTimestamp: z.string().min(1),
  walletAddress: z.string().min(1),
  transactionType: txTypeSchema,
  bought: moralisTokenLeg.nullish(),
  sold: moralisTokenLeg.nullish(),
  totalValueUsd: looseNumber,
}).passthrough();

export function normalizeMoralisSwap(raw: unknown): Transaction | null {
  const parsed = moralisSwapSchema.safeParse(raw);
  if (!parsed.success) return null;
  const swap = parsed.data;

  const ms = Date.parse(swap.blockTimestamp);
  if (Number.isNaN(ms)) return null;

  // A buy receives the token on the "bought" leg
  const received = swap.transactionType === 'buy' ? swap.bought : swap.sold;
  return {
    txHash: swap.transactionHash,
    wallet: swap.walletAddress,
    timestamp: Math.floor(ms / 1000),
    txType: swap.transactionType,
    tokenAmount: Math.abs(received?.amount ?? 0),
    volumeUsd: Math.abs(swap.totalValueUsd || received?.usdAmount || 0),
  };
}

// ─── Birdeye token txs ───────────────────────────────────────────────

const birdeyeLeg = z.object({
  ui_amount: looseNumber,
}).passthrough();

export const birdeyeTxSchema = z.object({
  tx_hash: z.string().min(1),
  block_unix_time: z.number().finite(),
  owner: z.string().min(1),
  tx_type: z.string().nullish(),
  side: z.string().nullish(),
  to: birdeyeLeg.nullish(),
  volume_usd: looseNumber,
}).passthrough();

export function normalizeBirdeyeTx(raw: unknown): Transaction | null {
  const parsed = birdeyeTxSchema.safeParse(raw);
  if (!parsed.success) return null;
  const tx = parsed.data;

  const side = txTypeSchema.safeParse(tx.tx_type ?? tx.side);
  if (!side.success) return null;
  const txType: TxType = side.data;

  return {
    txHash: tx.tx_hash,
    wallet: tx.owner,
    timestamp: tx.block_unix_time,
    txType,
    tokenAmount: Math.abs(tx.to?.ui_amount ?? 0),
    volumeUsd: Math.abs(tx.volume_usd),
  };
}

// ─── Batch normalization ─────────────────────────────────────────────

export interface NormalizedBatch {
  transactions: Transaction[];
  skipped: number;
}

/**
 * Applies a record normalizer, drops records it rejects, and returns the
 * survivors ascending by timestamp (stable for equal timestamps).
 */
export function normalizeTransactions(
  records: readonly unknown[],
  normalize: (raw: unknown) => Transaction | null,
  label = 'ingest',
): NormalizedBatch {
  const transactions: Transaction[] = [];
  let skipped = 0;
  for (const raw of records) {
    const tx = normalize(raw);
    if (tx) transactions.push(tx);
    else skipped++;
  }
  if (skipped > 0) {
    logger.debug(`[${label}] Skipped ${skipped}/${records.length} malformed records`);
  }
  const ordered = transactions
    .map((tx, i) => ({ tx, i }))
    .sort((a, b) => a.tx.timestamp - b.tx.timestamp || a.i - b.i)
    .map(({ tx }) => tx);
  return { transactions: ordered, skipped };
}

/** Re-checks records handed over by any feed implementation. */
export function sanitizeTransactions(records: readonly unknown[]): NormalizedBatch {
  return normalizeTransactions(
    records,
    (raw) => {
      const parsed = transactionSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    },
    'sanitize',
  );
}

// ─── Candles, holders, creation info ─────────────────────────────────

export const birdeyeCandleSchema = z.object({
  unix_time: z.number().finite(),
  o: looseNumber,
  h: looseNumber,
  l: looseNumber,
  c: looseNumber,
  v_usd: looseNumber,
}).passthrough();

export function normalizeCandle(raw: unknown): Candle | null {
  const parsed = birdeyeCandleSchema.safeParse(raw);
  if (!parsed.success) return null;
  const c = parsed.data;
  return { unixTime: c.unix_time, open: c.o, high: c.h, low: c.l, close: c.c, volumeUsd: c.v_usd };
}

const nullableNumber = z.union([z.number(), z.string()]).nullish().transform((v) => {
  if (v === null || v === undefined) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
});

export const moralisHolderSchema = z.object({
  totalHolders: looseNumber,
  holderSupply: z.object({
    top10: z.object({ supplyPercent: nullableNumber }).passthrough().nullish(),
  }).passthrough().nullish(),
  holderChange: z.object({
    '24h': z.object({ change: nullableNumber, changePercent: nullableNumber }).passthrough().nullish(),
  }).passthrough().nullish(),
}).passthrough();

export function normalizeHolderStats(raw: unknown): HolderStats | null {
  const parsed = moralisHolderSchema.safeParse(raw);
  if (!parsed.success) return null;
  const data = parsed.data;
  return {
    totalHolders: data.totalHolders,
    top10ConcentrationPct: data.holderSupply?.top10?.supplyPercent ?? null,
    holderChange24hPct: data.holderChange?.['24h']?.changePercent ?? null,
  };
}

export const birdeyeCreationSchema = z.object({
  blockUnixTime: z.number().finite().positive(),
  blockHumanTime: z.string().nullish(),
  txHash: z.string().nullish(),
}).passthrough();

export function normalizeCreationInfo(raw: unknown): CreationInfo | null {
  const parsed = birdeyeCreationSchema.safeParse(raw);
  if (!parsed.success) return null;
  const info = parsed.data;
  return {
    createdAt: info.blockHumanTime || new Date(info.blockUnixTime * 1000).toISOString(),
    creationTx: info.txHash ?? '',
    blockUnixTime: info.blockUnixTime,
  };
}
