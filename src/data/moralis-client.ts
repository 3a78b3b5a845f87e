import { logger } from '../utils/logger.js';
import { errorMessage, isRecord, isoTimestamp, shortenAddress } from '../utils/helpers.js';
import { HttpJsonClient, buildUrl, type HttpClientOptions } from './http-client.js';
import { normalizeHolderStats, normalizeMoralisSwap, normalizeTransactions } from './ingest.js';
import { MORALIS_EVM_BASE, MORALIS_EVM_CHAINS, MORALIS_MAX_PAGE_SIZE, MORALIS_SOLANA_BASE } from '../constants.js';
import type { Chain, HolderStats, HolderStatsProvider, Transaction, TransactionFeed } from '../types.js';

export interface MoralisClientOptions extends HttpClientOptions {
  apiKey: string;
  solanaBaseUrl?: string;
  evmBaseUrl?: string;
  pageSize?: number;
}

interface SwapPage {
  records: unknown[];
  cursor: string | null;
}

function parseSwapPage(payload: unknown): SwapPage {
  if (!isRecord(payload)) return { records: [], cursor: null };
  const records = Array.isArray(payload.result) ? payload.result : [];
  const cursor = typeof payload.cursor === 'string' && payload.cursor.length > 0 ? payload.cursor : null;
  return { records, cursor };
}

/**
 * Moralis: cursor-paginated swap history for the early buy feed, and holder
 * statistics for the present-impact stage.
 */
export class MoralisClient {
  private readonly http: HttpJsonClient;
  private readonly solanaBaseUrl: string;
  private readonly evmBaseUrl: string;
  private readonly pageSize: number;

  constructor(private readonly options: MoralisClientOptions) {
    this.http = new HttpJsonClient('moralis', options);
    this.solanaBaseUrl = options.solanaBaseUrl ?? MORALIS_SOLANA_BASE;
    this.evmBaseUrl = options.evmBaseUrl ?? MORALIS_EVM_BASE;
    this.pageSize = Math.min(MORALIS_MAX_PAGE_SIZE, Math.max(1, options.pageSize ?? MORALIS_MAX_PAGE_SIZE));
  }

  private get headers(): Record<string, string> {
    return { 'X-API-Key': this.options.apiKey };
  }

  async fetchSwaps(tokenAddress: string, fromTime: number, limit: number): Promise<Transaction[]> {
    const raw: unknown[] = [];
    let cursor: string | null = null;
    let pages = 0;

    do {
      const url = buildUrl(this.solanaBaseUrl, `/token/mainnet/${tokenAddress}/swaps`, {
        fromDate: isoTimestamp(Math.max(0, fromTime)),
        order: 'ASC',
        transactionTypes: 'buy',
        limit: Math.min(this.pageSize, limit - raw.length),
        cursor: cursor ?? undefined,
      });
      let payload: unknown;
      try {
        payload = await this.http.get(url, this.headers);
      } catch (err) {
        // Keep what earlier pages returned; fail only when there is nothing
        if (raw.length === 0) throw err;
        logger.warn(`[moralis] page ${pages + 1} failed for ${shortenAddress(tokenAddress)}, keeping ${raw.length} records: ${errorMessage(err)}`);
        break;
      }
      const page = parseSwapPage(payload);
      raw.push(...page.records);
      pages++;

      // A short page is the last one even if a cursor came back
      if (page.records.length < this.pageSize) break;
      cursor = page.cursor;
    } while (cursor && raw.length < limit);

    const { transactions, skipped } = normalizeTransactions(raw, normalizeMoralisSwap, 'moralis');
    const buys = transactions.filter((tx) => tx.txType === 'buy').slice(0, limit);
    logger.info(`[moralis] Fetched ${buys.length} buys for ${shortenAddress(tokenAddress)} in ${pages} pages (${skipped} skipped)`);
    return buys;
  }

  async fetchHolderStats(chain: Chain, tokenAddress: string): Promise<HolderStats | null> {
    let url: string;
    if (chain === 'solana') {
      url = buildUrl(this.solanaBaseUrl, `/token/mainnet/holders/${tokenAddress}`);
    } else {
      const evmChain = MORALIS_EVM_CHAINS[chain];
      if (!evmChain) {
        logger.debug(`[moralis] Holder stats not supported on ${chain}`);
        return null;
      }
      url = buildUrl(this.evmBaseUrl, `/erc20/${tokenAddress}/holders`, { chain: evmChain });
    }

    const payload = await this.http.get(url, this.headers);
    if (payload === null) return null;
    return normalizeHolderStats(payload);
  }

  asTransactionFeed(): TransactionFeed {
    return { fetch: (address, fromTime, limit) => this.fetchSwaps(address, fromTime, limit) };
  }

  asHolderStatsProvider(): HolderStatsProvider {
    return { fetch: (chain, address) => this.fetchHolderStats(chain, address) };
  }
}
