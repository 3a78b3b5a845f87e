import pLimit from 'p-limit';
import { logger } from '../utils/logger.js';
import { errorMessage, isRecord, shortenAddress } from '../utils/helpers.js';
import { HttpJsonClient, buildUrl, type HttpClientOptions } from './http-client.js';
import { normalizeBirdeyeTx, normalizeCandle, normalizeCreationInfo, normalizeTransactions } from './ingest.js';
import { BIRDEYE_API_BASE, BIRDEYE_CHAINS, BIRDEYE_PAGE_SIZE } from '../constants.js';
import type {
  Candle,
  Chain,
  CreationInfo,
  CreationInfoProvider,
  OHLCVProvider,
  OhlcvGranularity,
  Transaction,
  TransactionFeed,
} from '../types.js';

export interface BirdeyeClientOptions extends HttpClientOptions {
  apiKey: string;
  baseUrl?: string;
  chain?: Chain;
  maxConcurrentPages?: number;
}

function itemsOf(payload: unknown): unknown[] {
  if (!isRecord(payload) || !isRecord(payload.data)) return [];
  const items = payload.data.items;
  return Array.isArray(items) ? items : [];
}

/**
 * Birdeye public API: creation anchor, OHLCV candles and the early buy feed.
 * Offset pages are independent, so they are fetched concurrently under a
 * p-limit cap and re-sorted after merge.
 */
export class BirdeyeClient {
  private readonly http: HttpJsonClient;
  private readonly baseUrl: string;
  private readonly chain: Chain;
  private readonly maxConcurrentPages: number;

  constructor(private readonly options: BirdeyeClientOptions) {
    this.http = new HttpJsonClient('birdeye', options);
    this.baseUrl = options.baseUrl ?? BIRDEYE_API_BASE;
    this.chain = options.chain ?? 'solana';
    this.maxConcurrentPages = options.maxConcurrentPages ?? 3;
  }

  private headers(chain: Chain = this.chain): Record<string, string> {
    return {
      'X-API-KEY': this.options.apiKey,
      'x-chain': BIRDEYE_CHAINS[chain] ?? chain,
    };
  }

  /** Creation anchor. Bundle analysis is Solana-only, so the chain header is fixed. */
  async fetchCreationInfo(tokenAddress: string): Promise<CreationInfo | null> {
    const url = buildUrl(this.baseUrl, '/defi/token_creation_info', { address: tokenAddress });
    const payload = await this.http.get(url, this.headers('solana'));
    const info = isRecord(payload) ? normalizeCreationInfo(payload.data) : null;
    if (!info) {
      logger.warn(`[birdeye] No creation info for ${shortenAddress(tokenAddress)}`);
    }
    return info;
  }

  async fetchCandles(
    tokenAddress: string,
    timeFrom: number,
    timeTo: number,
    granularity: OhlcvGranularity,
    chain: Chain = this.chain,
  ): Promise<Candle[]> {
    const url = buildUrl(this.baseUrl, '/defi/v3/ohlcv', {
      address: tokenAddress,
      type: granularity,
      currency: 'usd',
      time_from: timeFrom,
      time_to: timeTo,
      ui_amount_mode: 'raw',
    });
    const payload = await this.http.get(url, this.headers(chain));
    if (isRecord(payload) && payload.success === false) return [];
    const candles = itemsOf(payload)
      .map(normalizeCandle)
      .filter((c): c is Candle => c !== null);
    logger.debug(`[birdeye] ${candles.length} ${granularity} candles for ${shortenAddress(tokenAddress)}`);
    return candles;
  }

  async fetchTransactions(tokenAddress: string, fromTime: number, limit: number): Promise<Transaction[]> {
    const pages = Math.max(1, Math.ceil(limit / BIRDEYE_PAGE_SIZE));
    const limitPage = pLimit(this.maxConcurrentPages);

    const settled = await Promise.allSettled(
      Array.from({ length: pages }, (_, page) => limitPage(async () => {
        const url = buildUrl(this.baseUrl, '/defi/v3/token/txs', {
          address: tokenAddress,
          offset: page * BIRDEYE_PAGE_SIZE,
          limit: BIRDEYE_PAGE_SIZE,
          sort_by: 'block_unix_time',
          sort_type: 'asc',
          tx_type: 'buy',
          ui_amount_mode: 'scaled',
          after_time: fromTime,
        });
        return itemsOf(await this.http.get(url, this.headers('solana')));
      })),
    );

    // Offsets are contiguous, so only pages before the first failure are usable
    const results: unknown[][] = [];
    for (const [page, outcome] of settled.entries()) {
      if (outcome.status === 'rejected') {
        if (page === 0) throw outcome.reason;
        logger.warn(`[birdeye] page ${page + 1} failed for ${shortenAddress(tokenAddress)}, keeping ${page} pages: ${errorMessage(outcome.reason)}`);
        break;
      }
      results.push(outcome.value);
    }

    const { transactions, skipped } = normalizeTransactions(results.flat(), normalizeBirdeyeTx, 'birdeye');
    const buys = transactions.filter((tx) => tx.txType === 'buy').slice(0, limit);
    logger.info(`[birdeye] Fetched ${buys.length} buys for ${shortenAddress(tokenAddress)} (${skipped} skipped)`);
    return buys;
  }

  /** Adapters for the single-method collaborator interfaces. */
  asCreationInfoProvider(): CreationInfoProvider {
    return { fetch: (address) => this.fetchCreationInfo(address) };
  }

  asOhlcvProvider(): OHLCVProvider {
    return { fetch: (address, from, to, granularity) => this.fetchCandles(address, from, to, granularity) };
  }

  asTransactionFeed(): TransactionFeed {
    return { fetch: (address, fromTime, limit) => this.fetchTransactions(address, fromTime, limit) };
  }
}
