import { ConfigError } from '../errors.js';
import type { DetectionOptions, Transaction, TransactionWindow } from '../types.js';

export const DEFAULT_DETECTION_OPTIONS: DetectionOptions = {
  windowSeconds: 2.0,
  minTradesInCluster: 3,
  maxWalletDiversity: 0.7,
  scoreAcceptThreshold: 0.5,
};

export function resolveDetectionOptions(opts: Partial<DetectionOptions> = {}): DetectionOptions {
  const options = { ...DEFAULT_DETECTION_OPTIONS, ...opts };
  validateDetectionOptions(options);
  return options;
}

export function validateDetectionOptions(options: DetectionOptions): void {
  if (!Number.isFinite(options.windowSeconds) || options.windowSeconds < 0) {
    throw new ConfigError(`windowSeconds must be a non-negative number, got ${options.windowSeconds}`);
  }
  if (!Number.isInteger(options.minTradesInCluster) || options.minTradesInCluster < 1) {
    throw new ConfigError(`minTradesInCluster must be a positive integer, got ${options.minTradesInCluster}`);
  }
  if (!(options.maxWalletDiversity > 0 && options.maxWalletDiversity <= 1)) {
    throw new ConfigError(`maxWalletDiversity must be in (0, 1], got ${options.maxWalletDiversity}`);
  }
}

/**
 * Groups an ascending transaction list into time windows.
 *
 * Each transaction anchors a window holding every later transaction within
 * `windowSeconds` of it. The anchor advances by one transaction, so windows
 * overlap and a staggered multi-wave burst shows up as several clusters.
 * Windows smaller than `minTradesInCluster` are dropped.
 *
 * Two pointers: the window end never moves backwards, so this is O(n).
 */
export function clusterWindows(
  transactions: readonly Transaction[],
  opts: Partial<DetectionOptions> = {},
): TransactionWindow[] {
  const { windowSeconds, minTradesInCluster } = resolveDetectionOptions(opts);
  const windows: TransactionWindow[] = [];
  const n = transactions.length;
  let end = 0;

  for (let start = 0; start < n; start++) {
    const firstUnix = transactions[start].timestamp;
    const windowEnd = firstUnix + windowSeconds;
    if (end < start) end = start;
    while (end < n && transactions[end].timestamp <= windowEnd) end++;

    if (end - start >= minTradesInCluster) {
      windows.push({
        startIndex: start,
        endIndex: end,
        firstUnix,
        transactions: transactions.slice(start, end),
      });
    }
  }

  return windows;
}
