import { MAX_SAMPLE_TXS } from '../constants.js';
import { coefficientOfVariation } from './stats.js';
import type { BundleCluster, DetectionOptions, TransactionWindow } from '../types.js';

// Volume CV at or above this counts as fully incoherent trade sizing
const VOLUME_CV_CEILING = 0.2;

/**
 * Composite suspicion score in [0, 1]:
 *   0.5 · size term      (smallest qualifying cluster scores highest)
 * + 0.3 · diversity term (fewer distinct wallets scores higher)
 * + 0.2 · coherence term (similar USD trade sizes score higher)
 */
export function computeClusterScore(
  clusterSize: number,
  walletDiversityRatio: number,
  volumeCv: number,
  opts: Pick<DetectionOptions, 'minTradesInCluster' | 'maxWalletDiversity'>,
): number {
  const sizeTerm = Math.max(0, 1 - (clusterSize / opts.minTradesInCluster - 1));
  const diversityTerm = Math.max(0, 1 - walletDiversityRatio / opts.maxWalletDiversity);
  const coherenceTerm = Math.max(0, 1 - volumeCv / VOLUME_CV_CEILING);
  return 0.5 * sizeTerm + 0.3 * diversityTerm + 0.2 * coherenceTerm;
}

export function scoreWindow(
  window: TransactionWindow,
  windowSeconds: number,
  opts: Pick<DetectionOptions, 'minTradesInCluster' | 'maxWalletDiversity'>,
): BundleCluster {
  const txs = window.transactions;
  const clusterSize = txs.length;
  const uniqueWallets = new Set(txs.map((tx) => tx.wallet)).size;
  const walletDiversityRatio = uniqueWallets / clusterSize;

  // Zero-volume trades carry no sizing information
  const volumes = txs.map((tx) => tx.volumeUsd).filter((v) => v > 0);
  const volumeCv = coefficientOfVariation(volumes);

  return {
    clusterSize,
    windowSeconds,
    uniqueWallets,
    walletDiversityRatio,
    score: computeClusterScore(clusterSize, walletDiversityRatio, volumeCv, opts),
    sampleTxHashes: txs.slice(0, MAX_SAMPLE_TXS).map((tx) => tx.txHash),
    firstUnix: window.firstUnix,
  };
}

export function scoreWindows(
  windows: readonly TransactionWindow[],
  opts: Pick<DetectionOptions, 'windowSeconds' | 'minTradesInCluster' | 'maxWalletDiversity'>,
): BundleCluster[] {
  return windows.map((w) => scoreWindow(w, opts.windowSeconds, opts));
}
