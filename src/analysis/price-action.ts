import { round } from '../utils/helpers.js';
import { mean } from './stats.js';
import type { Candle, LargeDrop, MitigationFactor, PriceActionResult, SelloffSeverity } from '../types.js';

const LARGE_DROP_PCT = 20;           // single-candle close-to-close drop
const HIGH_VOLUME_MULTIPLE = 2;      // vs mean candle volume
const HIGH_VOLUME_RED_PCT = -10;     // open-to-close move that counts as a sell-off candle

function unknownResult(dataPoints: number, note: string): PriceActionResult {
  return {
    selloffDetected: false,
    selloffSeverity: 'UNKNOWN',
    priceDeclineFromPeakPct: 0,
    peakPrice: 0,
    currentPrice: 0,
    largeDrops: [],
    highVolumeSelloffs: 0,
    avgDailyVolatilityPct: 0,
    maxDailyVolatilityPct: 0,
    riskMitigationFactor: 'NONE',
    riskFactors: [],
    dataPoints,
    analysisNote: note,
  };
}

export function classifySeverity(declinePct: number): SelloffSeverity {
  if (declinePct > 80) return 'EXTREME';
  if (declinePct > 60) return 'SEVERE';
  if (declinePct > 40) return 'MODERATE';
  if (declinePct > 20) return 'MILD';
  return 'NONE';
}

/**
 * A deep crash after the bundle means bundled supply was most likely dumped
 * already, which lowers forward risk for a new buyer.
 */
export function mitigationFactor(detected: boolean, severity: SelloffSeverity): MitigationFactor {
  if (!detected) return 'NONE';
  if (severity === 'EXTREME' || severity === 'SEVERE') return 'HIGH';
  if (severity === 'MODERATE') return 'MEDIUM';
  return 'LOW';
}

/**
 * Looks for sell-off evidence in post-launch candles: decline from peak to
 * latest close, large single-candle drops, and high-volume red candles.
 * Fewer than 2 candles yields UNKNOWN rather than a clean bill.
 */
export function analyzePriceAction(candles: readonly Candle[]): PriceActionResult {
  if (candles.length < 2) {
    return unknownResult(candles.length, 'Insufficient OHLCV data for price action analysis');
  }

  const sorted = [...candles].sort((a, b) => a.unixTime - b.unixTime);
  const highs = sorted.map((c) => c.high);
  const peakPrice = Math.max(...highs);
  if (!(peakPrice > 0)) {
    return unknownResult(sorted.length, 'No valid price data found');
  }

  const currentPrice = sorted[sorted.length - 1].close;
  const declinePct = ((peakPrice - currentPrice) / peakPrice) * 100;

  const ranges = sorted
    .filter((c) => c.high > 0 && c.low > 0)
    .map((c) => ((c.high - c.low) / c.low) * 100);

  const largeDrops: LargeDrop[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1].close;
    if (prev <= 0) continue;
    const change = ((sorted[i].close - prev) / prev) * 100;
    if (change < -LARGE_DROP_PCT) {
      largeDrops.push({ index: i, dropPct: round(Math.abs(change), 1), unixTime: sorted[i].unixTime });
    }
  }

  const avgVolume = mean(sorted.map((c) => c.volumeUsd));
  const highVolumeSelloffs = sorted.filter((c) => {
    if (!(avgVolume > 0) || c.volumeUsd <= avgVolume * HIGH_VOLUME_MULTIPLE || c.open <= 0) return false;
    return ((c.close - c.open) / c.open) * 100 < HIGH_VOLUME_RED_PCT;
  }).length;

  const severity = classifySeverity(declinePct);
  const riskFactors: string[] = [];
  if (severity !== 'NONE') {
    const label = severity.charAt(0) + severity.slice(1).toLowerCase();
    riskFactors.push(`${label} price decline from peak (${declinePct.toFixed(1)}%)`);
  }
  if (largeDrops.length > 0) riskFactors.push(`${largeDrops.length} large single-candle drops detected`);
  if (highVolumeSelloffs > 0) riskFactors.push(`${highVolumeSelloffs} high-volume sell-off candles`);

  const selloffDetected = severity !== 'NONE' || largeDrops.length > 0 || highVolumeSelloffs > 0;

  return {
    selloffDetected,
    selloffSeverity: severity,
    priceDeclineFromPeakPct: round(declinePct, 1),
    peakPrice,
    currentPrice,
    largeDrops,
    highVolumeSelloffs,
    avgDailyVolatilityPct: round(mean(ranges), 1),
    maxDailyVolatilityPct: round(ranges.length > 0 ? Math.max(...ranges) : 0, 1),
    riskMitigationFactor: mitigationFactor(selloffDetected, severity),
    riskFactors,
    dataPoints: sorted.length,
    analysisNote: `Price action over ${sorted.length} candles shows ${severity.toLowerCase()} sell-off patterns`,
  };
}
