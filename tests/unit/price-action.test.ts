import { describe, it, expect } from 'vitest';
import { analyzePriceAction, classifySeverity, mitigationFactor } from '../../src/analysis/price-action.js';
import { makeCandle } from '../helpers/factories.js';

describe('analyzePriceAction', () => {
  it('should report UNKNOWN for fewer than two candles', () => {
    const none = analyzePriceAction([]);
    expect(none.selloffSeverity).toBe('UNKNOWN');
    expect(none.selloffDetected).toBe(false);
    expect(none.dataPoints).toBe(0);

    const one = analyzePriceAction([makeCandle(0, 1, 1, 1, 1)]);
    expect(one.selloffSeverity).toBe('UNKNOWN');
    expect(one.selloffDetected).toBe(false);
    expect(one.riskMitigationFactor).toBe('NONE');
    expect(one.dataPoints).toBe(1);
  });

  it('should report UNKNOWN when every high is zero', () => {
    const result = analyzePriceAction([makeCandle(0, 0, 0, 0, 0), makeCandle(1, 0, 0, 0, 0)]);
    expect(result.selloffSeverity).toBe('UNKNOWN');
    expect(result.analysisNote).toBe('No valid price data found');
  });

  it('should classify a post-launch crash', () => {
    const result = analyzePriceAction([
      makeCandle(2, 0.3, 0.35, 0.1, 0.1, 700),
      makeCandle(0, 1, 1, 0.9, 0.9, 100),
      makeCandle(1, 0.9, 0.95, 0.3, 0.3, 100),
    ]);

    expect(result.selloffDetected).toBe(true);
    expect(result.selloffSeverity).toBe('EXTREME');
    expect(result.priceDeclineFromPeakPct).toBe(90);
    expect(result.peakPrice).toBe(1);
    expect(result.currentPrice).toBe(0.1);
    expect(result.largeDrops).toEqual([
      { index: 1, dropPct: 66.7, unixTime: 1 },
      { index: 2, dropPct: 66.7, unixTime: 2 },
    ]);
    expect(result.highVolumeSelloffs).toBe(1);
    expect(result.avgDailyVolatilityPct).toBe(159.3);
    expect(result.maxDailyVolatilityPct).toBe(250);
    expect(result.riskMitigationFactor).toBe('HIGH');
    expect(result.riskFactors).toEqual([
      'Extreme price decline from peak (90.0%)',
      '2 large single-candle drops detected',
      '1 high-volume sell-off candles',
    ]);
    expect(result.dataPoints).toBe(3);
    expect(result.analysisNote).toBe('Price action over 3 candles shows extreme sell-off patterns');
  });

  it('should report no sell-off for a flat market', () => {
    const result = analyzePriceAction([makeCandle(0, 1, 1, 1, 1), makeCandle(1, 1, 1, 1, 1)]);
    expect(result.selloffDetected).toBe(false);
    expect(result.selloffSeverity).toBe('NONE');
    expect(result.riskMitigationFactor).toBe('NONE');
    expect(result.riskFactors).toEqual([]);
  });

  it('should give LOW mitigation for a mild decline', () => {
    const result = analyzePriceAction([makeCandle(0, 1, 1, 0.9, 0.9), makeCandle(1, 0.9, 0.9, 0.75, 0.75)]);
    expect(result.selloffSeverity).toBe('MILD');
    expect(result.largeDrops).toEqual([]);
    expect(result.selloffDetected).toBe(true);
    expect(result.riskMitigationFactor).toBe('LOW');
  });
});

describe('classifySeverity', () => {
  it('should use strict thresholds', () => {
    expect(classifySeverity(80.1)).toBe('EXTREME');
    expect(classifySeverity(80)).toBe('SEVERE');
    expect(classifySeverity(60)).toBe('MODERATE');
    expect(classifySeverity(40)).toBe('MILD');
    expect(classifySeverity(20)).toBe('NONE');
  });
});

describe('mitigationFactor', () => {
  it('should map severity to mitigation', () => {
    expect(mitigationFactor(false, 'EXTREME')).toBe('NONE');
    expect(mitigationFactor(true, 'SEVERE')).toBe('HIGH');
    expect(mitigationFactor(true, 'MODERATE')).toBe('MEDIUM');
    expect(mitigationFactor(true, 'NONE')).toBe('LOW');
  });
});
