export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * Coefficient of variation: sample stddev (Bessel's correction) / |mean|.
 * 0 for fewer than 2 values or a zero mean.
 */
export function coefficientOfVariation(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  if (m === 0) return 0;
  const variance = values.reduce((s, v) => s + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance) / Math.abs(m);
}

/** Consecutive differences of an already-sorted series. */
export function gaps(sorted: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    out.push(sorted[i] - sorted[i - 1]);
  }
  return out;
}
