/**
 * Exponential moving average over `values` (oldest first), alpha = 2 / (span + 1),
 * seeded with the first value. Returns one EMA per input value.
 */
export function emaSeries(values: number[], span: number): number[] {
  const result: number[] = [];
  if (values.length === 0) {
    return result;
  }

  const alpha = 2 / (span + 1);
  let ema = values[0];
  result.push(ema);

  for (let i = 1; i < values.length; i++) {
    ema = alpha * values[i] + (1 - alpha) * ema;
    result.push(ema);
  }

  return result;
}

/**
 * EMA at the last value, or null for an empty input.
 */
export function latestEma(values: number[], span: number): number | null {
  const series = emaSeries(values, span);
  return series.length > 0 ? series[series.length - 1] : null;
}
