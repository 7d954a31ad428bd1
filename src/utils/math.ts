/**
 * Numeric helpers shared by the classifier, the placement policy and the
 * query planner.
 */

export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/**
 * Round to a fixed number of decimals. Scores are stored at 4 decimals so
 * identical input always yields bit-identical output.
 */
export function roundTo(value: number, decimals = 4): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Coefficient of variation (stddev / mean). 0 for empty input or zero mean.
 */
export function coefficientOfVariation(values: number[]): number {
  const m = mean(values);
  if (values.length === 0 || m === 0) return 0;
  let squares = 0;
  for (const v of values) squares += (v - m) * (v - m);
  return Math.sqrt(squares / values.length) / m;
}
