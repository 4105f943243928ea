/**
 * Score arithmetic shared by the evaluators
 */

/**
 * Clamp to [0,1]; rounding to 6 places keeps sums of 0.1-step penalties
 * on the thresholds they are meant to reach
 */
export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const rounded = Math.round(value * 1e6) / 1e6;
  return Math.min(1, Math.max(0, rounded));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Population standard deviation
 */
export function stddev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return Math.sqrt(mean(values.map((value) => (value - avg) ** 2)));
}

export function formatScore(value: number): string {
  return value.toFixed(2);
}
