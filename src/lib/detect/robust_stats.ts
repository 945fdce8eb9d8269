// Makes the MAD comparable to a normal-distribution standard deviation
export const MAD_SCALE = 1.4826;

export interface RobustStats {
  median: number;
  scaledMad: number;
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);

  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

/**
 * Median and scaled median absolute deviation of a population.
 *
 * Returns null when the population is empty or has no dispersion (MAD of
 * zero); outlier testing is undefined for that population.
 */
export function robustStats(values: readonly number[]): RobustStats | null {
  const center = median(values);
  if (center === null) return null;

  const deviations = values.map(v => Math.abs(v - center));
  const mad = median(deviations);
  if (mad === null || mad === 0) return null;

  return { median: center, scaledMad: mad * MAD_SCALE };
}

export function modifiedZScore(value: number, stats: RobustStats): number {
  return (value - stats.median) / stats.scaledMad;
}
