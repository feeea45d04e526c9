/**
 * Outlier Detector
 * Interquartile-range test over raw confidence values.
 *
 * Small samples make quartiles unstable, so fewer than four values get a
 * permissive policy: two or fewer never flag, three flag only an extreme
 * deviation from the median. Past the fences, a value must also sit at least
 * MIN_QUARTILE_SEPARATION from the nearer quartile, so a near-zero IQR does
 * not turn a hair's difference into an outlier.
 */

import { median, quantile } from './statistics';

export const IQR_MULTIPLIER = 1.5;
export const IQR_MIN_SAMPLES = 4;
export const SMALL_SAMPLE_EXTREME_DEVIATION = 0.5;
export const MIN_QUARTILE_SEPARATION = 0.1;

export interface IqrFences {
  q1: number;
  q3: number;
  iqr: number;
  lower: number;
  upper: number;
}

export function computeFences(values: readonly number[]): IqrFences {
  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  return {
    q1,
    q3,
    iqr,
    lower: q1 - IQR_MULTIPLIER * iqr,
    upper: q3 + IQR_MULTIPLIER * iqr
  };
}

/**
 * @returns Index of the outlying value, or null. When several values fall
 * outside the fences the one farthest beyond its fence is reported, first
 * occurrence on ties.
 */
export function detectOutlier(values: readonly number[]): number | null {
  if (values.length < 3) {
    return null;
  }

  if (values.length < IQR_MIN_SAMPLES) {
    const center = median(values);
    let worst: number | null = null;
    let worstDeviation = 0;
    for (let i = 0; i < values.length; i++) {
      const deviation = Math.abs(values[i] - center);
      if (deviation >= SMALL_SAMPLE_EXTREME_DEVIATION && deviation > worstDeviation) {
        worst = i;
        worstDeviation = deviation;
      }
    }
    return worst;
  }

  const fences = computeFences(values);
  let worst: number | null = null;
  let worstDistance = 0;
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    let distance = 0;
    if (value < fences.lower && fences.q1 - value >= MIN_QUARTILE_SEPARATION) {
      distance = fences.lower - value;
    } else if (value > fences.upper && value - fences.q3 >= MIN_QUARTILE_SEPARATION) {
      distance = value - fences.upper;
    }
    if (distance > worstDistance) {
      worst = i;
      worstDistance = distance;
    }
  }
  return worst;
}
