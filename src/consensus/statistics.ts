/**
 * Statistics helpers for consensus computation
 * All functions are pure and order-preserving.
 */

/**
 * Numerically stable softmax. Identical inputs yield the uniform distribution.
 */
export function softmax(values: readonly number[], temperature: number = 1.0): number[] {
  if (values.length === 0) {
    return [];
  }

  const max = Math.max(...values);
  const min = Math.min(...values);
  if (max === min) {
    return values.map(() => 1 / values.length);
  }

  const exps = values.map((v) => Math.exp((v - max) / temperature));
  const sum = exps.reduce((acc, e) => acc + e, 0);
  return exps.map((e) => e / sum);
}

/**
 * Quantile with linear interpolation between closest ranks
 * @param sorted - Values in ascending order
 * @param q - Quantile in [0, 1]
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    return NaN;
  }
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (position - lower) * (sorted[upper] - sorted[lower]);
}

export function median(values: readonly number[]): number {
  return quantile([...values].sort((a, b) => a - b), 0.5);
}

/**
 * Shannon entropy (base 2) normalized by log2(outcomes); 0 when outcomes < 2
 */
export function normalizedEntropy(probabilities: readonly number[], outcomes: number): number {
  if (outcomes < 2) {
    return 0;
  }
  let entropy = 0;
  for (const p of probabilities) {
    if (p > 0) {
      entropy -= p * Math.log2(p);
    }
  }
  return Math.max(0, Math.min(1, entropy / Math.log2(outcomes)));
}

/**
 * Index of the largest value; first occurrence wins ties
 */
export function argmax(values: readonly number[]): number {
  let best = -1;
  for (let i = 0; i < values.length; i++) {
    if (best === -1 || values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}

export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
