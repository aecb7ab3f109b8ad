/**
 * Windowed statistics
 *
 * All statistics are computed over the samples actually buffered, so a
 * partially filled window never divides by the configured size and every
 * weight sum includes the newest sample's non-zero weight.
 */

import type { WindowBuffer } from '@core/window-buffer';

/**
 * Gaussian weights by sample age with cumulative normalizers
 */
export interface GaussianKernel {
  /** weights[a] = exp(-a^2 / (2 * sigma^2)), a = 0 for the newest sample */
  weights: Float64Array;
  /** normalizers[n] = weights[0] + ... + weights[n - 1] */
  normalizers: Float64Array;
}

/**
 * Arithmetic mean of the buffered samples
 * @param buffer - Non-empty window buffer
 * @returns Mean over count samples
 */
export function simpleMean(buffer: WindowBuffer<number>): number {
  const count = buffer.count();
  let sum = 0;
  for (let i = 0; i < count; i++) {
    sum += buffer.at(i);
  }
  return sum / count;
}

/**
 * Linearly weighted mean, newest sample heaviest
 *
 * With n samples buffered the newest gets weight n, the one before it
 * n - 1, down to 1 for the oldest; the weights sum to n(n + 1) / 2.
 *
 * @param buffer - Non-empty window buffer
 * @returns Weighted mean over count samples
 */
export function linearWeightedMean(buffer: WindowBuffer<number>): number {
  const count = buffer.count();
  let weightedSum = 0;
  for (let i = 0; i < count; i++) {
    // oldest-first index i has weight i + 1
    weightedSum += buffer.at(i) * (i + 1);
  }
  return weightedSum / ((count * (count + 1)) / 2);
}

/**
 * Precompute a causal Gaussian kernel centred on the newest sample
 * @param windowSize - Number of weights
 * @param stdDev - Standard deviation in samples (> 0)
 * @returns Weights by age and normalizers by count
 */
export function buildGaussianKernel(windowSize: number, stdDev: number): GaussianKernel {
  const weights = new Float64Array(windowSize);
  const normalizers = new Float64Array(windowSize + 1);
  const twoVariance = 2 * stdDev * stdDev;

  for (let age = 0; age < windowSize; age++) {
    weights[age] = Math.exp(-(age * age) / twoVariance);
    normalizers[age + 1] = normalizers[age] + weights[age];
  }

  return { weights: weights, normalizers: normalizers };
}

/**
 * Gaussian-weighted mean of the buffered samples
 * @param buffer - Non-empty window buffer
 * @param kernel - Kernel built for the buffer's capacity
 * @returns Mean normalized over the weights of the samples present
 */
export function gaussianMean(buffer: WindowBuffer<number>, kernel: GaussianKernel): number {
  const count = buffer.count();
  let weightedSum = 0;
  for (let i = 0; i < count; i++) {
    weightedSum += buffer.at(i) * kernel.weights[count - 1 - i];
  }
  return weightedSum / kernel.normalizers[count];
}

/**
 * Median of the buffered samples
 *
 * Sorts a copy held in `scratch` (reused between calls); an even count
 * averages the two middle values.
 *
 * @param buffer - Non-empty window buffer
 * @param scratch - Work array owned by the calling filter
 * @returns Median over count samples
 */
export function median(buffer: WindowBuffer<number>, scratch: number[]): number {
  const count = buffer.count();
  scratch.length = count;
  for (let i = 0; i < count; i++) {
    scratch[i] = buffer.at(i);
  }
  scratch.sort(function (a, b) { return a - b; });

  const middle = Math.floor(count / 2);
  if (count % 2 === 1) {
    return scratch[middle];
  }
  return (scratch[middle - 1] + scratch[middle]) / 2;
}
