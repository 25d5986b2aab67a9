import {
  interquartileRange,
  kernelDensityEstimation,
  sampleStandardDeviation,
} from 'simple-statistics';

import { DensityFitError } from '../trajectory/errors.js';
import type { DensityEstimator, DensityFunction } from './types.js';

export type BandwidthRule = 'scott' | 'silverman';

export type BandwidthSetting = BandwidthRule | number;

export type KernelDensityOptions = {
  bandwidth?: BandwidthSetting;
};

export const DEFAULT_BANDWIDTH: BandwidthRule = 'scott';

/**
 * Scott: sigma * n^(-1/5).
 * Silverman: 0.9 * min(sigma, IQR / 1.34) * n^(-1/5).
 */
export const resolveBandwidth = (samples: readonly number[], setting: BandwidthSetting): number => {
  if (typeof setting === 'number') {
    return setting;
  }
  if (samples.length < 2) {
    return Number.NaN;
  }
  const values = [...samples];
  const sigma = sampleStandardDeviation(values);
  const scale = Math.pow(values.length, -0.2);
  if (setting === 'scott') {
    return sigma * scale;
  }
  const spread = Math.min(sigma, interquartileRange(values) / 1.34);
  return 0.9 * (spread > 0 ? spread : sigma) * scale;
};

export class KernelDensityEstimator implements DensityEstimator {
  readonly bandwidth: BandwidthSetting;

  constructor(options: KernelDensityOptions = {}) {
    this.bandwidth = options.bandwidth ?? DEFAULT_BANDWIDTH;
  }

  fit(samples: readonly number[]): DensityFunction {
    const bandwidth = resolveBandwidth(samples, this.bandwidth);
    if (samples.length < 2 || !Number.isFinite(bandwidth) || bandwidth <= 0) {
      throw new DensityFitError(samples.length, bandwidth);
    }
    const estimate = kernelDensityEstimation([...samples], 'gaussian', bandwidth);
    return Object.freeze({
      evaluate: (x: number) => estimate(x),
    });
  }
}

export const createKernelDensityEstimator = (options: KernelDensityOptions = {}) =>
  new KernelDensityEstimator(options);
