export interface DensityFunction {
  evaluate(x: number): number;
}

/**
 * Fits a probability density to a finite sample set. The analysis code only
 * depends on this contract; kernel and bandwidth choices stay behind it.
 */
export interface DensityEstimator {
  fit(samples: readonly number[]): DensityFunction;
}
