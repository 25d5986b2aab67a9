import {
  amplitudeDifferences,
  extractAmplitudeSamples,
  type AmplitudeSamples,
} from './amplitudes.js';
import {
  densityCurve,
  differenceProfile,
  singleCoordinateProfile,
  type DensityCurves,
  type EnergyMode,
  type EnergyPoint,
} from './freeEnergy.js';
import { classifyHops, type HopClassification } from './hopClassifier.js';
import { alignTrajectory } from '../trajectory/align.js';
import type { DensityEstimator } from '../density/types.js';
import type { Trajectory, TrajectoryArrays } from '../trajectory/types.js';

export interface TrajectoryAnalysis {
  readonly trajectory: Trajectory;
  amplitudeSamples(): AmplitudeSamples;
  hopCounts(): number[];
  hopClassification(): HopClassification;
  freeEnergyProfile(mode: EnergyMode, nbins: number): EnergyPoint[];
  densityCurves(nbins: number): DensityCurves;
}

const memo = <T>(compute: () => T): (() => T) => {
  let cached: { value: T } | null = null;
  return () => {
    if (!cached) {
      cached = { value: compute() };
    }
    return cached.value;
  };
};

/**
 * Validates alignment up front, then derives amplitude samples and hop
 * classification on first use. Returned arrays are fresh copies.
 */
export const createTrajectoryAnalysis = (
  input: TrajectoryArrays,
  estimator: DensityEstimator,
): TrajectoryAnalysis => {
  const trajectory = alignTrajectory(input);
  const samples = memo(() => extractAmplitudeSamples(trajectory.amplitudeVectors));
  const hops = memo(() => classifyHops(trajectory.centers));

  return {
    trajectory,
    amplitudeSamples: () => {
      const { dominantSq, secondarySq } = samples();
      return { dominantSq: [...dominantSq], secondarySq: [...secondarySq] };
    },
    hopCounts: () => [...hops().counts],
    hopClassification: () => {
      const result = hops();
      return {
        ...result,
        counts: [...result.counts],
        steps: result.steps.map((step) => ({ ...step })),
        donorHistory: [...result.donorHistory],
      };
    },
    freeEnergyProfile: (mode, nbins) => {
      if (mode === 'single-energy') {
        return singleCoordinateProfile(estimator.fit(samples().dominantSq), nbins);
      }
      const { direct, negated } = amplitudeDifferences(samples());
      return differenceProfile(estimator.fit(direct), estimator.fit(negated), nbins);
    },
    densityCurves: (nbins) => {
      const { dominantSq, secondarySq } = samples();
      return {
        dominant: densityCurve(estimator.fit(dominantSq), nbins),
        secondary: densityCurve(estimator.fit(secondarySq), nbins),
      };
    },
  };
};
