import { DensityDomainError } from '../trajectory/errors.js';
import type { DensityFunction } from '../density/types.js';

export const BOLTZMANN_J_PER_K = 1.3806488e-23;
// 1 kcal/mol expressed per molecule, in joules.
export const JOULES_PER_KCAL_PER_MOL = 6.9477e-21;
export const BOLTZMANN_KCAL_PER_MOL_K = BOLTZMANN_J_PER_K / JOULES_PER_KCAL_PER_MOL;
export const SIMULATION_TEMPERATURE_K = 300.0;
export const DIFFERENCE_DEAD_ZONE = 0.04;

export type EnergyMode = 'single-energy' | 'difference-energy';

export type EnergyPoint = {
  coordinate: number;
  energy: number;
};

export type DensityPoint = {
  coordinate: number;
  density: number;
};

export type DensityCurves = {
  dominant: DensityPoint[];
  secondary: DensityPoint[];
};

const assertBinCount = (nbins: number) => {
  if (!Number.isInteger(nbins) || nbins < 2) {
    throw new RangeError(`nbins must be an integer >= 2 (received ${nbins})`);
  }
};

/** Evenly spaced samples over [start, stop], both endpoints included. */
export const linspace = (start: number, stop: number, count: number): number[] => {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`linspace count must be a non-negative integer (received ${count})`);
  }
  if (count === 0) return [];
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  const values: number[] = new Array(count);
  for (let i = 0; i < count - 1; i++) {
    values[i] = start + i * step;
  }
  values[count - 1] = stop;
  return values;
};

export const boltzmannEnergy = (density: number, coordinate: number): number => {
  if (!(density > 0) || !Number.isFinite(density)) {
    throw new DensityDomainError(coordinate, density);
  }
  return -BOLTZMANN_KCAL_PER_MOL_K * SIMULATION_TEMPERATURE_K * Math.log(density);
};

export const shiftToBaseline = (points: readonly EnergyPoint[]): EnergyPoint[] => {
  let minimum = Number.POSITIVE_INFINITY;
  for (const point of points) {
    if (point.energy < minimum) {
      minimum = point.energy;
    }
  }
  return points.map((point) => ({
    coordinate: point.coordinate,
    energy: point.energy - minimum,
  }));
};

export type RawProfileInput =
  | { mode: 'single-energy'; density: DensityFunction }
  | { mode: 'difference-energy'; direct: DensityFunction; negated: DensityFunction };

/**
 * Energies before the baseline shift. In difference mode the band
 * |x| <= DIFFERENCE_DEAD_ZONE is pinned to zero instead of evaluated.
 */
export const rawEnergyProfile = (input: RawProfileInput, nbins: number): EnergyPoint[] => {
  assertBinCount(nbins);
  if (input.mode === 'single-energy') {
    return linspace(0, 1, nbins).map((coordinate) => ({
      coordinate,
      energy: boltzmannEnergy(input.density.evaluate(coordinate), coordinate),
    }));
  }
  return linspace(-1, 1, 2 * nbins).map((coordinate) => {
    if (coordinate < -DIFFERENCE_DEAD_ZONE) {
      return { coordinate, energy: boltzmannEnergy(input.negated.evaluate(coordinate), coordinate) };
    }
    if (coordinate > DIFFERENCE_DEAD_ZONE) {
      return { coordinate, energy: boltzmannEnergy(input.direct.evaluate(coordinate), coordinate) };
    }
    return { coordinate, energy: 0 };
  });
};

export const singleCoordinateProfile = (density: DensityFunction, nbins: number): EnergyPoint[] =>
  shiftToBaseline(rawEnergyProfile({ mode: 'single-energy', density }, nbins));

export const differenceProfile = (
  direct: DensityFunction,
  negated: DensityFunction,
  nbins: number,
): EnergyPoint[] =>
  shiftToBaseline(rawEnergyProfile({ mode: 'difference-energy', direct, negated }, nbins));

export const densityCurve = (density: DensityFunction, nbins: number): DensityPoint[] => {
  assertBinCount(nbins);
  return linspace(0, 1, nbins).map((coordinate) => ({
    coordinate,
    density: density.evaluate(coordinate),
  }));
};
