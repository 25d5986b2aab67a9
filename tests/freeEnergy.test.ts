import test from 'node:test';
import assert from 'node:assert/strict';

import {
  BOLTZMANN_KCAL_PER_MOL_K,
  DIFFERENCE_DEAD_ZONE,
  SIMULATION_TEMPERATURE_K,
  boltzmannEnergy,
  densityCurve,
  differenceProfile,
  linspace,
  rawEnergyProfile,
  shiftToBaseline,
  singleCoordinateProfile,
} from '../src/analysis/freeEnergy.js';
import type { DensityFunction } from '../src/density/types.js';
import { DensityDomainError } from '../src/trajectory/errors.js';

const KT = BOLTZMANN_KCAL_PER_MOL_K * SIMULATION_TEMPERATURE_K;

const stub = (evaluate: (x: number) => number): DensityFunction => ({ evaluate });

const recordingStub = (value: number) => {
  const seen: number[] = [];
  const density: DensityFunction = {
    evaluate: (x) => {
      seen.push(x);
      return value;
    },
  };
  return { density, seen };
};

const minimumEnergy = (points: { energy: number }[]) =>
  points.reduce((min, point) => Math.min(min, point.energy), Number.POSITIVE_INFINITY);

test('Boltzmann constant is expressed in kcal/mol/K', () => {
  assert.ok(Math.abs(BOLTZMANN_KCAL_PER_MOL_K - 0.0019872026713876534) < 1e-15);
  assert.ok(Math.abs(KT - 0.596160801416296) < 1e-12);
});

test('linspace includes both endpoints', () => {
  assert.deepEqual(linspace(0, 1, 5), [0, 0.25, 0.5, 0.75, 1]);
  const grid = linspace(-1, 1, 4);
  assert.equal(grid.length, 4);
  assert.equal(grid[0], -1);
  assert.equal(grid[3], 1);
  assert.deepEqual(linspace(2, 3, 1), [2]);
  assert.deepEqual(linspace(2, 3, 0), []);
});

test('single-coordinate profile evaluates -kT ln p on [0, 1]', () => {
  const profile = singleCoordinateProfile(stub((x) => 1 + x), 11);
  assert.equal(profile.length, 11);
  assert.equal(profile[0].coordinate, 0);
  assert.equal(profile[10].coordinate, 1);
  // p is largest at x = 1, so that is where the profile bottoms out.
  assert.equal(profile[10].energy, 0);
  assert.ok(Math.abs(profile[0].energy - KT * Math.log(2)) < 1e-12);
  assert.equal(minimumEnergy(profile), 0);
});

test('flat density gives a flat zero profile', () => {
  const profile = singleCoordinateProfile(stub(() => 1), 4);
  assert.deepEqual(
    profile.map((point) => point.energy),
    [0, 0, 0, 0],
  );
});

test('difference mode uses 2*nbins points on [-1, 1]', () => {
  const direct = recordingStub(2);
  const negated = recordingStub(0.5);
  const profile = differenceProfile(direct.density, negated.density, 50);
  assert.equal(profile.length, 100);
  assert.equal(profile[0].coordinate, -1);
  assert.equal(profile[99].coordinate, 1);
  assert.ok(negated.seen.every((x) => x < -DIFFERENCE_DEAD_ZONE));
  assert.ok(direct.seen.every((x) => x > DIFFERENCE_DEAD_ZONE));
  assert.equal(negated.seen.length, 48);
  assert.equal(direct.seen.length, 48);
  assert.equal(minimumEnergy(profile), 0);
});

test('difference dead zone is exactly zero before the baseline shift', () => {
  const guard = stub((x) => {
    if (Math.abs(x) <= DIFFERENCE_DEAD_ZONE) {
      throw new Error(`dead zone evaluated at ${x}`);
    }
    return 3;
  });
  const raw = rawEnergyProfile({ mode: 'difference-energy', direct: guard, negated: guard }, 50);
  const deadZone = raw.filter(
    (point) => point.coordinate >= -DIFFERENCE_DEAD_ZONE && point.coordinate <= DIFFERENCE_DEAD_ZONE,
  );
  assert.equal(deadZone.length, 4);
  for (const point of deadZone) {
    assert.equal(point.energy, 0);
  }
  const outside = raw.find((point) => point.coordinate > DIFFERENCE_DEAD_ZONE);
  assert.ok(outside);
  assert.equal(outside.energy, -KT * Math.log(3));
});

test('baseline shift moves the global minimum to zero and keeps differences', () => {
  const shifted = shiftToBaseline([
    { coordinate: 0, energy: 1.5 },
    { coordinate: 0.5, energy: -0.5 },
    { coordinate: 1, energy: 0 },
  ]);
  assert.deepEqual(shifted, [
    { coordinate: 0, energy: 2 },
    { coordinate: 0.5, energy: 0 },
    { coordinate: 1, energy: 0.5 },
  ]);
});

test('a non-positive density is a domain error carrying the coordinate', () => {
  assert.throws(
    () => singleCoordinateProfile(stub((x) => (x >= 0.5 ? 0 : 1)), 5),
    (error: unknown) =>
      error instanceof DensityDomainError &&
      error.coordinate === 0.5 &&
      error.density === 0 &&
      error.code === 'profile/density-domain',
  );
  assert.throws(
    () => differenceProfile(stub(() => 1), stub(() => -1e-3), 10),
    (error: unknown) => error instanceof DensityDomainError && error.coordinate === -1,
  );
  assert.throws(() => boltzmannEnergy(Number.NaN, 0.2), DensityDomainError);
  assert.throws(() => boltzmannEnergy(Number.POSITIVE_INFINITY, 0.2), DensityDomainError);
});

test('bin counts below two are rejected', () => {
  assert.throws(() => singleCoordinateProfile(stub(() => 1), 1), RangeError);
  assert.throws(() => differenceProfile(stub(() => 1), stub(() => 1), 2.5), RangeError);
  assert.throws(() => densityCurve(stub(() => 1), 0), RangeError);
});

test('densityCurve samples the density on [0, 1]', () => {
  const curve = densityCurve(stub((x) => 2 * x), 3);
  assert.deepEqual(curve, [
    { coordinate: 0, density: 0 },
    { coordinate: 0.5, density: 1 },
    { coordinate: 1, density: 2 },
  ]);
});
