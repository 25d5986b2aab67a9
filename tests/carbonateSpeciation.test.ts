import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import {
  CARBONIC_ACID,
  formatSpeciationRow,
  formatSpeciationTable,
  speciationAt,
  speciationCurve,
  speciationGrid,
} from '../src/chemistry/carbonateSpeciation.js';

const EPSILON = 1e-12;

test('species fractions always sum to one', () => {
  fc.assert(
    fc.property(fc.double({ min: -2, max: 16, noNaN: true }), (pH) => {
      const [f0, f1, f2] = speciationAt(pH).fractions;
      assert.ok(Math.abs(f0 + f1 + f2 - 1) < EPSILON);
      assert.ok(f0 >= 0 && f1 >= 0 && f2 >= 0);
    }),
  );
});

test('acid and bicarbonate are balanced at pH = -log10(Ka1)', () => {
  const [f0, f1] = speciationAt(-Math.log10(CARBONIC_ACID.ka1)).fractions;
  assert.ok(Math.abs(f0 - f1) < 1e-9);
});

test('carbonic acid dominates in strong acid and carbonate in strong base', () => {
  assert.ok(speciationAt(0).fractions[0] > 0.999);
  assert.ok(speciationAt(14).fractions[2] > 0.99);
});

test('non-finite pH is rejected', () => {
  assert.throws(() => speciationAt(Number.NaN), RangeError);
});

test('the plotting grid covers 0..14 in tenths plus both pKa marks', () => {
  const grid = speciationGrid();
  assert.equal(grid.length, 143);
  assert.equal(grid[0], 0);
  assert.equal(grid[grid.length - 1], 14);
  assert.ok(grid.includes(3.45));
  assert.ok(grid.includes(10.329));
  for (let i = 1; i < grid.length; i++) {
    assert.ok(grid[i] >= grid[i - 1]);
  }
  assert.equal(speciationCurve().length, 143);
});

test('table rows use fixed-width columns', () => {
  assert.equal(
    formatSpeciationRow({ pH: 7, fractions: [0.5, 0.25, 0.125] }),
    ' 7.000 0.500000 0.250000 0.125000',
  );
});

test('table has a header and one row per integer pH and pKa', () => {
  const lines = formatSpeciationTable();
  assert.equal(lines.length, 17);
  assert.equal(lines[0], '   pH   H2CO3    HCO3^-   CO3^{2-}');
  assert.ok(lines[1].startsWith(' 1.000 '));
  assert.ok(lines[4].startsWith(' 3.450 '));
  assert.ok(lines[16].startsWith('14.000 '));
});
