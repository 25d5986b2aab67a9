import test from 'node:test';
import assert from 'node:assert/strict';

import { loadTrajectoryFromJson } from '../src/trajectory/loader.js';
import {
  TrajectoryValidationError,
  validateTrajectoryDocument,
} from '../src/trajectory/schema.js';

const validDocument = {
  timesteps: [0, 1, 2],
  amplitudes: [
    [0.95, 0.2, 0.1],
    [0.7, 0.68],
    [0.3, 0.9],
  ],
  centers: [12, 12, 'OW40'],
  metadata: { source: 'water-box-216', description: 'excess proton in water' },
};

test('loadTrajectoryFromJson returns the parsed document', () => {
  const result = loadTrajectoryFromJson(JSON.stringify(validDocument), 'run.json');
  assert.equal(result.kind, 'success');
  if (result.kind !== 'success') return;
  assert.equal(result.sourceName, 'run.json');
  assert.deepEqual(result.document.timesteps, [0, 1, 2]);
  assert.deepEqual(result.document.amplitudeVectors[1], [0.7, 0.68]);
  assert.deepEqual(result.document.centers, [12, 12, 'OW40']);
  assert.deepEqual(result.document.metadata, {
    source: 'water-box-216',
    description: 'excess proton in water',
  });
  assert.deepEqual(result.issues, []);
});

test('malformed JSON surfaces the parser message', () => {
  const result = loadTrajectoryFromJson('{"timesteps": [0,', 'broken.json');
  assert.equal(result.kind, 'error');
  if (result.kind !== 'error') return;
  assert.equal(result.issues, undefined);
  assert.equal(result.sourceName, 'broken.json');
});

test('type errors are collected with their paths', () => {
  const result = loadTrajectoryFromJson(
    JSON.stringify({
      timesteps: [0, 1.5],
      amplitudes: [[0.9, 'x'], 3],
      centers: [1, ''],
    }),
  );
  assert.equal(result.kind, 'error');
  if (result.kind !== 'error') return;
  assert.equal(result.message, 'Trajectory validation failed');
  assert.deepEqual(
    result.issues?.map((issue) => [issue.code, issue.path]),
    [
      ['trajectory/timesteps/value', ['timesteps', 1]],
      ['trajectory/amplitudes/value', ['amplitudes', 0, 1]],
      ['trajectory/amplitudes/vector', ['amplitudes', 1]],
      ['trajectory/centers/value', ['centers', 1]],
    ],
  );
});

test('a non-object root is rejected outright', () => {
  assert.throws(
    () => validateTrajectoryDocument([1, 2, 3]),
    (error: unknown) =>
      error instanceof TrajectoryValidationError && error.issues[0].code === 'trajectory/type',
  );
});

test('bad metadata only warns', () => {
  const { document, issues } = validateTrajectoryDocument({
    timesteps: [0],
    amplitudes: [[0.8, 0.2]],
    centers: [1],
    metadata: 'evb.out',
  });
  assert.equal(document.metadata, undefined);
  assert.equal(issues.length, 1);
  assert.equal(issues[0].severity, 'warning');
  assert.equal(issues[0].code, 'trajectory/metadata/type');
});

test('sequence lengths are left for alignment to check', () => {
  const { document } = validateTrajectoryDocument({
    timesteps: [0, 1],
    amplitudes: [[0.8, 0.2]],
    centers: [1, 2, 3],
  });
  assert.equal(document.timesteps.length, 2);
  assert.equal(document.amplitudeVectors.length, 1);
  assert.equal(document.centers.length, 3);
});
