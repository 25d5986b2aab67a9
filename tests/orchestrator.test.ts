import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { DensityEstimator } from '../src/density/types.js';
import {
  analyzeHops,
  analyzeProfile,
  analyzeSamples,
  resolveRuntimeConfig,
  TrajectoryLoadError,
  writeReportFile,
} from '../src/runtime/services.js';
import { hashCanonicalJsonString } from '../src/serialization/canonicalJson.js';

const flatEstimator: DensityEstimator = {
  fit: () => ({ evaluate: (x) => 1 + x * x }),
};

const trajectory = {
  timesteps: [0, 500, 1000, 1500, 2000],
  amplitudes: [
    [0.9, 0.3, 0.1],
    [0.7, 0.65, 0.2],
    [0.4, 0.85, 0.1],
    [0.6, 0.7, 0.3],
    [0.2, 0.95, 0.1],
  ],
  centers: [101, 101, 230, 101, 230],
  metadata: { source: 'test-run' },
};

const withWorkspace = async (run: (dir: string) => Promise<void>) => {
  const dir = await mkdtemp(join(tmpdir(), 'evb-analysis-'));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

test('analyzeHops builds a hop report in picoseconds', async () => {
  await withWorkspace(async (dir) => {
    const input = join(dir, 'trajectory.json');
    await writeFile(input, JSON.stringify(trajectory));
    const { report, warnings } = await analyzeHops({ input });
    assert.deepEqual(warnings, []);
    assert.equal(report.kind, 'hops');
    assert.equal(report.source, 'test-run');
    assert.equal(report.frameCount, 5);
    assert.deepEqual(report.summary, {
      forwardHops: 2,
      backwardHops: 1,
      netDisplacement: 1,
      donorCount: 2,
    });
    assert.deepEqual(
      report.timeline.map((point) => [point.timePs, point.hops]),
      [
        [0, 0],
        [0.5, 0],
        [1, 1],
        [1.5, 0],
        [2, 1],
      ],
    );
  });
});

test('analyzeProfile applies config file then overrides', async () => {
  await withWorkspace(async (dir) => {
    const input = join(dir, 'trajectory.json');
    const configPath = join(dir, 'analysis.json');
    await writeFile(input, JSON.stringify(trajectory));
    await writeFile(configPath, JSON.stringify({ mode: 'difference-energy', bins: 7 }));

    const fromFile = await analyzeProfile({ input, configPath, estimator: flatEstimator });
    assert.equal(fromFile.config.mode, 'difference-energy');
    const fileResult = fromFile.report.result;
    assert.ok(fileResult.mode === 'difference-energy');
    assert.equal(fileResult.profile.length, 14);

    const overridden = await analyzeProfile({
      input,
      configPath,
      overrides: { mode: 'single-energy', bins: 5 },
      estimator: flatEstimator,
    });
    const { result } = overridden.report;
    assert.ok(result.mode === 'single-energy');
    assert.deepEqual(
      result.profile.map((point) => point.coordinate),
      [0, 0.25, 0.5, 0.75, 1],
    );
    // 1 + x^2 is largest at x = 1.
    assert.equal(result.profile[4].energy, 0);
  });
});

test('density mode reports both amplitude densities', async () => {
  await withWorkspace(async (dir) => {
    const input = join(dir, 'trajectory.json');
    await writeFile(input, JSON.stringify(trajectory));
    const { report } = await analyzeProfile({
      input,
      overrides: { bins: 3 },
      estimator: flatEstimator,
    });
    assert.equal(report.bins, 3);
    assert.equal(report.bandwidth, 'scott');
    assert.deepEqual(report.result, {
      mode: 'density',
      curves: {
        dominant: [
          { coordinate: 0, density: 1 },
          { coordinate: 0.5, density: 1.25 },
          { coordinate: 1, density: 2 },
        ],
        secondary: [
          { coordinate: 0, density: 1 },
          { coordinate: 0.5, density: 1.25 },
          { coordinate: 1, density: 2 },
        ],
      },
    });
  });
});

test('analyzeSamples lists per-frame squared amplitudes', async () => {
  await withWorkspace(async (dir) => {
    const input = join(dir, 'trajectory.json');
    await writeFile(input, JSON.stringify(trajectory));
    const { report } = await analyzeSamples({ input });
    assert.equal(report.frames.length, 5);
    assert.deepEqual(report.frames[2], {
      timestep: 1000,
      center: 230,
      dominantSq: 0.85 * 0.85,
      secondarySq: 0.4 * 0.4,
    });
  });
});

test('writeReportFile stores canonical JSON and returns its digest', async () => {
  await withWorkspace(async (dir) => {
    const input = join(dir, 'trajectory.json');
    const output = join(dir, 'hops.json');
    await writeFile(input, JSON.stringify(trajectory));
    const { report } = await analyzeHops({ input });
    const written = await writeReportFile(output, report);
    const text = await readFile(output, 'utf8');
    assert.ok(text.endsWith('}\n'));
    assert.equal(written.hash, hashCanonicalJsonString(text.slice(0, -1)));
    assert.match(written.hash, /^[0-9a-f]{64}$/);
    assert.deepEqual(JSON.parse(text), JSON.parse(JSON.stringify(report)));
  });
});

test('invalid trajectory files raise TrajectoryLoadError with issues', async () => {
  await withWorkspace(async (dir) => {
    const input = join(dir, 'bad.json');
    await writeFile(input, JSON.stringify({ timesteps: 'none', amplitudes: [], centers: [] }));
    await assert.rejects(
      analyzeHops({ input }),
      (error: unknown) =>
        error instanceof TrajectoryLoadError &&
        error.sourceName === 'bad.json' &&
        error.issues?.[0].code === 'trajectory/timesteps/type',
    );
  });
});

test('resolveRuntimeConfig falls back to defaults without a file', async () => {
  const { config, warnings } = await resolveRuntimeConfig(undefined, { bins: 64 });
  assert.deepEqual(config, {
    mode: 'density',
    bins: 64,
    bandwidth: 'scott',
    timestepsPerPicosecond: 1000,
  });
  assert.deepEqual(warnings, []);
});
