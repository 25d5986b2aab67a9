import type { BandwidthSetting } from '../density/kernelDensity.js';
import type { ValidationIssue } from '../trajectory/types.js';

export const ANALYSIS_MODES = ['density', 'single-energy', 'difference-energy'] as const;

export type AnalysisMode = (typeof ANALYSIS_MODES)[number];

export type AnalysisConfig = {
  mode: AnalysisMode;
  bins: number;
  bandwidth: BandwidthSetting;
  timestepsPerPicosecond: number;
};

export type AnalysisConfigInit = Partial<AnalysisConfig>;

const INTERNAL_DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  mode: 'density',
  bins: 200,
  bandwidth: 'scott',
  // MD timesteps are 1 fs, the hop plot is drawn in ps.
  timestepsPerPicosecond: 1000,
};

const BIN_BOUNDS = { min: 2, max: 100_000 } as const;

export const ANALYSIS_CONFIG_DEFAULT: Readonly<AnalysisConfig> = Object.freeze({
  ...INTERNAL_DEFAULT_ANALYSIS_CONFIG,
});

export const isAnalysisMode = (value: unknown): value is AnalysisMode =>
  ANALYSIS_MODES.some((mode) => mode === value);

const sanitizeBins = (value: number | undefined): number => {
  if (value == null || !Number.isFinite(value)) return INTERNAL_DEFAULT_ANALYSIS_CONFIG.bins;
  const floored = Math.floor(value);
  if (floored < BIN_BOUNDS.min) return BIN_BOUNDS.min;
  if (floored > BIN_BOUNDS.max) return BIN_BOUNDS.max;
  return floored;
};

const sanitizeBandwidth = (value: BandwidthSetting | undefined): BandwidthSetting => {
  if (value === 'scott' || value === 'silverman') return value;
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) return value;
  return INTERNAL_DEFAULT_ANALYSIS_CONFIG.bandwidth;
};

const sanitizeTimestepScale = (value: number | undefined): number =>
  value != null && Number.isFinite(value) && value > 0
    ? value
    : INTERNAL_DEFAULT_ANALYSIS_CONFIG.timestepsPerPicosecond;

const sanitizeMode = (value: unknown): AnalysisMode =>
  isAnalysisMode(value) ? value : INTERNAL_DEFAULT_ANALYSIS_CONFIG.mode;

export const createAnalysisConfig = (init?: AnalysisConfigInit): AnalysisConfig => ({
  mode: sanitizeMode(init?.mode),
  bins: sanitizeBins(init?.bins),
  bandwidth: sanitizeBandwidth(init?.bandwidth),
  timestepsPerPicosecond: sanitizeTimestepScale(init?.timestepsPerPicosecond),
});

export const mergeAnalysisConfig = (
  base: AnalysisConfig,
  overrides: AnalysisConfigInit,
): AnalysisConfig => {
  const defined: AnalysisConfigInit = {};
  if (overrides.mode !== undefined) defined.mode = overrides.mode;
  if (overrides.bins !== undefined) defined.bins = overrides.bins;
  if (overrides.bandwidth !== undefined) defined.bandwidth = overrides.bandwidth;
  if (overrides.timestepsPerPicosecond !== undefined) {
    defined.timestepsPerPicosecond = overrides.timestepsPerPicosecond;
  }
  return createAnalysisConfig({ ...base, ...defined });
};

export const getAnalysisConfigBounds = () => ({
  bins: { ...BIN_BOUNDS },
  modes: [...ANALYSIS_MODES],
  bandwidthRules: ['scott', 'silverman'] as const,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export class AnalysisConfigValidationError extends Error {
  constructor(
    message: string,
    readonly issues: ValidationIssue[],
  ) {
    super(message);
    this.name = 'AnalysisConfigValidationError';
  }
}

export type AnalysisConfigValidationResult = {
  config: AnalysisConfig;
  issues: ValidationIssue[];
};

/**
 * Validates a JSON config file. Unknown keys only warn; type errors are
 * fatal. Values that pass the type checks still go through the same
 * clamping as createAnalysisConfig.
 */
export function validateAnalysisConfig(payload: unknown): AnalysisConfigValidationResult {
  const issues: ValidationIssue[] = [];
  if (!isRecord(payload)) {
    issues.push({
      code: 'config/type',
      message: 'Analysis config must be an object',
      path: [],
      severity: 'error',
    });
    throw new AnalysisConfigValidationError('Analysis config must be an object', issues);
  }

  const init: AnalysisConfigInit = {};

  if (payload.mode !== undefined) {
    if (isAnalysisMode(payload.mode)) {
      init.mode = payload.mode;
    } else {
      issues.push({
        code: 'config/mode',
        message: `mode must be one of ${ANALYSIS_MODES.join(', ')}`,
        path: ['mode'],
        severity: 'error',
      });
    }
  }

  if (payload.bins !== undefined) {
    const bins = payload.bins;
    if (typeof bins !== 'number' || !Number.isInteger(bins)) {
      issues.push({
        code: 'config/bins',
        message: 'bins must be an integer',
        path: ['bins'],
        severity: 'error',
      });
    } else {
      if (bins < BIN_BOUNDS.min || bins > BIN_BOUNDS.max) {
        issues.push({
          code: 'config/bins/range',
          message: `bins is outside [${BIN_BOUNDS.min}, ${BIN_BOUNDS.max}] and will be clamped`,
          path: ['bins'],
          severity: 'warning',
        });
      }
      init.bins = bins;
    }
  }

  if (payload.bandwidth !== undefined) {
    const bandwidth = payload.bandwidth;
    if (bandwidth === 'scott' || bandwidth === 'silverman') {
      init.bandwidth = bandwidth;
    } else if (typeof bandwidth === 'number' && Number.isFinite(bandwidth) && bandwidth > 0) {
      init.bandwidth = bandwidth;
    } else {
      issues.push({
        code: 'config/bandwidth',
        message: 'bandwidth must be "scott", "silverman" or a positive number',
        path: ['bandwidth'],
        severity: 'error',
      });
    }
  }

  if (payload.timestepsPerPicosecond !== undefined) {
    const scale = payload.timestepsPerPicosecond;
    if (typeof scale === 'number' && Number.isFinite(scale) && scale > 0) {
      init.timestepsPerPicosecond = scale;
    } else {
      issues.push({
        code: 'config/timestepsPerPicosecond',
        message: 'timestepsPerPicosecond must be a positive number',
        path: ['timestepsPerPicosecond'],
        severity: 'error',
      });
    }
  }

  const known = new Set<string>(['mode', 'bins', 'bandwidth', 'timestepsPerPicosecond']);
  for (const key of Object.keys(payload)) {
    if (!known.has(key)) {
      issues.push({
        code: 'config/unknown-key',
        message: `Unknown config key "${key}" is ignored`,
        path: [key],
        severity: 'warning',
      });
    }
  }

  if (issues.some((issue) => issue.severity === 'error')) {
    throw new AnalysisConfigValidationError('Analysis config validation failed', issues);
  }

  return { config: createAnalysisConfig(init), issues };
}
