import { readFile, writeFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';

import {
  createTrajectoryAnalysis,
  type TrajectoryAnalysis,
} from '../analysis/trajectoryAnalysis.js';
import {
  ANALYSIS_CONFIG_DEFAULT,
  createAnalysisConfig,
  mergeAnalysisConfig,
  validateAnalysisConfig,
  type AnalysisConfig,
  type AnalysisConfigInit,
} from '../config/analysisConfig.js';
import { createKernelDensityEstimator } from '../density/kernelDensity.js';
import type { DensityEstimator } from '../density/types.js';
import {
  buildHopReport,
  buildProfileReport,
  buildSamplesReport,
  serializeReport,
  type AnalysisReport,
  type HopReport,
  type ProfileReport,
  type SamplesReport,
} from '../report/analysisReport.js';
import { loadTrajectoryFromJson } from '../trajectory/loader.js';
import type { TrajectoryDocument, ValidationIssue } from '../trajectory/types.js';

export class TrajectoryLoadError extends Error {
  constructor(
    message: string,
    readonly sourceName: string,
    readonly issues: ValidationIssue[] | undefined,
  ) {
    super(message);
    this.name = 'TrajectoryLoadError';
  }
}

export type LoadedTrajectory = {
  document: TrajectoryDocument;
  sourceName: string;
  warnings: ValidationIssue[];
};

export const readTrajectoryFile = async (path: string): Promise<LoadedTrajectory> => {
  const sourceName = basename(path);
  const payload = await readFile(resolve(process.cwd(), path), 'utf8');
  const result = loadTrajectoryFromJson(payload, sourceName);
  if (result.kind === 'error') {
    throw new TrajectoryLoadError(result.message, sourceName, result.issues);
  }
  return { document: result.document, sourceName, warnings: result.issues };
};

export type RuntimeConfigResult = {
  config: AnalysisConfig;
  configPath?: string;
  warnings: ValidationIssue[];
};

/** Defaults, then the config file, then command-line overrides. */
export const resolveRuntimeConfig = async (
  configPath: string | undefined,
  overrides: AnalysisConfigInit = {},
): Promise<RuntimeConfigResult> => {
  if (!configPath) {
    return {
      config: mergeAnalysisConfig(createAnalysisConfig(ANALYSIS_CONFIG_DEFAULT), overrides),
      warnings: [],
    };
  }
  const raw = await readFile(resolve(process.cwd(), configPath), 'utf8');
  const parsed: unknown = JSON.parse(raw);
  const { config, issues } = validateAnalysisConfig(parsed);
  return {
    config: mergeAnalysisConfig(config, overrides),
    configPath,
    warnings: issues,
  };
};

export type AnalysisRequest = {
  input: string;
  configPath?: string;
  overrides?: AnalysisConfigInit;
  estimator?: DensityEstimator;
};

type PreparedAnalysis = {
  analysis: TrajectoryAnalysis;
  config: AnalysisConfig;
  source: string;
  warnings: ValidationIssue[];
};

const prepareAnalysis = async (request: AnalysisRequest): Promise<PreparedAnalysis> => {
  const { config, warnings: configWarnings } = await resolveRuntimeConfig(
    request.configPath,
    request.overrides,
  );
  const { document, sourceName, warnings } = await readTrajectoryFile(request.input);
  const estimator =
    request.estimator ?? createKernelDensityEstimator({ bandwidth: config.bandwidth });
  return {
    analysis: createTrajectoryAnalysis(document, estimator),
    config,
    source: document.metadata?.source ?? sourceName,
    warnings: [...configWarnings, ...warnings],
  };
};

export type AnalysisOutcome<R extends AnalysisReport> = {
  report: R;
  config: AnalysisConfig;
  warnings: ValidationIssue[];
};

export const analyzeHops = async (request: AnalysisRequest): Promise<AnalysisOutcome<HopReport>> => {
  const { analysis, config, source, warnings } = await prepareAnalysis(request);
  return { report: buildHopReport(analysis, config, source), config, warnings };
};

export const analyzeProfile = async (
  request: AnalysisRequest,
): Promise<AnalysisOutcome<ProfileReport>> => {
  const { analysis, config, source, warnings } = await prepareAnalysis(request);
  return { report: buildProfileReport(analysis, config, source), config, warnings };
};

export const analyzeSamples = async (
  request: AnalysisRequest,
): Promise<AnalysisOutcome<SamplesReport>> => {
  const { analysis, config, source, warnings } = await prepareAnalysis(request);
  return { report: buildSamplesReport(analysis, source), config, warnings };
};

export const writeReportFile = async (
  path: string,
  report: AnalysisReport,
): Promise<{ path: string; hash: string }> => {
  const { json, hash } = serializeReport(report);
  const target = resolve(process.cwd(), path);
  await writeFile(target, `${json}\n`, 'utf8');
  return { path: target, hash };
};
