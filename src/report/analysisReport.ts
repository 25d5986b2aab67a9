import { hopTimeline, type HopTimelinePoint } from '../analysis/hopClassifier.js';
import type { DensityCurves, EnergyPoint } from '../analysis/freeEnergy.js';
import type { TrajectoryAnalysis } from '../analysis/trajectoryAnalysis.js';
import type { AnalysisConfig, AnalysisMode } from '../config/analysisConfig.js';
import type { BandwidthSetting } from '../density/kernelDensity.js';
import { trajectoryFrames } from '../trajectory/align.js';
import type { CenterId } from '../trajectory/types.js';
import { hashCanonicalJson } from '../serialization/canonicalJson.js';

export const REPORT_VERSION = 1;

type ReportHeader = {
  version: typeof REPORT_VERSION;
  source: string | null;
  frameCount: number;
};

export type HopReport = ReportHeader & {
  kind: 'hops';
  timestepsPerPicosecond: number;
  summary: {
    forwardHops: number;
    backwardHops: number;
    netDisplacement: number;
    donorCount: number;
  };
  timeline: HopTimelinePoint[];
};

export type ProfileResult =
  | { mode: 'density'; curves: DensityCurves }
  | { mode: 'single-energy' | 'difference-energy'; profile: EnergyPoint[] };

export type ProfileReport = ReportHeader & {
  kind: 'profile';
  bins: number;
  bandwidth: BandwidthSetting;
  result: ProfileResult;
};

export type SampleRow = {
  timestep: number;
  center: CenterId;
  dominantSq: number;
  secondarySq: number;
};

export type SamplesReport = ReportHeader & {
  kind: 'samples';
  frames: SampleRow[];
};

export type AnalysisReport = HopReport | ProfileReport | SamplesReport;

const header = (analysis: TrajectoryAnalysis, source: string | undefined): ReportHeader => ({
  version: REPORT_VERSION,
  source: source ?? null,
  frameCount: analysis.trajectory.frameCount,
});

export const runProfile = (
  analysis: TrajectoryAnalysis,
  mode: AnalysisMode,
  bins: number,
): ProfileResult => {
  switch (mode) {
    case 'density':
      return { mode, curves: analysis.densityCurves(bins) };
    case 'single-energy':
    case 'difference-energy':
      return { mode, profile: analysis.freeEnergyProfile(mode, bins) };
  }
};

export const buildHopReport = (
  analysis: TrajectoryAnalysis,
  config: AnalysisConfig,
  source?: string,
): HopReport => {
  const classification = analysis.hopClassification();
  return {
    ...header(analysis, source),
    kind: 'hops',
    timestepsPerPicosecond: config.timestepsPerPicosecond,
    summary: {
      forwardHops: classification.forwardHops,
      backwardHops: classification.backwardHops,
      netDisplacement: classification.netDisplacement,
      donorCount: classification.donorHistory.length,
    },
    timeline: hopTimeline(
      analysis.trajectory.timesteps,
      classification.counts,
      config.timestepsPerPicosecond,
    ),
  };
};

export const buildProfileReport = (
  analysis: TrajectoryAnalysis,
  config: AnalysisConfig,
  source?: string,
): ProfileReport => ({
  ...header(analysis, source),
  kind: 'profile',
  bins: config.bins,
  bandwidth: config.bandwidth,
  result: runProfile(analysis, config.mode, config.bins),
});

export const buildSamplesReport = (
  analysis: TrajectoryAnalysis,
  source?: string,
): SamplesReport => {
  const { dominantSq, secondarySq } = analysis.amplitudeSamples();
  return {
    ...header(analysis, source),
    kind: 'samples',
    frames: trajectoryFrames(analysis.trajectory).map((frame, index) => ({
      timestep: frame.timestep,
      center: frame.center,
      dominantSq: dominantSq[index],
      secondarySq: secondarySq[index],
    })),
  };
};

export const serializeReport = (report: AnalysisReport, indent = 2) =>
  hashCanonicalJson(report, { indent });
