export type TrajectoryErrorCode =
  | 'trajectory/insufficient-states'
  | 'trajectory/empty'
  | 'trajectory/length-mismatch'
  | 'profile/density-domain'
  | 'density/degenerate-samples';

export class TrajectoryAnalysisError extends Error {
  constructor(
    readonly code: TrajectoryErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TrajectoryAnalysisError';
  }
}

export class InsufficientStatesError extends TrajectoryAnalysisError {
  constructor(
    readonly frameIndex: number,
    readonly stateCount: number,
  ) {
    super(
      'trajectory/insufficient-states',
      `Frame ${frameIndex} has ${stateCount} EVB state(s); at least 2 are required`,
    );
    this.name = 'InsufficientStatesError';
  }
}

export class EmptyTrajectoryError extends TrajectoryAnalysisError {
  constructor() {
    super('trajectory/empty', 'Trajectory contains no frames');
    this.name = 'EmptyTrajectoryError';
  }
}

export type SequenceLengths = {
  readonly timesteps: number;
  readonly amplitudeVectors: number;
  readonly centers: number;
};

export class MismatchedLengthError extends TrajectoryAnalysisError {
  readonly lengths: SequenceLengths;

  constructor(lengths: SequenceLengths) {
    super(
      'trajectory/length-mismatch',
      `Trajectory sequences differ in length (timesteps=${lengths.timesteps}, amplitudes=${lengths.amplitudeVectors}, centers=${lengths.centers})`,
    );
    this.name = 'MismatchedLengthError';
    this.lengths = { ...lengths };
  }
}

export class DensityDomainError extends TrajectoryAnalysisError {
  constructor(
    readonly coordinate: number,
    readonly density: number,
  ) {
    super(
      'profile/density-domain',
      `Density evaluated to ${density} at coordinate ${coordinate}; free energy needs a positive density`,
    );
    this.name = 'DensityDomainError';
  }
}

export class DensityFitError extends TrajectoryAnalysisError {
  constructor(
    readonly sampleCount: number,
    readonly bandwidth: number,
  ) {
    super(
      'density/degenerate-samples',
      `Cannot fit a kernel density to ${sampleCount} sample(s) with bandwidth ${bandwidth}`,
    );
    this.name = 'DensityFitError';
  }
}
