export type CenterId = number | string;

/**
 * One MS-EVB frame: the CI coefficient for every candidate bonding topology
 * and the identifier of the molecule hosting the excess proton.
 */
export type Frame = {
  readonly timestep: number;
  readonly amplitudes: readonly number[];
  readonly center: CenterId;
};

/** Frame-aligned sequences as delivered by the ingestion side. */
export type TrajectoryArrays = {
  readonly timesteps: readonly number[];
  readonly amplitudeVectors: readonly (readonly number[])[];
  readonly centers: readonly CenterId[];
};

export type Trajectory = TrajectoryArrays & {
  readonly frameCount: number;
};

export type TrajectoryMetadata = {
  readonly source?: string;
  readonly description?: string;
};

export type TrajectoryDocument = TrajectoryArrays & {
  readonly metadata?: TrajectoryMetadata;
};

export type ValidationSeverity = 'error' | 'warning';

export interface ValidationIssue {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: ValidationSeverity;
}
