import type {
  CenterId,
  TrajectoryDocument,
  TrajectoryMetadata,
  ValidationIssue,
} from './types.js';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const toPath = (...parts: (string | number)[]): readonly (string | number)[] => parts;

const pushIssue = (
  issues: ValidationIssue[],
  code: string,
  message: string,
  path: readonly (string | number)[],
  severity: ValidationIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

export class TrajectoryValidationError extends Error {
  constructor(
    message: string,
    readonly issues: ValidationIssue[],
  ) {
    super(message);
    this.name = 'TrajectoryValidationError';
  }
}

export type TrajectoryValidationResult = {
  readonly document: TrajectoryDocument;
  readonly issues: ValidationIssue[];
};

const normaliseTimesteps = (
  value: unknown,
  issues: ValidationIssue[],
  path: readonly (string | number)[],
): number[] => {
  if (!Array.isArray(value)) {
    pushIssue(issues, 'trajectory/timesteps/type', 'timesteps must be an array of integers', path);
    return [];
  }
  const timesteps: number[] = [];
  value.forEach((entry, index) => {
    if (typeof entry !== 'number' || !Number.isInteger(entry)) {
      pushIssue(
        issues,
        'trajectory/timesteps/value',
        'Timestep must be an integer',
        [...path, index],
      );
      return;
    }
    timesteps.push(entry);
  });
  return timesteps;
};

const normaliseAmplitudeVector = (
  value: unknown,
  issues: ValidationIssue[],
  path: readonly (string | number)[],
): number[] | null => {
  if (!Array.isArray(value)) {
    pushIssue(
      issues,
      'trajectory/amplitudes/vector',
      'Each frame must provide an array of CI coefficients',
      path,
    );
    return null;
  }
  const vector: number[] = [];
  let valid = true;
  value.forEach((entry, index) => {
    if (typeof entry !== 'number' || !Number.isFinite(entry)) {
      pushIssue(
        issues,
        'trajectory/amplitudes/value',
        'CI coefficient must be a finite number',
        [...path, index],
      );
      valid = false;
      return;
    }
    vector.push(entry);
  });
  return valid ? vector : null;
};

const normaliseAmplitudes = (
  value: unknown,
  issues: ValidationIssue[],
  path: readonly (string | number)[],
): number[][] => {
  if (!Array.isArray(value)) {
    pushIssue(
      issues,
      'trajectory/amplitudes/type',
      'amplitudes must be an array of coefficient arrays',
      path,
    );
    return [];
  }
  const vectors: number[][] = [];
  value.forEach((entry, index) => {
    const vector = normaliseAmplitudeVector(entry, issues, [...path, index]);
    if (vector) {
      vectors.push(vector);
    }
  });
  return vectors;
};

const normaliseCenters = (
  value: unknown,
  issues: ValidationIssue[],
  path: readonly (string | number)[],
): CenterId[] => {
  if (!Array.isArray(value)) {
    pushIssue(
      issues,
      'trajectory/centers/type',
      'centers must be an array of reaction-center identifiers',
      path,
    );
    return [];
  }
  const centers: CenterId[] = [];
  value.forEach((entry, index) => {
    if (typeof entry === 'number' && Number.isInteger(entry)) {
      centers.push(entry);
      return;
    }
    if (typeof entry === 'string' && entry.length > 0) {
      centers.push(entry);
      return;
    }
    pushIssue(
      issues,
      'trajectory/centers/value',
      'Reaction center must be an integer or a non-empty string',
      [...path, index],
    );
  });
  return centers;
};

const normaliseMetadata = (
  value: unknown,
  issues: ValidationIssue[],
  path: readonly (string | number)[],
): TrajectoryMetadata | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    pushIssue(
      issues,
      'trajectory/metadata/type',
      'metadata should be an object; ignoring it',
      path,
      'warning',
    );
    return undefined;
  }
  return {
    source: asString(value.source) ?? undefined,
    description: asString(value.description) ?? undefined,
  };
};

export function validateTrajectoryDocument(payload: unknown): TrajectoryValidationResult {
  const issues: ValidationIssue[] = [];

  if (!isRecord(payload)) {
    pushIssue(issues, 'trajectory/type', 'Trajectory root must be an object', toPath());
    throw new TrajectoryValidationError('Trajectory root must be an object', issues);
  }

  const timesteps = normaliseTimesteps(payload.timesteps, issues, toPath('timesteps'));
  const amplitudeVectors = normaliseAmplitudes(payload.amplitudes, issues, toPath('amplitudes'));
  const centers = normaliseCenters(payload.centers, issues, toPath('centers'));
  const metadata = normaliseMetadata(payload.metadata, issues, toPath('metadata'));

  const hasFatalIssues = issues.some((issue) => issue.severity === 'error');
  if (hasFatalIssues) {
    throw new TrajectoryValidationError('Trajectory validation failed', issues);
  }

  return {
    document: { timesteps, amplitudeVectors, centers, metadata },
    issues,
  };
}
