import { TrajectoryValidationError, validateTrajectoryDocument } from './schema.js';
import type { TrajectoryDocument, ValidationIssue } from './types.js';

export type TrajectoryLoadResult =
  | {
      readonly kind: 'success';
      readonly document: TrajectoryDocument;
      readonly issues: ValidationIssue[];
      readonly sourceName?: string;
    }
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: ValidationIssue[] | undefined;
      readonly sourceName?: string;
    };

export function loadTrajectoryFromJson(json: string, sourceName?: string): TrajectoryLoadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse trajectory JSON',
      issues: undefined,
      sourceName,
    };
  }

  try {
    const { document, issues } = validateTrajectoryDocument(parsed);
    return { kind: 'success', document, issues, sourceName };
  } catch (error) {
    if (error instanceof TrajectoryValidationError) {
      return {
        kind: 'error',
        message: error.message,
        issues: error.issues,
        sourceName,
      };
    }
    throw error;
  }
}
