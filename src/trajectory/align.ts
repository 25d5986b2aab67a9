import { EmptyTrajectoryError, MismatchedLengthError } from './errors.js';
import type { Frame, Trajectory, TrajectoryArrays } from './types.js';

/**
 * Checks that the three frame-aligned sequences agree before any analysis
 * touches them. Alignment is by index; timestep values are not inspected.
 */
export const alignTrajectory = (input: TrajectoryArrays): Trajectory => {
  const lengths = {
    timesteps: input.timesteps.length,
    amplitudeVectors: input.amplitudeVectors.length,
    centers: input.centers.length,
  };
  if (
    lengths.timesteps !== lengths.amplitudeVectors ||
    lengths.timesteps !== lengths.centers
  ) {
    throw new MismatchedLengthError(lengths);
  }
  if (lengths.timesteps === 0) {
    throw new EmptyTrajectoryError();
  }
  return {
    timesteps: input.timesteps,
    amplitudeVectors: input.amplitudeVectors,
    centers: input.centers,
    frameCount: lengths.timesteps,
  };
};

export const trajectoryFrames = (trajectory: Trajectory): Frame[] => {
  const frames: Frame[] = [];
  for (let i = 0; i < trajectory.frameCount; i++) {
    frames.push({
      timestep: trajectory.timesteps[i],
      amplitudes: trajectory.amplitudeVectors[i],
      center: trajectory.centers[i],
    });
  }
  return frames;
};
