import { InsufficientStatesError } from '../trajectory/errors.js';

export type AmplitudePair = {
  dominantSq: number;
  secondarySq: number;
};

export type AmplitudeSamples = {
  dominantSq: number[];
  secondarySq: number[];
};

/**
 * Largest and second-largest CI coefficient of one frame, squared.
 *
 * A value equal to the running maximum still shifts the old maximum into the
 * second slot, so a frame with two identical leading coefficients reports the
 * same value twice. Selection is on the signed coefficients.
 */
export const extractAmplitudePair = (
  amplitudes: readonly number[],
  frameIndex = 0,
): AmplitudePair => {
  let first: number | undefined;
  let second: number | undefined;
  for (const value of amplitudes) {
    if (first === undefined || value >= first) {
      second = first;
      first = value;
    } else if (second === undefined || value > second) {
      second = value;
    }
  }
  if (first === undefined || second === undefined) {
    throw new InsufficientStatesError(frameIndex, amplitudes.length);
  }
  return {
    dominantSq: first * first,
    secondarySq: second * second,
  };
};

export const extractAmplitudeSamples = (
  vectors: readonly (readonly number[])[],
): AmplitudeSamples => {
  const dominantSq: number[] = new Array(vectors.length);
  const secondarySq: number[] = new Array(vectors.length);
  for (let i = 0; i < vectors.length; i++) {
    const pair = extractAmplitudePair(vectors[i], i);
    dominantSq[i] = pair.dominantSq;
    secondarySq[i] = pair.secondarySq;
  }
  return { dominantSq, secondarySq };
};

export type AmplitudeDifferences = {
  direct: number[];
  negated: number[];
};

// c1^2 - c2^2 and its mirror image, fitted separately in difference mode.
export const amplitudeDifferences = (samples: AmplitudeSamples): AmplitudeDifferences => {
  const count = samples.dominantSq.length;
  const direct: number[] = new Array(count);
  const negated: number[] = new Array(count);
  for (let i = 0; i < count; i++) {
    direct[i] = samples.dominantSq[i] - samples.secondarySq[i];
    negated[i] = samples.secondarySq[i] - samples.dominantSq[i];
  }
  return { direct, negated };
};
