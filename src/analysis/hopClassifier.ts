import { DonorStack } from './donorStack.js';
import { EmptyTrajectoryError } from '../trajectory/errors.js';
import type { CenterId } from '../trajectory/types.js';

export const NO_PRIOR_DONOR: unique symbol = Symbol('no-prior-donor');

type Donor = CenterId | typeof NO_PRIOR_DONOR;

export type HopKind = 'none' | 'forward' | 'backward';

export type HopStep = {
  frame: number;
  kind: HopKind;
  delta: -1 | 0 | 1;
  cumulative: number;
};

export type HopClassification = {
  counts: number[];
  steps: HopStep[];
  forwardHops: number;
  backwardHops: number;
  netDisplacement: number;
  donorHistory: CenterId[];
};

export type HopTimelinePoint = {
  timestep: number;
  timePs: number;
  hops: number;
};

const classifyTransition = (
  previous: CenterId,
  current: CenterId,
  donors: DonorStack<Donor>,
): HopKind => {
  if (current === previous) {
    return 'none';
  }
  // Only the latest donor counts as "going back"; older donors read as new acceptors.
  if (current === donors.top()) {
    return 'backward';
  }
  donors.push(previous);
  return 'forward';
};

const DELTA: Record<HopKind, -1 | 0 | 1> = {
  none: 0,
  forward: 1,
  backward: -1,
};

/**
 * Hop function h(t) = h(t-1) + dh(t) with h(0) = 0, where dh is +1 for a hop
 * to a new acceptor, -1 for a hop back to the last donor and 0 otherwise.
 */
export const classifyHops = (centers: readonly CenterId[]): HopClassification => {
  if (centers.length === 0) {
    throw new EmptyTrajectoryError();
  }
  const donors = new DonorStack<Donor>(NO_PRIOR_DONOR);
  const counts: number[] = [0];
  const steps: HopStep[] = [];
  let forwardHops = 0;
  let backwardHops = 0;

  for (let frame = 1; frame < centers.length; frame++) {
    const kind = classifyTransition(centers[frame - 1], centers[frame], donors);
    const delta = DELTA[kind];
    const cumulative = counts[frame - 1] + delta;
    counts.push(cumulative);
    steps.push({ frame, kind, delta, cumulative });
    if (kind === 'forward') forwardHops += 1;
    if (kind === 'backward') backwardHops += 1;
  }

  const donorHistory = donors
    .toArray()
    .filter((donor): donor is CenterId => donor !== NO_PRIOR_DONOR);

  return {
    counts,
    steps,
    forwardHops,
    backwardHops,
    netDisplacement: counts[counts.length - 1],
    donorHistory,
  };
};

export const hopCounts = (centers: readonly CenterId[]): number[] => classifyHops(centers).counts;

export const hopTimeline = (
  timesteps: readonly number[],
  counts: readonly number[],
  timestepsPerPicosecond = 1000,
): HopTimelinePoint[] => {
  if (timesteps.length !== counts.length) {
    throw new RangeError(
      `Hop timeline needs one count per timestep (received ${counts.length} for ${timesteps.length})`,
    );
  }
  if (!(timestepsPerPicosecond > 0) || !Number.isFinite(timestepsPerPicosecond)) {
    throw new RangeError(
      `timestepsPerPicosecond must be positive and finite (received ${timestepsPerPicosecond})`,
    );
  }
  return timesteps.map((timestep, index) => ({
    timestep,
    timePs: timestep / timestepsPerPicosecond,
    hops: counts[index],
  }));
};
