/**
 * Append-only record of proton donors. Entries are pushed on forward hops
 * and never popped; only the most recent one is ever compared against.
 */
export class DonorStack<T> {
  private readonly entries: T[] = [];
  private topIndex = -1;

  constructor(seed: T) {
    this.push(seed);
  }

  push(donor: T) {
    this.topIndex += 1;
    this.entries[this.topIndex] = donor;
  }

  top(): T {
    return this.entries[this.topIndex];
  }

  get depth(): number {
    return this.topIndex + 1;
  }

  toArray(): T[] {
    return this.entries.slice(0, this.topIndex + 1);
  }
}
