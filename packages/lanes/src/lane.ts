import { InvalidOptionsError } from './errors.js';

/**
 * The delivery guarantee a lane provides. Each lane carries exactly one kind
 * for its whole lifetime.
 */
export enum LaneKind {
  /** Messages may be lost, and arrive in any order. Duplicates are dropped. */
  UnreliableUnordered,
  /**
   * Messages may be lost. A message older than one already delivered is
   * dropped, so the application only ever moves forward.
   */
  UnreliableSequenced,
  /** Every message arrives exactly once, in any order. */
  ReliableUnordered,
  /** Every message arrives exactly once, in the order it was sent. */
  ReliableOrdered,
}

/** Whether messages on lanes of this kind are retransmitted until acknowledged. */
export function isReliable(kind: LaneKind): boolean {
  return kind === LaneKind.ReliableUnordered || kind === LaneKind.ReliableOrdered;
}

/** Largest lane index a session accepts. */
export const MAX_LANE_INDEX = 0xffff;

/** User-supplied definition of a lane. */
export interface LaneConfig {
  index: number;
  kind: LaneKind;
}

/** A configured lane. Lanes are frozen once the registry is built. */
export type Lane = Readonly<LaneConfig>;

/**
 * The static set of lanes of a session, indexed by lane index. Both peers must
 * be configured with the same lanes.
 */
export class LaneRegistry implements Iterable<Lane> {
  private readonly lanes = new Map<number, Lane>();

  constructor(configs: readonly LaneConfig[]) {
    if (configs.length === 0) {
      throw new InvalidOptionsError('At least one lane must be configured.');
    }
    for (const { index, kind } of configs) {
      if (!Number.isInteger(index) || index < 0 || index > MAX_LANE_INDEX) {
        throw new InvalidOptionsError(
          `Lane index ${index} must be an integer in 0..${MAX_LANE_INDEX}.`,
        );
      }
      if (typeof LaneKind[kind] !== 'string') {
        throw new InvalidOptionsError(`Lane ${index} has an unknown kind.`);
      }
      if (this.lanes.has(index)) {
        throw new InvalidOptionsError(`Lane ${index} is configured twice.`);
      }
      this.lanes.set(index, Object.freeze({ index, kind }));
    }
  }

  public get size(): number {
    return this.lanes.size;
  }

  public get(index: number): Lane | undefined {
    return this.lanes.get(index);
  }

  public has(index: number): boolean {
    return this.lanes.has(index);
  }

  public [Symbol.iterator](): Iterator<Lane> {
    return this.lanes.values();
  }
}
