import { MemoryBudgetExceededError } from './errors.js';

/** Bytes a session currently buffers, per direction. */
export interface MemoryUsage {
  /** Reassembly buffers, plus completed messages waiting for an earlier one. */
  incoming: number;
  /** Outgoing fragments not yet flushed or acknowledged. */
  outgoing: number;
  /** The configured cap that applies to each direction. */
  budget: number;
}

/**
 * Caps what a peer can make the session hold: fragments of messages that never
 * complete on the way in, fragments it never acknowledges on the way out.
 */
export class MemoryGuard {
  constructor(public readonly budget: number) {}

  public usage(incoming: number, outgoing: number): MemoryUsage {
    return { incoming, outgoing, budget: this.budget };
  }

  /**
   * @throws {MemoryBudgetExceededError} If either direction holds more than
   * the budget. Incoming is checked first.
   */
  public enforce(incoming: number, outgoing: number): void {
    if (incoming > this.budget) {
      throw new MemoryBudgetExceededError('incoming', incoming, this.budget);
    }
    if (outgoing > this.budget) {
      throw new MemoryBudgetExceededError('outgoing', outgoing, this.budget);
    }
  }
}
