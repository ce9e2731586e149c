import { Reassembler } from './fragment.js';
import { isReliable, LaneKind, type Lane } from './lane.js';
import type { FragmentHeader } from './packet.js';
import { distance, nextSeq, precedes, type Seq } from './seq.js';

/**
 * Per-kind delivery state. Each variant holds just what its policy needs to
 * decide whether a message is new.
 * @internal
 */
type DeliveryState =
  | {
      kind: LaneKind.UnreliableUnordered;
      /** Recently delivered sequences, oldest first in `order`. */
      recent: Set<Seq>;
      order: Seq[];
    }
  | {
      kind: LaneKind.UnreliableSequenced;
      lastDelivered: Seq | undefined;
    }
  | {
      kind: LaneKind.ReliableUnordered;
      /** Oldest sequence not delivered yet. */
      pending: Seq;
      /** Sequences after `pending` that were already delivered. */
      delivered: Set<Seq>;
    }
  | {
      kind: LaneKind.ReliableOrdered;
      pending: Seq;
      /** Completed messages waiting for an earlier one. */
      buffered: Map<Seq, Uint8Array>;
      bufferedBytes: number;
    };

/** A message a lane hands over for delivery. */
export interface Delivery {
  seq: Seq;
  payload: Uint8Array;
}

/** @internal */
export interface ReceiveLaneOptions {
  receiveWindowSize: number;
  recentHistorySize: number;
}

function initialState(kind: LaneKind): DeliveryState {
  switch (kind) {
    case LaneKind.UnreliableUnordered:
      return { kind, recent: new Set(), order: [] };
    case LaneKind.UnreliableSequenced:
      return { kind, lastDelivered: undefined };
    case LaneKind.ReliableUnordered:
      return { kind, pending: 0, delivered: new Set() };
    case LaneKind.ReliableOrdered:
      return { kind, pending: 0, buffered: new Map(), bufferedBytes: 0 };
  }
}

/**
 * Manages the incoming messages of a single lane: reassembles them from their
 * fragments and applies the lane's delivery policy.
 *
 * Fragments of a message that was already delivered, was superseded, or lies
 * outside the receive window are dropped before they reach the reassembler.
 *
 * @internal
 */
export class ReceiveLane {
  private readonly reassembler: Reassembler;
  private readonly state: DeliveryState;

  constructor(
    public readonly lane: Lane,
    payloadSize: number,
    private readonly options: ReceiveLaneOptions,
  ) {
    this.reassembler = new Reassembler(payloadSize);
    this.state = initialState(lane.kind);
  }

  public get reliable(): boolean {
    return isReliable(this.lane.kind);
  }

  /** Reassembly buffers plus completed messages held back for ordering. */
  public get bytesUsed(): number {
    const held = this.state.kind === LaneKind.ReliableOrdered ? this.state.bufferedBytes : 0;
    return this.reassembler.bytesUsed + held;
  }

  /** Number of messages currently being reassembled. */
  public get incomplete(): number {
    return this.reassembler.size;
  }

  /**
   * Takes in one fragment and returns the messages that became deliverable, in
   * delivery order. Usually empty; more than one only on a reliable-ordered
   * lane when a gap gets filled.
   */
  public accept(header: FragmentHeader, payload: Uint8Array, now: number): Delivery[] {
    const seq = header.messageSeq;
    if (this.isStale(seq)) return [];
    const message = this.reassembler.accept(header, payload, now);
    if (!message) return [];
    return this.complete(seq, message);
  }

  /**
   * Bytes of reassembly buffer that accepting this fragment would allocate.
   * `0` when it would be dropped or fits an existing buffer.
   */
  public allocationFor(header: FragmentHeader, payloadLength: number): number {
    if (this.isStale(header.messageSeq)) return 0;
    return this.reassembler.allocationFor(header, payloadLength);
  }

  /** Whether a fragment for `seq` can be dropped without looking at it. */
  public isStale(seq: Seq): boolean {
    const state = this.state;
    switch (state.kind) {
      case LaneKind.UnreliableUnordered:
        return state.recent.has(seq);
      case LaneKind.UnreliableSequenced:
        return state.lastDelivered !== undefined && !precedes(state.lastDelivered, seq);
      case LaneKind.ReliableUnordered:
        return !this.inWindow(state.pending, seq) || state.delivered.has(seq);
      case LaneKind.ReliableOrdered:
        return !this.inWindow(state.pending, seq) || state.buffered.has(seq);
    }
  }

  private inWindow(pending: Seq, seq: Seq): boolean {
    const ahead = distance(pending, seq);
    return ahead >= 0 && ahead < this.options.receiveWindowSize;
  }

  private complete(seq: Seq, message: Uint8Array): Delivery[] {
    const state = this.state;
    switch (state.kind) {
      case LaneKind.UnreliableUnordered: {
        state.recent.add(seq);
        state.order.push(seq);
        if (state.order.length > this.options.recentHistorySize) {
          const evicted = state.order.shift();
          if (evicted !== undefined) state.recent.delete(evicted);
        }
        return [{ seq, payload: message }];
      }
      case LaneKind.UnreliableSequenced: {
        state.lastDelivered = seq;
        // Anything still in progress is older now and can never be delivered.
        this.reassembler.discardWhere((other) => !precedes(seq, other));
        return [{ seq, payload: message }];
      }
      case LaneKind.ReliableUnordered: {
        if (seq !== state.pending) {
          state.delivered.add(seq);
          return [{ seq, payload: message }];
        }
        state.pending = nextSeq(state.pending);
        while (state.delivered.delete(state.pending)) {
          state.pending = nextSeq(state.pending);
        }
        return [{ seq, payload: message }];
      }
      case LaneKind.ReliableOrdered: {
        if (seq !== state.pending) {
          state.buffered.set(seq, message);
          state.bufferedBytes += message.length;
          return [];
        }
        const ready: Delivery[] = [{ seq, payload: message }];
        state.pending = nextSeq(state.pending);
        let next = state.buffered.get(state.pending);
        while (next) {
          state.buffered.delete(state.pending);
          state.bufferedBytes -= next.length;
          ready.push({ seq: state.pending, payload: next });
          state.pending = nextSeq(state.pending);
          next = state.buffered.get(state.pending);
        }
        return ready;
      }
    }
  }

  /**
   * Drops incomplete messages that received nothing since `cutoff`. Reliable
   * lanes never drop: the peer keeps resending until the message completes.
   */
  public discardIdleSince(cutoff: number): number {
    if (this.reliable) return 0;
    return this.reassembler.discardIdleSince(cutoff);
  }

  public clear(): void {
    this.reassembler.clear();
    const state = this.state;
    switch (state.kind) {
      case LaneKind.UnreliableUnordered:
        state.recent.clear();
        state.order.length = 0;
        break;
      case LaneKind.UnreliableSequenced:
        break;
      case LaneKind.ReliableUnordered:
        state.delivered.clear();
        break;
      case LaneKind.ReliableOrdered:
        state.buffered.clear();
        state.bufferedBytes = 0;
        break;
    }
  }
}
