import { SendWindowFullError } from './errors.js';
import type { Fragmenter } from './fragment.js';
import { isReliable, type Lane } from './lane.js';
import type { FragmentHeader } from './packet.js';
import { nextSeq, type Seq } from './seq.js';

/**
 * A fragment held by a send lane until it no longer needs to go out.
 * @internal
 */
export interface OutgoingFragment {
  readonly header: FragmentHeader;
  readonly payload: Uint8Array;
  readonly message: OutgoingMessage;
  /** Clock time of the most recent flush that carried it. */
  lastSentAt: number | undefined;
  /** Whether the next flush should carry it. */
  due: boolean;
  acked: boolean;
}

/** @internal */
export interface OutgoingMessage {
  readonly seq: Seq;
  readonly fragments: OutgoingFragment[];
  /** Fragments still held: unflushed ones, or on reliable lanes unacknowledged ones. */
  remaining: number;
}

/**
 * Manages the outgoing messages of a single lane.
 *
 * Unreliable fragments are released as soon as they are flushed. Reliable
 * ones stay until acknowledged: once a flushed fragment has gone without
 * acknowledgement for a retransmission timeout, {@link markOverdue} flags it
 * and the next flush carries it again.
 *
 * @internal
 */
export class SendLane {
  private nextMessageSeq: Seq = 0;
  /** Outstanding messages, in send order. */
  private readonly messages = new Map<Seq, OutgoingMessage>();
  private _bytesUsed = 0;
  public readonly reliable: boolean;

  constructor(
    public readonly lane: Lane,
    private readonly fragmenter: Fragmenter,
    private readonly windowSize: number,
  ) {
    this.reliable = isReliable(lane.kind);
  }

  /** Payload bytes of every fragment still held. */
  public get bytesUsed(): number {
    return this._bytesUsed;
  }

  /**
   * Queues `payload` as the lane's next message and returns its sequence
   * number. The lane keeps a reference to `payload`; callers pass a copy.
   *
   * @throws {SendWindowFullError} If the lane already holds `windowSize`
   * messages, or still holds the message that last used the next sequence.
   * @throws {MessageTooLargeError}
   */
  public push(payload: Uint8Array): Seq {
    const seq = this.nextMessageSeq;
    if (this.messages.size >= this.windowSize || this.messages.has(seq)) {
      throw new SendWindowFullError(this.lane.index, this.windowSize);
    }
    const fragments = this.fragmenter.fragment(this.lane.index, seq, payload);

    const fragmentRecords: OutgoingFragment[] = [];
    const message: OutgoingMessage = {
      seq,
      fragments: fragmentRecords,
      remaining: fragments.length,
    };
    for (const { header, payload: bytes } of fragments) {
      fragmentRecords.push({
        header,
        payload: bytes,
        message,
        lastSentAt: undefined,
        due: true,
        acked: false,
      });
      this._bytesUsed += bytes.length;
    }
    this.messages.set(seq, message);
    this.nextMessageSeq = nextSeq(seq);
    return seq;
  }

  /**
   * Yields the fragments the next flush should carry: messages in send order,
   * each message's fragments highest index first.
   */
  public *dueFragments(): Generator<OutgoingFragment> {
    for (const message of this.messages.values()) {
      for (const fragment of message.fragments) {
        if (fragment.due && !fragment.acked) {
          yield fragment;
        }
      }
    }
  }

  /**
   * Records that `fragment` went out in a packet at `now`. Returns `true` if
   * this was a retransmission.
   */
  public markSent(fragment: OutgoingFragment, now: number): boolean {
    const resent = fragment.lastSentAt !== undefined;
    fragment.lastSentAt = now;
    fragment.due = false;
    if (!this.reliable) {
      this.release(fragment);
    }
    return resent;
  }

  /**
   * Flags for retransmission every reliable fragment whose latest
   * transmission is at least `timeout` old. Returns how many were flagged.
   */
  public markOverdue(now: number, timeout: number): number {
    if (!this.reliable) return 0;
    let flagged = 0;
    for (const message of this.messages.values()) {
      for (const fragment of message.fragments) {
        if (
          !fragment.acked &&
          !fragment.due &&
          fragment.lastSentAt !== undefined &&
          now - fragment.lastSentAt >= timeout
        ) {
          fragment.due = true;
          flagged++;
        }
      }
    }
    return flagged;
  }

  /**
   * Marks `fragment` acknowledged. Returns `true` when this completes its
   * message, which is then released. Fragments already acknowledged, or
   * belonging to a message the lane no longer tracks, are ignored.
   */
  public acknowledge(fragment: OutgoingFragment): boolean {
    if (fragment.acked || this.messages.get(fragment.message.seq) !== fragment.message) {
      return false;
    }
    fragment.acked = true;
    fragment.due = false;
    return this.release(fragment);
  }

  private release(fragment: OutgoingFragment): boolean {
    const { message } = fragment;
    this._bytesUsed -= fragment.payload.length;
    message.remaining--;
    if (message.remaining > 0) return false;
    this.messages.delete(message.seq);
    return true;
  }

  public clear(): void {
    this.messages.clear();
    this._bytesUsed = 0;
  }
}
