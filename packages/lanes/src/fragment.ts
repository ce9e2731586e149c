import { MessageTooLargeError } from './errors.js';
import { MAX_FRAGMENTS, type Fragment, type FragmentHeader } from './packet.js';
import type { Seq } from './seq.js';

/** Number of fragments a message of `length` bytes is split into. */
export function fragmentCount(length: number, payloadSize: number): number {
  return Math.max(1, Math.ceil(length / payloadSize));
}

/**
 * Splits messages into fragments of `payloadSize` bytes. Every fragment but
 * the last is exactly that long; an empty message becomes a single empty
 * fragment.
 */
export class Fragmenter {
  constructor(public readonly payloadSize: number) {}

  /** Largest message, in bytes, that still fits in `MAX_FRAGMENTS` fragments. */
  public get maxMessageSize(): number {
    return this.payloadSize * MAX_FRAGMENTS;
  }

  /**
   * Returns the fragments of `payload`, highest index first. Payloads are
   * views into `payload`.
   * @throws {MessageTooLargeError} If more than `MAX_FRAGMENTS` fragments would
   * be needed.
   */
  public fragment(laneIndex: number, messageSeq: Seq, payload: Uint8Array): Fragment[] {
    const count = fragmentCount(payload.length, this.payloadSize);
    if (count > MAX_FRAGMENTS) {
      throw new MessageTooLargeError(payload.length, this.maxMessageSize);
    }

    const fragments: Fragment[] = [];
    for (let index = count - 1; index >= 0; index--) {
      const start = index * this.payloadSize;
      fragments.push({
        header: { laneIndex, messageSeq, index, isLast: index === count - 1 },
        payload: payload.subarray(start, Math.min(start + this.payloadSize, payload.length)),
      });
    }
    return fragments;
  }
}

/**
 * A message being put back together.
 * @internal
 */
interface ReassemblyBuffer {
  bytes: Uint8Array;
  /** One flag per slot; its length is one past the highest index seen. */
  received: Uint8Array;
  receivedCount: number;
  /** Known once the last fragment has arrived. */
  fragmentCount: number | undefined;
  /** Message length, known once the last fragment has arrived. */
  length: number;
  lastActivity: number;
}

/**
 * Reassembles the messages of one lane from their fragments.
 *
 * A buffer is created from the first fragment seen for a message and sized
 * for every index up to it. Fragments travel highest index first, so that
 * first fragment is usually the last one and the size is exact. When a higher
 * index shows up later the buffer is grown and what it already holds is
 * copied over.
 */
export class Reassembler {
  private readonly buffers = new Map<Seq, ReassemblyBuffer>();
  private _bytesUsed = 0;

  constructor(public readonly payloadSize: number) {}

  /** Total capacity of all reassembly buffers, in bytes. */
  public get bytesUsed(): number {
    return this._bytesUsed;
  }

  /** Number of messages currently in progress. */
  public get size(): number {
    return this.buffers.size;
  }

  /** Buffer capacity needed to hold every fragment up to this one. */
  private capacityFor(index: number, isLast: boolean, payloadLength: number): number {
    return isLast ? this.payloadSize * index + payloadLength : this.payloadSize * (index + 1);
  }

  /** Whether a fragment is a duplicate or contradicts what `buffer` holds. */
  private rejects(buffer: ReassemblyBuffer, index: number, isLast: boolean): boolean {
    if (index < buffer.received.length && buffer.received[index]) return true;
    if (buffer.fragmentCount !== undefined && (index >= buffer.fragmentCount || isLast)) {
      return true;
    }
    return isLast && index < buffer.received.length - 1;
  }

  /**
   * Bytes that accepting this fragment would allocate: a new buffer, or the
   * growth of an existing one. `0` for a fragment that fits or would be
   * dropped.
   */
  public allocationFor(header: FragmentHeader, payloadLength: number): number {
    const { messageSeq: seq, index, isLast } = header;
    const buffer = this.buffers.get(seq);
    if (!buffer) return this.capacityFor(index, isLast, payloadLength);
    if (this.rejects(buffer, index, isLast) || index < buffer.received.length) return 0;
    return this.capacityFor(index, isLast, payloadLength) - buffer.bytes.length;
  }

  /**
   * Takes in one fragment. Returns the message payload once its final
   * fragment arrives, `undefined` until then.
   *
   * Duplicates, and fragments that contradict what has been received for the
   * message so far, are dropped without changing any state.
   */
  public accept(header: FragmentHeader, payload: Uint8Array, now: number): Uint8Array | undefined {
    const { messageSeq: seq, index, isLast } = header;
    const size = this.payloadSize;

    let buffer = this.buffers.get(seq);
    if (buffer) {
      if (this.rejects(buffer, index, isLast)) {
        return undefined;
      }
      if (index >= buffer.received.length) {
        this.grow(buffer, this.capacityFor(index, isLast, payload.length), index + 1);
      }
    } else {
      buffer = {
        bytes: new Uint8Array(this.capacityFor(index, isLast, payload.length)),
        received: new Uint8Array(index + 1),
        receivedCount: 0,
        fragmentCount: undefined,
        length: 0,
        lastActivity: now,
      };
      this.buffers.set(seq, buffer);
      this._bytesUsed += buffer.bytes.length;
    }

    buffer.bytes.set(payload, size * index);
    buffer.received[index] = 1;
    buffer.receivedCount++;
    buffer.lastActivity = now;
    if (isLast) {
      buffer.fragmentCount = index + 1;
      buffer.length = size * index + payload.length;
    }

    if (buffer.receivedCount !== buffer.fragmentCount) {
      return undefined;
    }
    this.remove(seq, buffer);
    return buffer.bytes.length === buffer.length
      ? buffer.bytes
      : buffer.bytes.slice(0, buffer.length);
  }

  private grow(buffer: ReassemblyBuffer, capacity: number, slots: number): void {
    const bytes = new Uint8Array(capacity);
    bytes.set(buffer.bytes);
    const received = new Uint8Array(slots);
    received.set(buffer.received);
    this._bytesUsed += bytes.length - buffer.bytes.length;
    buffer.bytes = bytes;
    buffer.received = received;
  }

  private remove(seq: Seq, buffer: ReassemblyBuffer): void {
    this.buffers.delete(seq);
    this._bytesUsed -= buffer.bytes.length;
  }

  /** Drops the in-progress message `seq`, if any. */
  public discard(seq: Seq): boolean {
    const buffer = this.buffers.get(seq);
    if (!buffer) return false;
    this.remove(seq, buffer);
    return true;
  }

  /** Drops every in-progress message whose sequence matches `predicate`. */
  public discardWhere(predicate: (seq: Seq) => boolean): number {
    let dropped = 0;
    for (const [seq, buffer] of this.buffers) {
      if (predicate(seq)) {
        this.remove(seq, buffer);
        dropped++;
      }
    }
    return dropped;
  }

  /** Drops every in-progress message that received nothing since `cutoff`. */
  public discardIdleSince(cutoff: number): number {
    let dropped = 0;
    for (const [seq, buffer] of this.buffers) {
      if (buffer.lastActivity < cutoff) {
        this.remove(seq, buffer);
        dropped++;
      }
    }
    return dropped;
  }

  public clear(): void {
    this.buffers.clear();
    this._bytesUsed = 0;
  }
}
