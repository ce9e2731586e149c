import { InvalidOptionsError } from './errors.js';
import { LaneRegistry, type LaneConfig } from './lane.js';
import { MAX_FRAGMENT_HEADER_LEN, MIN_PACKET_LEN, PACKET_HEADER_LEN } from './packet.js';
import { SEQ_HALF, type Seq } from './seq.js';

/** Identifies a message queued with `Session.send`. */
export interface MessageHandle {
  /** The lane the message was sent on. */
  lane: number;
  /** The message sequence number assigned on that lane. */
  seq: Seq;
}

/** A fully reassembled message, ready for the application. */
export interface CompletedMessage {
  lane: number;
  seq: Seq;
  payload: Uint8Array;
}

/**
 * Configuration options for a `Session`.
 */
export interface SessionOptions {
  /**
   * The lanes of the session. Both peers must use the same set.
   */
  lanes: readonly LaneConfig[];

  /**
   * The smallest packet size the link guarantees to carry. It fixes the
   * fragment payload size for the lifetime of the session, so every fragment
   * fits a packet even after the MTU is lowered back to this value.
   * @default 1200
   */
  minMtu?: number;

  /**
   * The largest packet `flush` produces until `setMtu` says otherwise. Several
   * fragments are packed into one packet when it is larger than `minMtu`.
   * @default minMtu
   */
  initialMtu?: number;

  /**
   * The maximum number of bytes the session buffers in either direction:
   * incomplete incoming messages, or outgoing fragments not yet acknowledged.
   * Going over it terminates the session.
   * @default 4194304
   */
  memoryBudgetBytes?: number;

  /**
   * The retransmission timeout in milliseconds used before the first RTT
   * sample is available.
   * @default 1000
   */
  retransmissionTimeoutDefault?: number;

  /**
   * Multiplies the smoothed RTT to derive the retransmission timeout once RTT
   * samples exist.
   * @default 1.5
   */
  retransmissionTimeoutFactor?: number;

  /**
   * Lower bound of the RTT-derived retransmission timeout, in milliseconds.
   * @default 10
   */
  retransmissionTimeoutMin?: number;

  /**
   * The maximum number of messages a lane keeps outstanding: unacknowledged
   * on reliable lanes, unflushed on unreliable ones.
   * @default 4096
   */
  sendWindowSize?: number;

  /**
   * How far ahead of the next expected message a reliable lane accepts
   * fragments. Must not be smaller than the peer's `sendWindowSize`.
   * @default 8192
   */
  receiveWindowSize?: number;

  /**
   * How many recent message sequence numbers an unreliable-unordered lane
   * remembers to drop duplicates.
   * @default 512
   */
  recentHistorySize?: number;

  /**
   * Milliseconds after which an incomplete message on an unreliable lane that
   * received no new fragment is dropped. Reliable lanes never drop.
   * @default 10000
   */
  reassemblyTimeout?: number;

  /**
   * Bytes per second `flush` may send. Unlimited by default. Must be at
   * least `minMtu`, so that a single-fragment packet can always go out.
   * @default Infinity
   */
  sendBytesPerSecond?: number;

  /**
   * The number of most recently sent packets the packet-loss ratio covers.
   * @default 256
   */
  lossWindowSize?: number;

  /**
   * Called when every fragment of a reliable message has been acknowledged by
   * the peer.
   */
  onAcknowledged?: (handle: MessageHandle) => void;
}

/**
 * Session options with every default applied and every value checked.
 * @internal
 */
export type ResolvedSessionOptions = Required<
  Omit<SessionOptions, 'lanes' | 'initialMtu' | 'onAcknowledged'>
> & {
  lanes: LaneRegistry;
  initialMtu: number;
  onAcknowledged: ((handle: MessageHandle) => void) | undefined;
  /** Fragment payload size, derived from `minMtu`. */
  fragmentPayloadSize: number;
};

const defaultOptions: Required<
  Omit<SessionOptions, 'lanes' | 'initialMtu' | 'onAcknowledged'>
> = {
  minMtu: 1200,
  memoryBudgetBytes: 4 * 1024 * 1024,
  retransmissionTimeoutDefault: 1000,
  retransmissionTimeoutFactor: 1.5,
  retransmissionTimeoutMin: 10,
  sendWindowSize: 4096,
  receiveWindowSize: 8192,
  recentHistorySize: 512,
  reassemblyTimeout: 10000,
  sendBytesPerSecond: Infinity,
  lossWindowSize: 256,
};

/** Largest MTU the codec supports. */
export const MAX_MTU = 0xffff;

/** Fragment payload size for a given minimum MTU. */
export function fragmentPayloadSizeFor(minMtu: number): number {
  return minMtu - PACKET_HEADER_LEN - MAX_FRAGMENT_HEADER_LEN;
}

/** Throws unless `mtu` is a packet size the codec can honor. */
export function checkMtu(name: string, mtu: number, min: number): void {
  if (!Number.isInteger(mtu) || mtu < min || mtu > MAX_MTU) {
    throw new InvalidOptionsError(
      `${name} must be an integer in ${min}..${MAX_MTU}, got ${mtu}.`,
    );
  }
}

function checkPositive(name: string, value: number, allowZero = false): void {
  const ok = allowZero ? value >= 0 : value > 0;
  if (Number.isNaN(value) || !ok) {
    throw new InvalidOptionsError(
      `${name} must be ${allowZero ? 'non-negative' : 'positive'}, got ${value}.`,
    );
  }
}

function checkCount(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new InvalidOptionsError(
      `${name} must be an integer in 1..${max}, got ${value}.`,
    );
  }
}

/**
 * Merges `options` over the defaults and validates the result.
 * @internal
 */
export function resolveOptions(options: SessionOptions): ResolvedSessionOptions {
  const merged = { ...defaultOptions, ...options };

  checkMtu('minMtu', merged.minMtu, MIN_PACKET_LEN);
  const initialMtu = options.initialMtu ?? merged.minMtu;
  checkMtu('initialMtu', initialMtu, merged.minMtu);

  checkPositive('memoryBudgetBytes', merged.memoryBudgetBytes);
  checkPositive('retransmissionTimeoutDefault', merged.retransmissionTimeoutDefault);
  checkPositive('retransmissionTimeoutFactor', merged.retransmissionTimeoutFactor);
  checkPositive('retransmissionTimeoutMin', merged.retransmissionTimeoutMin, true);
  checkPositive('reassemblyTimeout', merged.reassemblyTimeout);
  checkPositive('sendBytesPerSecond', merged.sendBytesPerSecond);
  checkCount('sendWindowSize', merged.sendWindowSize, SEQ_HALF);
  checkCount('receiveWindowSize', merged.receiveWindowSize, SEQ_HALF);
  checkCount('recentHistorySize', merged.recentHistorySize, SEQ_HALF);
  checkCount('lossWindowSize', merged.lossWindowSize, SEQ_HALF);
  if (merged.sendBytesPerSecond < merged.minMtu) {
    throw new InvalidOptionsError(
      `sendBytesPerSecond (${merged.sendBytesPerSecond}) must not be smaller than minMtu (${merged.minMtu}).`,
    );
  }
  if (merged.receiveWindowSize < merged.sendWindowSize) {
    throw new InvalidOptionsError(
      `receiveWindowSize (${merged.receiveWindowSize}) must not be smaller than sendWindowSize (${merged.sendWindowSize}).`,
    );
  }

  return {
    ...merged,
    lanes: new LaneRegistry(options.lanes),
    initialMtu,
    onAcknowledged: options.onAcknowledged,
    fragmentPayloadSize: fragmentPayloadSizeFor(merged.minMtu),
  };
}
