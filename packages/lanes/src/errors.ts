// =============================================================================
// Local API misuse
// =============================================================================

/**
 * The base class for errors thrown synchronously by `Session.send`. A send
 * error never affects the session: the message is simply not queued.
 */
export class SendError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'SendError';
    this.cause = cause;
  }
}

/** The lane index passed to `send` is not configured on this session. */
export class UnknownLaneError extends SendError {
  constructor(public readonly laneIndex: number) {
    super(`Lane ${laneIndex} is not configured.`);
    this.name = 'UnknownLaneError';
  }
}

/** The payload would need more fragments than a message may have. */
export class MessageTooLargeError extends SendError {
  constructor(
    public readonly length: number,
    public readonly maxLength: number,
  ) {
    super(`Message too large: ${length} bytes, at most ${maxLength} allowed.`);
    this.name = 'MessageTooLargeError';
  }
}

/**
 * The lane already tracks as many outstanding messages as its send window
 * allows. On reliable lanes this clears as the peer acknowledges messages; on
 * unreliable lanes, as queued messages are flushed.
 */
export class SendWindowFullError extends SendError {
  constructor(
    public readonly laneIndex: number,
    public readonly windowSize: number,
  ) {
    super(
      `Send window of lane ${laneIndex} is full (${windowSize} messages outstanding).`,
    );
    this.name = 'SendWindowFullError';
  }
}

/** A session option, or a lane definition, is invalid. */
export class InvalidOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionsError';
  }
}

/** The session was terminated and can no longer be used. */
export class SessionTerminatedError extends Error {
  constructor(cause?: unknown) {
    super('Session has been terminated.');
    this.name = 'SessionTerminatedError';
    this.cause = cause;
  }
}

// =============================================================================
// Malformed input
// =============================================================================

/**
 * The base class for errors raised by `Session.recv`. These are never fatal:
 * the offending packet is discarded and the session carries on.
 */
export class RecvError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'RecvError';
    this.cause = cause;
  }
}

/**
 * The packet could not be decoded, or decoded into something inconsistent
 * (a truncated header, a length running past the end of the buffer, a lane
 * that is not configured, a fragment of an impossible size).
 */
export class MalformedPacketError extends RecvError {
  constructor(
    public readonly reason: string,
    cause?: unknown,
  ) {
    super(`Malformed packet: ${reason}`, cause);
    this.name = 'MalformedPacketError';
  }
}

/** A read needed more bytes than the buffer had left. */
export class BufferTooShortError extends Error {
  constructor(
    public readonly needed: number,
    public readonly remaining: number,
  ) {
    super(`Buffer too short: needed ${needed} bytes, ${remaining} remaining.`);
    this.name = 'BufferTooShortError';
  }
}

/** A varint ran past the maximum encoded length. */
export class VarintTooLongError extends Error {
  constructor(public readonly maxBytes: number) {
    super(`Varint longer than ${maxBytes} bytes.`);
    this.name = 'VarintTooLongError';
  }
}

// =============================================================================
// Resource exhaustion
// =============================================================================

/**
 * The base class for errors after which the session has been terminated and
 * must be discarded by its owner.
 */
export class FatalError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'FatalError';
    this.cause = cause;
  }
}

/** Which side of the session ran over its memory budget. */
export type MemoryDirection = 'incoming' | 'outgoing';

/**
 * Buffered bytes exceeded `memoryBudgetBytes`. Incoming overruns mean the peer
 * is sending fragments that never complete; outgoing overruns mean it never
 * acknowledges what it receives.
 */
export class MemoryBudgetExceededError extends FatalError {
  constructor(
    public readonly direction: MemoryDirection,
    public readonly bytesUsed: number,
    public readonly budget: number,
  ) {
    super(
      `Memory budget exceeded: ${bytesUsed} ${direction} bytes buffered, budget is ${budget}.`,
    );
    this.name = 'MemoryBudgetExceededError';
  }
}
