import {
  AsyncEventEmitter,
  type MaybePromise,
  type PacketBytes,
  type PacketLink,
} from '@lanewire/transport';
import { FatalError, RecvError } from './errors.js';
import { Session } from './session.js';
import type { SessionStats } from './stats.js';
import type { CompletedMessage, MessageHandle, SessionOptions } from './types.js';

/**
 * Configuration options for a `LaneTransport`.
 */
export interface LaneTransportOptions extends Omit<SessionOptions, 'onAcknowledged'> {
  /**
   * Milliseconds between two automatic `tick`s. `0` disables the timer; the
   * owner then calls `tick` itself.
   * @default 16
   */
  updateInterval?: number;

  /**
   * The monotonic clock the session runs on, in milliseconds.
   * @default performance.now
   */
  clock?: () => number;
}

const defaultOptions: Required<Pick<LaneTransportOptions, 'updateInterval' | 'clock'>> = {
  updateInterval: 16,
  clock: () => performance.now(),
};

/**
 * Defines the top-level events for the transport layer.
 * @internal
 */
type TransportEvents = {
  message: (message: CompletedMessage) => MaybePromise<void>;
  acknowledged: (handle: MessageHandle) => MaybePromise<void>;
  close: (reason?: Error) => MaybePromise<void>;
};

/**
 * Runs a {@link Session} over a {@link PacketLink}.
 *
 * Packets from the link go straight into the session. On every tick the
 * transport updates the session, emits the messages it delivered and sends
 * whatever it has to flush. A fatal session error aborts the link, which in
 * turn closes the transport with that error.
 *
 * @example
 * ```ts
 * const transport = new LaneTransport(link, {
 *   lanes: [{ index: 0, kind: LaneKind.ReliableOrdered }],
 * });
 * transport.onMessage(({ lane, payload }) => console.log(lane, payload));
 * transport.send(0, new TextEncoder().encode('hello'));
 * ```
 */
export class LaneTransport {
  private readonly events = new AsyncEventEmitter<TransportEvents>();
  private readonly session: Session;
  private readonly clock: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private _isClosed = false;

  constructor(
    private readonly link: PacketLink,
    options: LaneTransportOptions,
  ) {
    const { updateInterval, clock, ...sessionOptions } = { ...defaultOptions, ...options };
    this.clock = clock;
    this.session = new Session(
      {
        ...sessionOptions,
        onAcknowledged: (handle) => this.dispatchAcknowledged(handle),
      },
      this.clock(),
    );
    this.bindLinkListeners();
    if (updateInterval > 0) {
      this.timer = setInterval(() => this.tick(), updateInterval);
    }
  }

  /** Binds to the packet and close events of the underlying link. */
  private bindLinkListeners(): void {
    this.link.onPacket((packet) => this.handlePacket(packet));
    this.link.onClose((reason) => this.finalCleanup(reason));
  }

  public get isClosed(): boolean {
    return this._isClosed;
  }

  /**
   * Queues a message on a lane. It goes out on the next tick, or on an
   * explicit `flush`.
   * @throws {SendError} If the session rejects the message.
   * @throws {SessionTerminatedError} If the transport is closed.
   */
  public send(lane: number, payload: Uint8Array): MessageHandle {
    return this.session.send(lane, payload);
  }

  /**
   * Updates the session with the current time, emits the messages it
   * delivered, then flushes.
   */
  public tick(): void {
    if (this._isClosed) return;
    let messages: CompletedMessage[];
    try {
      messages = this.session.update(this.clock());
    } catch (err) {
      this.fail(err);
      return;
    }
    for (const message of messages) {
      this.events.emitAsync('message', message).catch((err) => {
        console.error(
          `[lanewire] Unhandled error in message handler for lane ${message.lane}:`,
          err,
        );
      });
    }
    this.flush();
  }

  /** Sends every packet the session has ready. */
  public flush(): void {
    if (this._isClosed) return;
    for (const packet of this.session.flush()) {
      this.link.sendPacket(packet).catch((err) => {
        console.error('[lanewire] Link failed to send packet:', err);
      });
    }
  }

  public stats(): SessionStats {
    return this.session.stats();
  }

  /** Registers a handler for messages delivered by the session. */
  public onMessage(handler: (message: CompletedMessage) => MaybePromise<void>): void {
    this.events.on('message', handler);
  }

  /** Registers a handler for reliable messages the peer fully acknowledged. */
  public onAcknowledged(handler: (handle: MessageHandle) => MaybePromise<void>): void {
    this.events.on('acknowledged', handler);
  }

  public onClose(handler: (reason?: Error) => MaybePromise<void>): void {
    this.events.on('close', handler);
  }

  public close(): Promise<void> {
    if (this._isClosed) return Promise.resolve();
    // The link's close event drives `finalCleanup`.
    return this.link.close();
  }

  public abort(reason: Error): Promise<void> {
    if (this._isClosed) return Promise.resolve();
    return this.link.abort(reason);
  }

  private handlePacket(packet: PacketBytes): void {
    if (this._isClosed) return;
    try {
      this.session.recv(packet);
    } catch (err) {
      if (err instanceof RecvError) {
        console.warn(`[lanewire] Received malformed packet, ignoring. ${err.message}`);
        return;
      }
      this.fail(err);
    }
  }

  private dispatchAcknowledged(handle: MessageHandle): void {
    this.events.emitAsync('acknowledged', handle).catch((err) => {
      console.error(
        `[lanewire] Unhandled error in acknowledged handler for lane ${handle.lane}:`,
        err,
      );
    });
  }

  /** Terminates the session and tears the link down after an unrecoverable error. */
  private fail(err: unknown): void {
    const reason = err instanceof Error ? err : new Error(String(err));
    if (err instanceof FatalError) {
      console.error('[lanewire] Session terminated:', reason.message);
    } else {
      console.error('[lanewire] Unexpected session error, aborting link:', err);
    }
    this.session.terminate(reason);
    this.stopTimer();
    this.link.abort(reason).catch((abortErr) => {
      console.error('[lanewire] Link failed to abort:', abortErr);
      this.finalCleanup(reason);
    });
  }

  private stopTimer(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * The final, idempotent cleanup logic for the transport, triggered when the
   * underlying link closes.
   */
  private finalCleanup(reason?: Error): void {
    if (this._isClosed) return;
    this._isClosed = true;
    this.stopTimer();
    this.session.terminate(reason);
    this.events.emitAsync('close', reason).catch((err) => {
      console.error('[lanewire] Unhandled error in close handler:', err);
    });
    this.events.removeAllListeners();
  }
}
