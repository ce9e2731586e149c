import {
  AsyncEventEmitter,
  type MaybePromise,
  type PacketBytes,
  type PacketLink,
} from '@lanewire/transport';
import { resolveConditions, scheduleDeliveries, type LinkConditions } from './conditions.js';

/**
 * Internal events for the MemoryLink.
 * @internal
 */
type LinkEvents = {
  packet: (packet: PacketBytes) => MaybePromise<void>;
  close: (reason?: Error) => void;
};

/**
 * An in-memory implementation of `PacketLink`. It passes packets straight to
 * the linked peer, through the connector's conditions.
 * @internal
 */
class MemoryLink implements PacketLink {
  private readonly events = new AsyncEventEmitter<LinkEvents>();
  private readonly pending = new Set<ReturnType<typeof setTimeout>>();
  private _isClosed = false;
  private remote: MemoryLink | null = null;

  constructor(private readonly conditions: Required<LinkConditions>) {}

  /** Links this instance to its remote peer. */
  public _link(remote: MemoryLink): void {
    this.remote = remote;
  }

  public get isClosed(): boolean {
    return this._isClosed;
  }

  /** Receives a packet from the linked peer. */
  public _receivePacket(packet: PacketBytes): void {
    if (this._isClosed) return;
    this.events.emitAsync('packet', packet).catch((err) => {
      this._destroy(err instanceof Error ? err : new Error(String(err)));
    });
  }

  /** Central, idempotent cleanup logic for the link. */
  public _destroy(reason?: Error): void {
    if (this._isClosed) return;
    this._isClosed = true;
    this.pending.forEach((timer) => clearTimeout(timer));
    this.pending.clear();
    this.events.emit('close', reason);
    this.events.removeAllListeners();
  }

  public onPacket(handler: (packet: PacketBytes) => MaybePromise<void>): void {
    if (this._isClosed) return;
    // A link holds a single packet handler.
    this.events.removeAllListeners('packet');
    this.events.on('packet', handler);
  }

  public onClose(handler: (reason?: Error) => void): void {
    this.events.on('close', handler);
  }

  public sendPacket(packet: PacketBytes): Promise<void> {
    const remote = this.remote;
    if (this._isClosed || !remote) {
      return Promise.reject(new Error('Link is closed.'));
    }

    // The sender may reuse its buffer once this returns.
    const bytes = packet.slice();
    for (const delay of scheduleDeliveries(this.conditions)) {
      if (delay === 0) {
        // queueMicrotask keeps delivery asynchronous, avoiding re-entrant calls.
        queueMicrotask(() => remote._receivePacket(bytes));
        continue;
      }
      const timer = setTimeout(() => {
        this.pending.delete(timer);
        remote._receivePacket(bytes);
      }, delay);
      this.pending.add(timer);
    }
    return Promise.resolve();
  }

  public abort(reason: Error): Promise<void> {
    if (this._isClosed) return Promise.resolve();
    // Asynchronously destroy both ends of the link.
    queueMicrotask(() => {
      this.remote?._destroy(reason);
      this._destroy(reason);
    });
    return Promise.resolve();
  }

  public close(): Promise<void> {
    if (this._isClosed) return Promise.resolve();
    queueMicrotask(() => {
      this.remote?._destroy();
      this._destroy();
    });
    return Promise.resolve();
  }
}

/**
 * A utility that creates a pair of linked `PacketLink` instances, for running
 * two sessions against each other in one process. Both directions share the
 * given conditions.
 *
 * @example
 * ```ts
 * const { client, server } = new MemoryConnector({ lossRate: 0.1 });
 * const a = new LaneTransport(client, { lanes });
 * const b = new LaneTransport(server, { lanes });
 * ```
 */
export class MemoryConnector {
  /** The link representing the client side of the connection. */
  public readonly client: PacketLink;
  /** The link representing the server side of the connection. */
  public readonly server: PacketLink;

  constructor(conditions?: LinkConditions) {
    const resolved = resolveConditions(conditions);
    const clientLink = new MemoryLink(resolved);
    const serverLink = new MemoryLink(resolved);

    clientLink._link(serverLink);
    serverLink._link(clientLink);

    this.client = clientLink;
    this.server = serverLink;
  }
}
