import type { MaybePromise, PacketBytes } from './types.js';

/**
 * Describes an abstract, full-duplex, packet-oriented link.
 *
 * A link moves whole packets between two peers. It may drop, duplicate or
 * reorder them, but a packet it does deliver must be exactly the bytes that
 * were sent. Anything that meets this contract (a WebSocket, a WebTransport
 * datagram stream, a relay socket, an in-memory queue) can carry a lane
 * session.
 */
export interface PacketLink {
  /**
   * Registers the handler invoked for every packet received from the remote
   * peer. A link holds a single handler; registering again replaces it.
   */
  onPacket(handler: (packet: PacketBytes) => MaybePromise<void>): void;

  /**
   * Sends a packet over the link.
   * @returns A promise that resolves once the packet has been handed to the
   * underlying mechanism. Resolution says nothing about delivery.
   */
  sendPacket(packet: PacketBytes): Promise<void>;

  /**
   * Registers a handler for when the link is closed for any reason. The
   * handler receives an `Error` if the closure was abnormal.
   */
  onClose(handler: (reason?: Error) => MaybePromise<void>): void;

  /**
   * Aborts the link immediately. This should trigger the `onClose` handler
   * with the provided reason.
   */
  abort(reason: Error): Promise<void>;

  /**
   * Closes the link gracefully. This should eventually trigger the `onClose`
   * handler with an `undefined` reason.
   */
  close(): Promise<void>;
}
