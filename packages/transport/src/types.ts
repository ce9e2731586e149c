/**
 * Represents a value that can be either synchronous (`T`) or asynchronous (`Promise<T>`).
 * Used for event handlers that may or may not perform asynchronous work.
 *
 * @template T The type of the value.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * An opaque, already-encoded packet as it travels over a link. The link never
 * looks inside it and must deliver it byte-for-byte or not at all.
 */
export type PacketBytes = Uint8Array;
