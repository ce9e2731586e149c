import { EventEmitter, type DefaultEventMap } from 'tseep';

/**
 * An event emitter whose listeners may be asynchronous. It extends `tseep`'s
 * `EventEmitter` with `emitAsync`, which calls every listener and settles once
 * all of them have finished.
 *
 * @template EventMap - A map of event names to their listener signatures.
 */
export class AsyncEventEmitter<
  EventMap extends DefaultEventMap = DefaultEventMap,
> extends EventEmitter<EventMap> {
  /**
   * Emits an event and waits for all listeners to complete concurrently.
   *
   * Listeners are invoked synchronously, in registration order, before this
   * method first yields; only their completion is awaited. A listener that
   * throws or rejects rejects the returned promise.
   *
   * @example
   * ```ts
   * emitter.on('message', async (msg) => await store(msg));
   * await emitter.emitAsync('message', msg);
   * ```
   */
  async emitAsync<E extends keyof EventMap>(
    event: E,
    ...args: Parameters<EventMap[E]>
  ): Promise<void> {
    const listeners = this.listeners(event);
    await Promise.all(
      listeners.map((fn) => {
        try {
          return Promise.resolve(fn(...args));
        } catch (err) {
          return Promise.reject(err);
        }
      }),
    );
  }
}
