export { AsyncEventEmitter } from './events.js';
export type { DefaultEventMap } from 'tseep';

export type { PacketLink } from './link.js';

export type { MaybePromise, PacketBytes } from './types.js';
