export { Session } from './session.js';
export { LaneTransport, type LaneTransportOptions } from './transport.js';

export { LaneKind, LaneRegistry, isReliable, MAX_LANE_INDEX } from './lane.js';
export type { Lane, LaneConfig } from './lane.js';

export {
  MAX_MTU,
  fragmentPayloadSizeFor,
  type CompletedMessage,
  type MessageHandle,
  type SessionOptions,
} from './types.js';

export * from './errors.js';
export * from './seq.js';

export {
  decodePacket,
  encodePacket,
  MAX_FRAGMENTS,
  MAX_FRAGMENT_HEADER_LEN,
  MIN_PACKET_LEN,
  PACKET_HEADER_LEN,
  type AckHeader,
  type DecodeContext,
  type Fragment,
  type FragmentHeader,
  type Packet,
  type PacketHeader,
} from './packet.js';

export { Fragmenter, Reassembler, fragmentCount } from './fragment.js';
export { ACK_BITS, AckHistory, acknowledgedSeqs } from './ack.js';
export { ByteBucket } from './byte-bucket.js';
export type { MemoryUsage } from './memory.js';
export {
  LossEstimator,
  RttEstimator,
  type SessionCounters,
  type SessionStats,
} from './stats.js';
