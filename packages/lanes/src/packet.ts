import { BufferTooShortError, MalformedPacketError, VarintTooLongError } from './errors.js';
import type { LaneRegistry } from './lane.js';
import { ByteReader, ByteWriter, varintLength } from './octets.js';
import type { Seq } from './seq.js';

// =============================================================================
// Wire layout
// =============================================================================
//
// Packet   = packetSeq:u16 lastReceived:u16 ackBits:u32 Fragment*
// Fragment = laneIndex:varint messageSeq:u16 marker:varint payloadLen:varint payload
// marker   = (fragmentIndex << 1) | isLast
//
// Fragments fill the rest of the packet; a packet with no fragments only
// carries acknowledgements.

/** Size of the fixed packet header. */
export const PACKET_HEADER_LEN = 8;

/**
 * Worst-case size of a fragment header: a lane index up to 0xffff (3 varint
 * bytes), the message sequence (2), a marker up to 511 (2), a payload length
 * below 2^21 (3).
 */
export const MAX_FRAGMENT_HEADER_LEN = 10;

/** Smallest MTU that still leaves room for a one-byte fragment payload. */
export const MIN_PACKET_LEN = PACKET_HEADER_LEN + MAX_FRAGMENT_HEADER_LEN + 1;

/** A message is split into at most this many fragments. */
export const MAX_FRAGMENTS = 256;

/** Acknowledgement state piggybacked on every packet. */
export interface AckHeader {
  /** The most recent packet sequence received from the peer. */
  lastReceived: Seq;
  /** Bit `i` set means packet `lastReceived - i` was received. */
  bits: number;
}

export interface PacketHeader {
  packetSeq: Seq;
  ack: AckHeader;
}

export interface FragmentHeader {
  laneIndex: number;
  messageSeq: Seq;
  /** Position of this fragment within its message, `0..MAX_FRAGMENTS-1`. */
  index: number;
  /** Set on the fragment with the highest index of its message. */
  isLast: boolean;
}

export interface Fragment {
  header: FragmentHeader;
  payload: Uint8Array;
}

export interface Packet {
  header: PacketHeader;
  fragments: Fragment[];
}

function markerOf(header: FragmentHeader): number {
  return header.index * 2 + (header.isLast ? 1 : 0);
}

/** Encoded size of a fragment, header included. */
export function fragmentEncodeLength(fragment: Fragment): number {
  const len = fragment.payload.length;
  return (
    varintLength(fragment.header.laneIndex) +
    2 +
    varintLength(markerOf(fragment.header)) +
    varintLength(len) +
    len
  );
}

/** Encoded size of a whole packet. */
export function packetEncodeLength(packet: Packet): number {
  let len = PACKET_HEADER_LEN;
  for (const fragment of packet.fragments) {
    len += fragmentEncodeLength(fragment);
  }
  return len;
}

/** Serializes a packet into a freshly allocated buffer of exactly its size. */
export function encodePacket(packet: Packet): Uint8Array {
  const writer = new ByteWriter(packetEncodeLength(packet));
  writer.writeU16(packet.header.packetSeq);
  writer.writeU16(packet.header.ack.lastReceived);
  writer.writeU32(packet.header.ack.bits >>> 0);
  for (const { header, payload } of packet.fragments) {
    writer.writeVarint(header.laneIndex);
    writer.writeU16(header.messageSeq);
    writer.writeVarint(markerOf(header));
    writer.writeVarint(payload.length);
    writer.writeBytes(payload);
  }
  return writer.finish();
}

/** What the decoder needs to know to validate a packet. */
export interface DecodeContext {
  /** Lanes a fragment may name. */
  lanes: LaneRegistry;
  /** Fragment payload size; non-last fragments carry exactly this many bytes. */
  fragmentPayloadSize: number;
}

/**
 * Parses and validates a packet. Lengths are checked before they are used, so
 * a truncated or corrupted buffer is reported as malformed and never decodes
 * into a different, valid-looking packet.
 *
 * Fragment payloads are views into `bytes`; copy them before keeping them.
 *
 * @throws {MalformedPacketError} If the packet cannot be decoded or names a
 * lane, index or length the session cannot accept.
 */
export function decodePacket(bytes: Uint8Array, context: DecodeContext): Packet {
  const reader = new ByteReader(bytes);
  try {
    const header: PacketHeader = {
      packetSeq: reader.readU16(),
      ack: { lastReceived: reader.readU16(), bits: reader.readU32() },
    };
    const fragments: Fragment[] = [];
    while (reader.remaining > 0) {
      fragments.push(readFragment(reader, context));
    }
    return { header, fragments };
  } catch (err) {
    if (err instanceof BufferTooShortError) {
      throw new MalformedPacketError('truncated', err);
    }
    if (err instanceof VarintTooLongError) {
      throw new MalformedPacketError('varint too long', err);
    }
    throw err;
  }
}

function readFragment(reader: ByteReader, context: DecodeContext): Fragment {
  const laneIndex = reader.readVarint();
  if (!context.lanes.has(laneIndex)) {
    throw new MalformedPacketError(`unknown lane ${laneIndex}`);
  }
  const messageSeq = reader.readU16();
  const marker = reader.readVarint();
  const index = Math.floor(marker / 2);
  const isLast = marker % 2 === 1;
  if (index >= MAX_FRAGMENTS) {
    throw new MalformedPacketError(`fragment index ${index} out of range`);
  }

  const payloadLen = reader.readVarint();
  if (payloadLen > reader.remaining) {
    throw new MalformedPacketError(
      `payload length ${payloadLen} exceeds the ${reader.remaining} remaining bytes`,
    );
  }
  const size = context.fragmentPayloadSize;
  if (isLast) {
    if (payloadLen > size) {
      throw new MalformedPacketError(
        `last fragment of ${payloadLen} bytes exceeds the fragment size ${size}`,
      );
    }
    if (payloadLen === 0 && index > 0) {
      throw new MalformedPacketError('empty last fragment');
    }
  } else if (payloadLen !== size) {
    throw new MalformedPacketError(
      `fragment of ${payloadLen} bytes, expected ${size}`,
    );
  }

  return {
    header: { laneIndex, messageSeq, index, isLast },
    payload: reader.readBytes(payloadLen),
  };
}
