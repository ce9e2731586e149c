import type { AckHeader } from './packet.js';
import type { OutgoingFragment } from './sender.js';
import { addSeq, distance, type Seq } from './seq.js';

/**
 * Width of the acknowledgement bitfield. It matches the `u32` on the wire: a
 * packet can only be acknowledged while it is among the 32 most recent
 * packets the peer has received, so at most 32 packets of reordering are
 * tolerated before an acknowledgement is lost and the retransmission timeout
 * has to recover.
 */
export const ACK_BITS = 32;

/**
 * How many packet sequence numbers back a flushed packet stays tracked. Older
 * records are evicted so an unresponsive peer cannot make the table grow
 * without bound.
 */
export const PACKET_HISTORY = 1024;

/**
 * Tracks which packets we have received from the peer, in the compact form
 * sent back on every outgoing packet:
 *
 * ```text
 * lastReceived: 40
 *         bits: 0b0000..00001001
 *                         ^  ^
 *                         |  +- 40 (40 - 0) received
 *                         +---- 37 (40 - 3) received
 * ```
 */
export class AckHistory {
  private hasReceived = false;
  private lastReceived: Seq = 0;
  private bits = 0;

  /** Marks `seq` as received. Idempotent. */
  public record(seq: Seq): void {
    if (!this.hasReceived) {
      this.hasReceived = true;
      this.lastReceived = seq;
      this.bits = 1;
      return;
    }
    const behind = distance(seq, this.lastReceived);
    if (behind >= 0) {
      // At or before `lastReceived`: set its bit if still in range.
      if (behind < ACK_BITS) {
        this.bits = (this.bits | (1 << behind)) >>> 0;
      }
      return;
    }
    // Newer than anything so far: slide the window forward.
    const shift = -behind;
    this.bits = shift >= ACK_BITS ? 1 : ((this.bits << shift) | 1) >>> 0;
    this.lastReceived = seq;
  }

  public header(): AckHeader {
    return { lastReceived: this.lastReceived, bits: this.bits };
  }
}

/**
 * Lists the packet sequence numbers an ack header reports as received, newest
 * first. `lastReceived` itself is only included when bit 0 is set.
 */
export function acknowledgedSeqs(ack: AckHeader): Seq[] {
  const seqs: Seq[] = [];
  for (let i = 0; i < ACK_BITS; i++) {
    if ((ack.bits >>> i) & 1) {
      seqs.push(addSeq(ack.lastReceived, -i));
    }
  }
  return seqs;
}

/**
 * A packet we flushed that the peer has not acknowledged yet.
 * @internal
 */
export interface SentPacket {
  seq: Seq;
  sentAt: number;
  /** Reliable fragments the packet carried. */
  fragments: OutgoingFragment[];
  /** Set once the packet has outlived the retransmission timeout. */
  lost: boolean;
}

/**
 * Stamps outgoing packets with sequence numbers and acknowledgements, and maps
 * incoming acknowledgements back to the fragments they cover.
 */
export class AckEngine {
  /** Packets received from the peer. */
  public readonly received = new AckHistory();
  private readonly inFlight = new Map<Seq, SentPacket>();
  private nextPacketSeq: Seq = 0;

  /** The acknowledgement header to put on the next outgoing packet. */
  public header(): AckHeader {
    return this.received.header();
  }

  /**
   * Takes the next packet sequence number. The record that would share its
   * slot in the history window, if any, is evicted.
   */
  public allocate(): Seq {
    const seq = this.nextPacketSeq;
    this.nextPacketSeq = addSeq(seq, 1);
    this.inFlight.delete(addSeq(seq, -PACKET_HISTORY));
    return seq;
  }

  /** Remembers a flushed packet so a later acknowledgement can resolve it. */
  public recordSent(seq: Seq, sentAt: number, fragments: OutgoingFragment[]): void {
    this.inFlight.set(seq, { seq, sentAt, fragments, lost: false });
  }

  /**
   * Resolves an incoming ack header. Returns the packets it acknowledged for
   * the first time; sequence numbers we never sent, or that were already
   * acknowledged or evicted, are ignored.
   */
  public resolve(ack: AckHeader): SentPacket[] {
    const acked: SentPacket[] = [];
    for (const seq of acknowledgedSeqs(ack)) {
      const packet = this.inFlight.get(seq);
      if (packet) {
        this.inFlight.delete(seq);
        acked.push(packet);
      }
    }
    return acked;
  }

  /**
   * Flags packets unacknowledged for at least `timeout` as lost and returns
   * them. Each packet is reported once; it stays tracked, since a late
   * acknowledgement still satisfies its fragments.
   */
  public expire(now: number, timeout: number): SentPacket[] {
    const lost: SentPacket[] = [];
    for (const packet of this.inFlight.values()) {
      if (!packet.lost && now - packet.sentAt >= timeout) {
        packet.lost = true;
        lost.push(packet);
      }
    }
    return lost;
  }

  public clear(): void {
    this.inFlight.clear();
  }
}
