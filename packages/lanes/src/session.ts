import { AckEngine } from './ack.js';
import { ByteBucket } from './byte-bucket.js';
import {
  MalformedPacketError,
  MessageTooLargeError,
  SessionTerminatedError,
  UnknownLaneError,
} from './errors.js';
import { Fragmenter } from './fragment.js';
import type { LaneRegistry } from './lane.js';
import { MemoryGuard, type MemoryUsage } from './memory.js';
import {
  decodePacket,
  encodePacket,
  fragmentEncodeLength,
  PACKET_HEADER_LEN,
  type DecodeContext,
  type Packet,
} from './packet.js';
import { ReceiveLane } from './receiver.js';
import { SendLane, type OutgoingFragment } from './sender.js';
import { StatsEstimator, type SessionStats } from './stats.js';
import {
  checkMtu,
  resolveOptions,
  type CompletedMessage,
  type MessageHandle,
  type ResolvedSessionOptions,
  type SessionOptions,
} from './types.js';

/**
 * A packet being filled by `flush`.
 * @internal
 */
interface PacketBuilder {
  entries: { lane: SendLane; fragment: OutgoingFragment }[];
  length: number;
}

/**
 * The protocol engine for one connection. It performs no I/O and starts no
 * timers: the owner feeds it received packets with {@link recv}, sends what
 * {@link flush} returns, and calls {@link update} regularly with the current
 * time to drive retransmission and collect delivered messages.
 *
 * All time values are milliseconds on a monotonic clock of the owner's
 * choosing. The session clock is the `now` passed to the latest `update`
 * (or to the constructor); `flush` and `recv` timestamp with it.
 *
 * @example
 * ```ts
 * const session = new Session({
 *   lanes: [{ index: 0, kind: LaneKind.ReliableOrdered }],
 * });
 * session.send(0, new TextEncoder().encode('hello'));
 * for (const packet of session.flush()) link.sendPacket(packet);
 * ```
 */
export class Session {
  private readonly options: ResolvedSessionOptions;
  private readonly fragmenter: Fragmenter;
  private readonly sendLanes = new Map<number, SendLane>();
  private readonly receiveLanes = new Map<number, ReceiveLane>();
  private readonly acks = new AckEngine();
  private readonly estimator: StatsEstimator;
  private readonly memory: MemoryGuard;
  private readonly bucket: ByteBucket;
  private readonly decodeContext: DecodeContext;
  /** Messages delivered since the last `update`. */
  private ready: CompletedMessage[] = [];
  private clock: number;
  private _mtu: number;
  /** Set when a packet carrying fragments arrived since the last flush. */
  private ackDirty = false;
  /**
   * Incoming usage a refused fragment would have reached. Once set, the next
   * `update` fails with `MemoryBudgetExceededError`.
   */
  private incomingOverflow = 0;
  private _isTerminated = false;
  private terminationReason: unknown = undefined;

  /**
   * @throws {InvalidOptionsError} If an option or a lane is invalid.
   */
  constructor(options: SessionOptions, now = 0) {
    this.options = resolveOptions(options);
    this.clock = now;
    this._mtu = this.options.initialMtu;
    this.fragmenter = new Fragmenter(this.options.fragmentPayloadSize);
    this.estimator = new StatsEstimator(this.options, this.options.lossWindowSize);
    this.memory = new MemoryGuard(this.options.memoryBudgetBytes);
    this.bucket = new ByteBucket(this.options.sendBytesPerSecond);
    this.decodeContext = {
      lanes: this.options.lanes,
      fragmentPayloadSize: this.options.fragmentPayloadSize,
    };

    for (const lane of this.options.lanes) {
      this.sendLanes.set(
        lane.index,
        new SendLane(lane, this.fragmenter, this.options.sendWindowSize),
      );
      this.receiveLanes.set(
        lane.index,
        new ReceiveLane(lane, this.options.fragmentPayloadSize, this.options),
      );
    }
  }

  public get lanes(): LaneRegistry {
    return this.options.lanes;
  }

  /** The packet size ceiling for `flush`. */
  public get mtu(): number {
    return this._mtu;
  }

  /** Payload bytes per fragment, fixed by `minMtu`. */
  public get fragmentPayloadSize(): number {
    return this.options.fragmentPayloadSize;
  }

  /** Largest message `send` accepts. */
  public get maxMessageSize(): number {
    return this.fragmenter.maxMessageSize;
  }

  public get isTerminated(): boolean {
    return this._isTerminated;
  }

  /** The session clock. */
  public get now(): number {
    return this.clock;
  }

  private assertActive(): void {
    if (this._isTerminated) {
      throw new SessionTerminatedError(this.terminationReason);
    }
  }

  /**
   * Queues a message on a lane. The payload is copied; the caller may reuse
   * its buffer right away. Nothing is sent until the next `flush`.
   *
   * @throws {UnknownLaneError} If the lane is not configured.
   * @throws {MessageTooLargeError} If the payload needs more than 256 fragments.
   * @throws {SendWindowFullError} If the lane holds too many outstanding messages.
   */
  public send(laneIndex: number, payload: Uint8Array): MessageHandle {
    this.assertActive();
    const lane = this.sendLanes.get(laneIndex);
    if (!lane) {
      throw new UnknownLaneError(laneIndex);
    }
    if (payload.length > this.fragmenter.maxMessageSize) {
      throw new MessageTooLargeError(payload.length, this.fragmenter.maxMessageSize);
    }
    const seq = lane.push(payload.slice());
    this.estimator.counters.messagesSent++;
    return { lane: laneIndex, seq };
  }

  /**
   * Builds the packets to send now: new fragments, fragments flagged for
   * retransmission, and an acknowledgement-only packet when the peer sent us
   * data and nothing else is going out. Every packet fits the current MTU,
   * and together they fit what the send rate allows.
   */
  public flush(): Uint8Array[] {
    this.assertActive();
    const builders = this.collectDueFragments();
    if (builders.length === 0 && this.ackDirty) {
      builders.push({ entries: [], length: PACKET_HEADER_LEN });
    }

    const { counters } = this.estimator;
    const ack = this.acks.header();
    const packets: Uint8Array[] = [];
    for (const builder of builders) {
      if (!this.bucket.consume(builder.length)) break;
      const packetSeq = this.acks.allocate();
      const packet: Packet = {
        header: { packetSeq, ack },
        fragments: builder.entries.map((entry) => entry.fragment),
      };
      const bytes = encodePacket(packet);
      packets.push(bytes);
      counters.packetsSent++;
      counters.bytesSent += bytes.length;
      this.ackDirty = false;

      if (builder.entries.length === 0) continue;
      const reliable: OutgoingFragment[] = [];
      for (const { lane, fragment } of builder.entries) {
        if (lane.reliable) reliable.push(fragment);
        if (lane.markSent(fragment, this.clock)) counters.retransmissions++;
      }
      this.acks.recordSent(packetSeq, this.clock, reliable);
      this.estimator.loss.recordSent(packetSeq);
    }
    return packets;
  }

  /**
   * Packs due fragments first-fit into packets no larger than the MTU, lane
   * by lane, stopping once the send rate is used up.
   */
  private collectDueFragments(): PacketBuilder[] {
    const builders: PacketBuilder[] = [];
    let total = 0;
    for (const lane of this.sendLanes.values()) {
      for (const fragment of lane.dueFragments()) {
        const len = fragmentEncodeLength(fragment);
        let target = builders.find((builder) => builder.length + len <= this._mtu);
        const cost = target ? len : PACKET_HEADER_LEN + len;
        if (!this.bucket.has(total + cost)) {
          return builders;
        }
        if (!target) {
          target = { entries: [], length: PACKET_HEADER_LEN };
          builders.push(target);
        }
        target.entries.push({ lane, fragment });
        target.length += len;
        total += cost;
      }
    }
    return builders;
  }

  /**
   * Processes a packet received from the peer: applies its acknowledgements
   * and feeds its fragments to their lanes. Messages that complete are
   * returned by the next `update`.
   *
   * Fragments and acknowledgements that refer to sequences no longer tracked
   * are ignored. A fragment whose reassembly buffer would take incoming memory
   * past the budget is dropped, and the next `update` fails.
   *
   * @throws {MalformedPacketError} If the packet cannot be decoded. Nothing in
   * it is applied and the session carries on.
   */
  public recv(bytes: Uint8Array): void {
    this.assertActive();
    const { counters } = this.estimator;
    let packet: Packet;
    try {
      packet = decodePacket(bytes, this.decodeContext);
    } catch (err) {
      if (err instanceof MalformedPacketError) counters.malformedPackets++;
      throw err;
    }
    counters.packetsReceived++;
    counters.bytesReceived += bytes.length;

    this.acks.received.record(packet.header.packetSeq);
    if (packet.fragments.length > 0) this.ackDirty = true;

    for (const sent of this.acks.resolve(packet.header.ack)) {
      counters.packetsAcked++;
      this.estimator.rtt.update(this.clock - sent.sentAt);
      for (const fragment of sent.fragments) {
        const lane = this.sendLanes.get(fragment.header.laneIndex);
        if (lane?.acknowledge(fragment)) {
          counters.messagesAcked++;
          this.options.onAcknowledged?.({
            lane: fragment.header.laneIndex,
            seq: fragment.message.seq,
          });
        }
      }
    }

    const budget = this.options.memoryBudgetBytes;
    let incoming = this.incomingBytes();
    for (const { header, payload } of packet.fragments) {
      const lane = this.receiveLanes.get(header.laneIndex);
      if (!lane) continue;
      // A fragment is never allowed to push reassembly memory past the budget.
      const required = lane.allocationFor(header, payload.length);
      if (incoming + required > budget) {
        this.incomingOverflow = Math.max(this.incomingOverflow, incoming + required);
        continue;
      }
      for (const { seq, payload: message } of lane.accept(header, payload, this.clock)) {
        counters.messagesReceived++;
        this.ready.push({ lane: header.laneIndex, seq, payload: message });
      }
      incoming = this.incomingBytes();
    }
  }

  /**
   * Advances the session clock to `now` and runs the periodic work:
   * refilling the send rate, flagging lost packets and overdue fragments,
   * dropping stale unreliable reassembly buffers and checking the memory
   * budget. Returns the messages delivered since the previous call, in
   * delivery order.
   *
   * A `now` earlier than the session clock leaves the clock where it is.
   *
   * @throws {MemoryBudgetExceededError} If the session buffers more than its
   * budget. The session is terminated.
   */
  public update(now: number): CompletedMessage[] {
    this.assertActive();
    if (now > this.clock) {
      this.bucket.refill(now - this.clock);
      this.clock = now;
    }

    const timeout = this.estimator.retransmissionTimeout();
    for (const lost of this.acks.expire(this.clock, timeout)) {
      this.estimator.counters.packetsLost++;
      this.estimator.loss.recordLost(lost.seq);
    }
    for (const lane of this.sendLanes.values()) {
      lane.markOverdue(this.clock, timeout);
    }
    const idleCutoff = this.clock - this.options.reassemblyTimeout;
    for (const lane of this.receiveLanes.values()) {
      lane.discardIdleSince(idleCutoff);
    }

    try {
      this.memory.enforce(
        Math.max(this.incomingBytes(), this.incomingOverflow),
        this.outgoingBytes(),
      );
    } catch (err) {
      this.terminate(err);
      throw err;
    }

    const ready = this.ready;
    this.ready = [];
    return ready;
  }

  /**
   * Sets the packet size ceiling for future flushes.
   * @throws {InvalidOptionsError} If `mtu` is below `minMtu` or above 65535.
   */
  public setMtu(mtu: number): void {
    this.assertActive();
    checkMtu('mtu', mtu, this.options.minMtu);
    this._mtu = mtu;
  }

  private incomingBytes(): number {
    let total = 0;
    for (const lane of this.receiveLanes.values()) total += lane.bytesUsed;
    return total;
  }

  private outgoingBytes(): number {
    let total = 0;
    for (const lane of this.sendLanes.values()) total += lane.bytesUsed;
    return total;
  }

  public memoryUsage(): MemoryUsage {
    this.assertActive();
    return this.memory.usage(this.incomingBytes(), this.outgoingBytes());
  }

  public stats(): SessionStats {
    this.assertActive();
    return this.estimator.snapshot(this.incomingBytes(), this.outgoingBytes());
  }

  /**
   * Terminates the session and releases everything it buffers. Every later
   * call throws `SessionTerminatedError`, with `reason` as its cause.
   * Idempotent.
   */
  public terminate(reason?: unknown): void {
    if (this._isTerminated) return;
    this._isTerminated = true;
    this.terminationReason = reason;
    this.sendLanes.forEach((lane) => lane.clear());
    this.receiveLanes.forEach((lane) => lane.clear());
    this.acks.clear();
    this.ready = [];
  }
}
