import type { Seq } from './seq.js';

/**
 * Smoothed round-trip time estimation from acknowledgement samples, as in TCP
 * (RFC 6298): the smoothed RTT moves an eighth of the way towards each sample,
 * the variance a quarter of the way. The first sample seeds both.
 */
export class RttEstimator {
  private _latest: number | undefined;
  private _smoothed: number | undefined;
  private _variance = 0;
  private _min = Infinity;

  /** The most recent sample, in milliseconds. */
  public get latest(): number | undefined {
    return this._latest;
  }

  /** The smoothed RTT, or `undefined` before the first sample. */
  public get smoothed(): number | undefined {
    return this._smoothed;
  }

  /** Mean deviation of the samples from the smoothed RTT. */
  public get variance(): number {
    return this._variance;
  }

  /** The smallest sample seen so far, or `undefined` before the first. */
  public get min(): number | undefined {
    return this._smoothed === undefined ? undefined : this._min;
  }

  public update(sample: number): void {
    this._latest = sample;
    this._min = Math.min(this._min, sample);
    if (this._smoothed === undefined) {
      this._smoothed = sample;
      this._variance = sample / 2;
      return;
    }
    this._variance = (3 * this._variance + Math.abs(this._smoothed - sample)) / 4;
    this._smoothed = (7 * this._smoothed + sample) / 8;
  }
}

/**
 * Packet loss over the most recently sent packets. A packet counts as lost
 * once it has gone unacknowledged past the retransmission timeout.
 */
export class LossEstimator {
  /** Sent packets in send order, each mapped to whether it was lost. */
  private readonly window = new Map<Seq, boolean>();
  private lostCount = 0;

  constructor(public readonly windowSize: number) {}

  public recordSent(seq: Seq): void {
    if (this.window.has(seq)) this.forget(seq);
    this.window.set(seq, false);
    if (this.window.size > this.windowSize) {
      const oldest = this.window.keys().next();
      if (!oldest.done) this.forget(oldest.value);
    }
  }

  public recordLost(seq: Seq): void {
    if (this.window.get(seq) === false) {
      this.window.set(seq, true);
      this.lostCount++;
    }
  }

  private forget(seq: Seq): void {
    if (this.window.get(seq)) this.lostCount--;
    this.window.delete(seq);
  }

  /** Lost packets over tracked packets, `0` when nothing was sent yet. */
  public get ratio(): number {
    return this.window.size === 0 ? 0 : this.lostCount / this.window.size;
  }
}

/** Running totals kept by a session. */
export interface SessionCounters {
  packetsSent: number;
  packetsReceived: number;
  /** Sent packets the peer acknowledged. */
  packetsAcked: number;
  /** Sent packets that outlived the retransmission timeout. */
  packetsLost: number;
  /** Received packets discarded because they could not be decoded. */
  malformedPackets: number;
  bytesSent: number;
  bytesReceived: number;
  messagesSent: number;
  messagesReceived: number;
  /** Reliable messages fully acknowledged by the peer. */
  messagesAcked: number;
  /** Reliable fragments sent again after their first transmission. */
  retransmissions: number;
}

/** A point-in-time view of a session's connection quality and counters. */
export interface SessionStats extends SessionCounters {
  /** Smoothed RTT in milliseconds, `undefined` until the first sample. */
  rtt: number | undefined;
  latestRtt: number | undefined;
  minRtt: number | undefined;
  rttVariance: number;
  /** The retransmission timeout currently in effect, in milliseconds. */
  retransmissionTimeout: number;
  /** Fraction of recently sent packets that were lost, `0..1`. */
  packetLoss: number;
  /** Bytes buffered for incomplete or undelivered incoming messages. */
  incomingBytes: number;
  /** Bytes of outgoing fragments not yet released. */
  outgoingBytes: number;
}

export interface RetransmissionTimeoutOptions {
  retransmissionTimeoutDefault: number;
  retransmissionTimeoutFactor: number;
  retransmissionTimeoutMin: number;
}

/**
 * Gathers the RTT and loss estimates with the session's counters. It only
 * reports; the session decides what to retransmit using
 * {@link StatsEstimator.retransmissionTimeout}.
 */
export class StatsEstimator {
  public readonly rtt = new RttEstimator();
  public readonly loss: LossEstimator;
  public readonly counters: SessionCounters = {
    packetsSent: 0,
    packetsReceived: 0,
    packetsAcked: 0,
    packetsLost: 0,
    malformedPackets: 0,
    bytesSent: 0,
    bytesReceived: 0,
    messagesSent: 0,
    messagesReceived: 0,
    messagesAcked: 0,
    retransmissions: 0,
  };

  constructor(
    private readonly options: RetransmissionTimeoutOptions,
    lossWindowSize: number,
  ) {
    this.loss = new LossEstimator(lossWindowSize);
  }

  /**
   * How long a reliable fragment may go unacknowledged before it is sent
   * again: the smoothed RTT times the configured factor, floored at the
   * configured minimum, or the configured default before any sample.
   */
  public retransmissionTimeout(): number {
    const smoothed = this.rtt.smoothed;
    if (smoothed === undefined) {
      return this.options.retransmissionTimeoutDefault;
    }
    return Math.max(
      this.options.retransmissionTimeoutMin,
      smoothed * this.options.retransmissionTimeoutFactor,
    );
  }

  public snapshot(incomingBytes: number, outgoingBytes: number): SessionStats {
    return {
      ...this.counters,
      rtt: this.rtt.smoothed,
      latestRtt: this.rtt.latest,
      minRtt: this.rtt.min,
      rttVariance: this.rtt.variance,
      retransmissionTimeout: this.retransmissionTimeout(),
      packetLoss: this.loss.ratio,
      incomingBytes,
      outgoingBytes,
    };
  }
}
