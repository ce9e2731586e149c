import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  encodePacket,
  LaneKind,
  LaneTransport,
  MemoryBudgetExceededError,
  SessionTerminatedError,
  type CompletedMessage,
  type LaneTransportOptions,
} from '@lanewire/lanes';
import { MemoryConnector, type LinkConditions } from '../src/index.js';

const settle = () => new Promise((resolve) => setTimeout(resolve, 0));

const lanes = [
  { index: 0, kind: LaneKind.ReliableOrdered },
  { index: 1, kind: LaneKind.UnreliableUnordered },
];

/** A Park-Miller generator, for repeatable link conditions. */
function seeded(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}

/** Two manually ticked transports sharing one clock. */
function createPair(conditions?: LinkConditions) {
  const time = { now: 0 };
  const { client, server } = new MemoryConnector(conditions);
  const transportOptions: LaneTransportOptions = {
    lanes,
    updateInterval: 0,
    clock: () => time.now,
  };
  return {
    time,
    client,
    server,
    a: new LaneTransport(client, transportOptions),
    b: new LaneTransport(server, transportOptions),
  };
}

describe('LaneTransport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers a message and reports its acknowledgement', async () => {
    const { a, b } = createPair();
    const received: CompletedMessage[] = [];
    const acknowledged = vi.fn();
    b.onMessage((message) => {
      received.push(message);
    });
    a.onAcknowledged(acknowledged);

    expect(a.send(0, Uint8Array.of(1, 2, 3))).toEqual({ lane: 0, seq: 0 });
    a.flush();
    await settle();
    b.tick();
    await settle();

    expect(received).toHaveLength(1);
    expect(received[0].lane).toBe(0);
    expect(Array.from(received[0].payload)).toEqual([1, 2, 3]);
    expect(acknowledged).toHaveBeenCalledWith({ lane: 0, seq: 0 });
    expect(a.stats().messagesAcked).toBe(1);
  });

  it('delivers every reliable message in order over a lossy link', async () => {
    const { time, a, b } = createPair({ lossRate: 0.3, random: seeded(42) });
    const received: number[] = [];
    b.onMessage(({ lane, payload }) => {
      if (lane === 0) received.push(payload[0]);
    });

    for (let i = 0; i < 20; i++) {
      a.send(0, Uint8Array.of(i));
      a.send(1, Uint8Array.of(i));
    }
    for (let round = 0; round < 300 && a.stats().messagesAcked < 20; round++) {
      time.now += 100;
      a.tick();
      await settle();
      b.tick();
      await settle();
    }

    expect(received).toEqual(Array.from({ length: 20 }, (_, i) => i));
    expect(a.stats().messagesAcked).toBe(20);
    expect(a.stats().retransmissions).toBeGreaterThan(0);
  });

  it('warns about a malformed packet and keeps running', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { client, server } = new MemoryConnector();
    const transport = new LaneTransport(server, { lanes, updateInterval: 0 });

    await client.sendPacket(Uint8Array.of(1, 2, 3));
    await settle();

    expect(warn).toHaveBeenCalledWith(
      '[lanewire] Received malformed packet, ignoring. Malformed packet: truncated',
    );
    expect(transport.isClosed).toBe(false);
    expect(transport.stats().malformedPackets).toBe(1);
  });

  it('closes with the fatal error when the memory budget is exceeded', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { client, server } = new MemoryConnector();
    const transport = new LaneTransport(server, {
      lanes,
      updateInterval: 0,
      minMtu: 1118,
      memoryBudgetBytes: 10_000,
    });
    const onClose = vi.fn();
    transport.onClose(onClose);

    for (let messageSeq = 0; messageSeq < 3; messageSeq++) {
      await client.sendPacket(
        encodePacket({
          header: { packetSeq: messageSeq, ack: { lastReceived: 0, bits: 0 } },
          fragments: [
            {
              header: { laneIndex: 0, messageSeq, index: 3, isLast: false },
              payload: new Uint8Array(1100),
            },
          ],
        }),
      );
    }
    await settle();
    transport.tick();
    await settle();

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose.mock.calls[0][0]).toBeInstanceOf(MemoryBudgetExceededError);
    expect(transport.isClosed).toBe(true);
    expect(() => transport.send(0, Uint8Array.of(1))).toThrow(SessionTerminatedError);
  });

  it('closes both sides gracefully', async () => {
    const { a, b } = createPair();
    const onCloseA = vi.fn();
    const onCloseB = vi.fn();
    a.onClose(onCloseA);
    b.onClose(onCloseB);

    await a.close();
    await settle();

    expect(onCloseA).toHaveBeenCalledWith(undefined);
    expect(onCloseB).toHaveBeenCalledWith(undefined);
    expect(a.isClosed).toBe(true);
    expect(b.isClosed).toBe(true);
  });

  it('ticks on its own timer', async () => {
    const { client, server } = new MemoryConnector();
    const a = new LaneTransport(client, { lanes, updateInterval: 5 });
    const b = new LaneTransport(server, { lanes, updateInterval: 5 });
    const received = vi.fn();
    b.onMessage(received);

    a.send(1, Uint8Array.of(7));
    await vi.waitFor(() => expect(received).toHaveBeenCalledTimes(1));
    await a.close();
    await settle();
    expect(b.isClosed).toBe(true);
  });
});
