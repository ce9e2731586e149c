import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { MessageTooLargeError } from '../src/errors.js';
import { fragmentCount, Fragmenter, Reassembler } from '../src/fragment.js';
import type { Fragment } from '../src/packet.js';

// ============================================================================
// Generators
// ============================================================================

/** A fragment payload size between 1 and 64 bytes. */
const arbPayloadSize = () => fc.integer({ min: 1, max: 64 });

/** A message of up to 1 KiB. */
const arbMessage = () => fc.uint8Array({ minLength: 0, maxLength: 1024 });

/** A fragmented message, its fragments shuffled. */
const arbShuffledFragments = () =>
  fc
    .tuple(arbPayloadSize(), arbMessage())
    .filter(([size, message]) => fragmentCount(message.length, size) <= 256)
    .chain(([size, message]) => {
      const fragments = new Fragmenter(size).fragment(0, 0, message);
      return fc.tuple(
        fc.constant(size),
        fc.constant(message),
        fc.shuffledSubarray(fragments, {
          minLength: fragments.length,
          maxLength: fragments.length,
        }),
      );
    });

function feed(reassembler: Reassembler, fragments: Fragment[]): Uint8Array[] {
  const completed: Uint8Array[] = [];
  for (const { header, payload } of fragments) {
    const message = reassembler.accept(header, payload, 0);
    if (message) completed.push(message);
  }
  return completed;
}

// ============================================================================
// Fragmenter
// ============================================================================

describe('Fragmenter', () => {
  it('splits a message into fixed-size fragments, highest index first', () => {
    const message = Uint8Array.from({ length: 10 }, (_, i) => i);
    const fragments = new Fragmenter(4).fragment(2, 9, message);
    expect(fragments.map((f) => f.header)).toEqual([
      { laneIndex: 2, messageSeq: 9, index: 2, isLast: true },
      { laneIndex: 2, messageSeq: 9, index: 1, isLast: false },
      { laneIndex: 2, messageSeq: 9, index: 0, isLast: false },
    ]);
    expect(fragments.map((f) => Array.from(f.payload))).toEqual([
      [8, 9],
      [4, 5, 6, 7],
      [0, 1, 2, 3],
    ]);
  });

  it('sends an empty message as one empty fragment', () => {
    const fragments = new Fragmenter(4).fragment(0, 0, new Uint8Array(0));
    expect(fragments).toHaveLength(1);
    expect(fragments[0].header).toEqual({ laneIndex: 0, messageSeq: 0, index: 0, isLast: true });
    expect(fragments[0].payload.length).toBe(0);
  });

  it('splits 5000 bytes into five fragments of at most 1100 bytes', () => {
    const fragments = new Fragmenter(1100).fragment(0, 0, new Uint8Array(5000));
    expect(fragments.map((f) => f.payload.length)).toEqual([600, 1100, 1100, 1100, 1100]);
  });

  it('accepts exactly 256 fragments and rejects more', () => {
    const fragmenter = new Fragmenter(4);
    expect(fragmenter.maxMessageSize).toBe(1024);
    expect(fragmenter.fragment(0, 0, new Uint8Array(1024))).toHaveLength(256);
    expect(() => fragmenter.fragment(0, 0, new Uint8Array(1025))).toThrow(MessageTooLargeError);
  });
});

// ============================================================================
// Reassembler
// ============================================================================

describe('Reassembler', () => {
  it('reassembles any permutation of the fragments', () => {
    fc.assert(
      fc.property(arbShuffledFragments(), ([size, message, fragments]) => {
        const reassembler = new Reassembler(size);
        const completed = feed(reassembler, fragments);
        expect(completed).toHaveLength(1);
        expect(completed[0]).toEqual(message);
        expect(reassembler.size).toBe(0);
        expect(reassembler.bytesUsed).toBe(0);
      }),
    );
  });

  it('completes once every distinct fragment arrived, despite a duplicate', () => {
    fc.assert(
      fc.property(
        arbShuffledFragments().chain(([size, message, fragments]) =>
          fc.tuple(
            fc.constant(size),
            fc.constant(message),
            fc.constant(fragments),
            fc.nat({ max: fragments.length - 1 }),
            fc.nat({ max: fragments.length }),
          ),
        ),
        ([size, message, fragments, pick, at]) => {
          const withDuplicate = [...fragments];
          withDuplicate.splice(at, 0, fragments[pick]);

          const reassembler = new Reassembler(size);
          const seen = new Set<number>();
          let completed: Uint8Array | undefined;
          for (const { header, payload } of withDuplicate) {
            seen.add(header.index);
            completed = reassembler.accept(header, payload, 0);
            if (completed) break;
          }
          expect(seen.size).toBe(fragments.length);
          expect(completed).toEqual(message);
        },
      ),
    );
  });

  it('sizes a buffer exactly from a leading last fragment', () => {
    const reassembler = new Reassembler(4);
    const [last, middle, first] = new Fragmenter(4).fragment(0, 3, new Uint8Array(10));
    expect(reassembler.accept(last.header, last.payload, 0)).toBeUndefined();
    expect(reassembler.bytesUsed).toBe(10);
    expect(reassembler.accept(middle.header, middle.payload, 0)).toBeUndefined();
    expect(reassembler.accept(first.header, first.payload, 0)).toHaveLength(10);
    expect(reassembler.bytesUsed).toBe(0);
  });

  it('grows a buffer when a higher index arrives late', () => {
    const message = Uint8Array.from({ length: 10 }, (_, i) => i + 1);
    const [last, middle, first] = new Fragmenter(4).fragment(0, 3, message);
    const reassembler = new Reassembler(4);

    reassembler.accept(first.header, first.payload, 0);
    expect(reassembler.bytesUsed).toBe(4);
    reassembler.accept(middle.header, middle.payload, 0);
    expect(reassembler.bytesUsed).toBe(8);
    const completed = reassembler.accept(last.header, last.payload, 0);
    expect(completed).toEqual(message);
  });

  it('reports the allocation a fragment would cause', () => {
    const reassembler = new Reassembler(4);
    const [last, middle, first] = new Fragmenter(4).fragment(0, 3, new Uint8Array(10));
    expect(reassembler.allocationFor(last.header, last.payload.length)).toBe(10);
    expect(reassembler.allocationFor(first.header, first.payload.length)).toBe(4);

    reassembler.accept(first.header, first.payload, 0);
    expect(reassembler.allocationFor(first.header, first.payload.length)).toBe(0);
    expect(reassembler.allocationFor(middle.header, middle.payload.length)).toBe(4);
    expect(reassembler.allocationFor(last.header, last.payload.length)).toBe(6);
    expect(reassembler.bytesUsed).toBe(4);

    // Past a known last index, the fragment would be dropped.
    reassembler.accept({ laneIndex: 0, messageSeq: 7, index: 1, isLast: true }, new Uint8Array(2), 0);
    expect(
      reassembler.allocationFor({ laneIndex: 0, messageSeq: 7, index: 3, isLast: false }, 4),
    ).toBe(0);
  });

  it('drops a duplicate without changing state', () => {
    const [last, , first] = new Fragmenter(4).fragment(0, 1, new Uint8Array(10));
    const reassembler = new Reassembler(4);
    reassembler.accept(last.header, last.payload, 0);
    reassembler.accept(first.header, first.payload, 5);
    reassembler.accept(first.header, first.payload, 50);
    // The duplicate did not refresh the buffer's activity time.
    expect(reassembler.discardIdleSince(10)).toBe(1);
  });

  it('drops a last fragment contradicting a higher index already received', () => {
    const reassembler = new Reassembler(4);
    reassembler.accept({ laneIndex: 0, messageSeq: 0, index: 2, isLast: false }, new Uint8Array(4), 0);
    expect(
      reassembler.accept({ laneIndex: 0, messageSeq: 0, index: 1, isLast: true }, new Uint8Array(2), 0),
    ).toBeUndefined();
    expect(reassembler.bytesUsed).toBe(12);
  });

  it('drops fragments past the known last index', () => {
    const reassembler = new Reassembler(4);
    reassembler.accept({ laneIndex: 0, messageSeq: 0, index: 1, isLast: true }, new Uint8Array(2), 0);
    expect(
      reassembler.accept({ laneIndex: 0, messageSeq: 0, index: 3, isLast: false }, new Uint8Array(4), 0),
    ).toBeUndefined();
    expect(reassembler.bytesUsed).toBe(6);
  });

  it('keeps messages apart by sequence', () => {
    const fragmenter = new Fragmenter(4);
    const a = fragmenter.fragment(0, 1, Uint8Array.of(1, 1, 1, 1, 1));
    const b = fragmenter.fragment(0, 2, Uint8Array.of(2, 2, 2, 2, 2));
    const completed = feed(new Reassembler(4), [a[0], b[0], b[1], a[1]]);
    expect(completed.map((m) => Array.from(m))).toEqual([
      [2, 2, 2, 2, 2],
      [1, 1, 1, 1, 1],
    ]);
  });

  it('discards buffers on request', () => {
    const reassembler = new Reassembler(4);
    for (const seq of [1, 2, 3]) {
      reassembler.accept({ laneIndex: 0, messageSeq: seq, index: 1, isLast: false }, new Uint8Array(4), seq);
    }
    expect(reassembler.bytesUsed).toBe(24);
    expect(reassembler.discard(2)).toBe(true);
    expect(reassembler.discard(2)).toBe(false);
    expect(reassembler.discardWhere((seq) => seq === 3)).toBe(1);
    expect(reassembler.size).toBe(1);
    expect(reassembler.discardIdleSince(2)).toBe(1);
    expect(reassembler.size).toBe(0);
    expect(reassembler.bytesUsed).toBe(0);
  });
});
