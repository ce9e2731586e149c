import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { addSeq, distance, nextSeq, precedes, wrapSeq } from '../src/seq.js';

const arbSeq = () => fc.integer({ min: 0, max: 0xffff });

describe('sequence arithmetic', () => {
  it('orders across the wrap boundary', () => {
    expect(precedes(65535, 0)).toBe(true);
    expect(precedes(0, 65535)).toBe(false);
    expect(precedes(65000, 100)).toBe(true);
    expect(precedes(3, 5)).toBe(true);
    expect(precedes(5, 3)).toBe(false);
  });

  it('never orders a value before itself', () => {
    expect(precedes(42, 42)).toBe(false);
    expect(distance(42, 42)).toBe(0);
  });

  it('computes signed distances', () => {
    expect(distance(3, 5)).toBe(2);
    expect(distance(1, 0)).toBe(-1);
    expect(distance(65535, 0)).toBe(1);
    expect(distance(65534, 1)).toBe(3);
    expect(distance(0, 0x8000)).toBe(-0x8000);
    expect(distance(0, 0x7fff)).toBe(0x7fff);
  });

  it('wraps when stepping', () => {
    expect(nextSeq(65535)).toBe(0);
    expect(addSeq(0, -1)).toBe(65535);
    expect(addSeq(65530, 10)).toBe(4);
    expect(wrapSeq(70000)).toBe(4464);
  });

  it('is antisymmetric for every pair not half the circle apart', () => {
    fc.assert(
      fc.property(arbSeq(), arbSeq(), (a, b) => {
        fc.pre(distance(a, b) !== -0x8000);
        expect(precedes(a, b)).toBe(precedes(b, a) ? false : a !== b);
        expect(distance(a, b) + distance(b, a)).toBe(0);
      }),
    );
  });

  it('recovers the step between a value and its successor', () => {
    fc.assert(
      fc.property(arbSeq(), fc.integer({ min: -0x8000, max: 0x7fff }), (a, n) => {
        expect(distance(a, addSeq(a, n))).toBe(n);
      }),
    );
  });
});
