/**
 * A wrapping 16-bit sequence number, used both for packets (session-wide) and
 * for messages (per lane).
 *
 * Sequence numbers live on a circle:
 *
 * ```text
 *     65534  65535    0      1      2
 * ... --|------|------|------|------|-- ...
 * ```
 *
 * so they must never be compared with `<` or `>`. Use {@link precedes} and
 * {@link distance}, which always take the shorter way around.
 */
export type Seq = number;

/** Number of distinct sequence numbers. */
export const SEQ_SPACE = 0x10000;

/** Largest forward distance that is still considered "ahead". */
export const SEQ_HALF = 0x8000;

/** Folds any integer onto the 16-bit circle. */
export function wrapSeq(value: number): Seq {
  return value & 0xffff;
}

/** The sequence number immediately after `seq`. */
export function nextSeq(seq: Seq): Seq {
  return (seq + 1) & 0xffff;
}

/** `seq + n`, wrapping. `n` may be negative. */
export function addSeq(seq: Seq, n: number): Seq {
  return (seq + n) & 0xffff;
}

/**
 * Signed number of steps from `a` to `b`, i.e. `b - a` computed as a 16-bit
 * two's-complement subtraction. The result lies in `-32768..=32767`.
 *
 * @example
 * ```ts
 * distance(3, 5);     // 2
 * distance(1, 0);     // -1
 * distance(65535, 0); // 1
 * distance(65534, 1); // 3
 * ```
 */
export function distance(a: Seq, b: Seq): number {
  const diff = (b - a) & 0xffff;
  return diff >= SEQ_HALF ? diff - SEQ_SPACE : diff;
}

/**
 * Whether `a` comes strictly before `b` on the sequence circle.
 *
 * `precedes(65535, 0)` is `true`. Two numbers exactly half the circle apart
 * are never ordered either way, and no guarantee holds for values that are
 * really further apart than that.
 */
export function precedes(a: Seq, b: Seq): boolean {
  return distance(a, b) > 0;
}
