import { BufferTooShortError, VarintTooLongError } from './errors.js';

// -----------------------------------------------------------------------------
// Wire primitives
//
// Fixed-width integers are big-endian. Varints are unsigned LEB128, capped at
// MAX_VARINT_BYTES so that a hostile buffer can never make a read loop long or
// produce a value outside the safe integer range.
// -----------------------------------------------------------------------------

export const MAX_VARINT_BYTES = 4;

/** Largest value a varint may carry (28 bits). */
export const MAX_VARINT_VALUE = 2 ** (7 * MAX_VARINT_BYTES) - 1;

/** Number of bytes `value` occupies as a varint. */
export function varintLength(value: number): number {
  let len = 1;
  let rest = Math.floor(value / 128);
  while (rest > 0) {
    len++;
    rest = Math.floor(rest / 128);
  }
  return len;
}

/**
 * Writes into a fixed-size buffer. The caller sizes the buffer up front, so
 * running out of room is a programming error, not a runtime condition.
 */
export class ByteWriter {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  constructor(capacity: number) {
    this.bytes = new Uint8Array(capacity);
    this.view = new DataView(this.bytes.buffer);
  }

  public get length(): number {
    return this.offset;
  }

  public writeU8(value: number): void {
    this.view.setUint8(this.offset, value);
    this.offset += 1;
  }

  public writeU16(value: number): void {
    this.view.setUint16(this.offset, value, false);
    this.offset += 2;
  }

  public writeU32(value: number): void {
    this.view.setUint32(this.offset, value, false);
    this.offset += 4;
  }

  public writeVarint(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_VARINT_VALUE) {
      throw new RangeError(`Value ${value} cannot be encoded as a varint.`);
    }
    let rest = value;
    while (rest >= 0x80) {
      this.writeU8((rest % 0x80) | 0x80);
      rest = Math.floor(rest / 0x80);
    }
    this.writeU8(rest);
  }

  public writeBytes(data: Uint8Array): void {
    this.bytes.set(data, this.offset);
    this.offset += data.length;
  }

  /** Returns the written bytes. The writer must not be used afterwards. */
  public finish(): Uint8Array {
    return this.offset === this.bytes.length
      ? this.bytes
      : this.bytes.subarray(0, this.offset);
  }
}

/**
 * Reads from a buffer received off the wire. Every read checks the remaining
 * length first and throws `BufferTooShortError` instead of reading past the
 * end.
 */
export class ByteReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  public get remaining(): number {
    return this.bytes.length - this.offset;
  }

  private ensure(n: number): void {
    if (this.remaining < n) {
      throw new BufferTooShortError(n, this.remaining);
    }
  }

  public readU8(): number {
    this.ensure(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  public readU16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return value;
  }

  public readU32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.offset, false);
    this.offset += 4;
    return value;
  }

  public readVarint(): number {
    let value = 0;
    for (let i = 0; i < MAX_VARINT_BYTES; i++) {
      const byte = this.readU8();
      value += (byte & 0x7f) * 2 ** (7 * i);
      if ((byte & 0x80) === 0) {
        return value;
      }
    }
    throw new VarintTooLongError(MAX_VARINT_BYTES);
  }

  /** Returns a view of the next `n` bytes, without copying. */
  public readBytes(n: number): Uint8Array {
    this.ensure(n);
    const slice = this.bytes.subarray(this.offset, this.offset + n);
    this.offset += n;
    return slice;
  }
}
