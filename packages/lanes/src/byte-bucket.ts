/**
 * Limits how many bytes go out over time, token-bucket style.
 *
 * `flush` consumes bytes as it builds packets and `update` refills the bucket
 * in proportion to the time elapsed, up to one second's worth. A rate of
 * `Infinity` never runs dry.
 */
export class ByteBucket {
  private available: number;

  constructor(public readonly bytesPerSecond: number) {
    this.available = bytesPerSecond;
  }

  public has(n: number): boolean {
    return this.available >= n;
  }

  /** Takes `n` bytes out of the bucket. Returns `false`, taking nothing, if fewer remain. */
  public consume(n: number): boolean {
    if (!this.has(n)) return false;
    if (Number.isFinite(this.available)) {
      this.available -= n;
    }
    return true;
  }

  /** Restores the bytes earned over `elapsedMs` milliseconds. */
  public refill(elapsedMs: number): void {
    if (!Number.isFinite(this.bytesPerSecond) || elapsedMs <= 0) return;
    this.available = Math.min(
      this.bytesPerSecond,
      this.available + (this.bytesPerSecond * elapsedMs) / 1000,
    );
  }
}
