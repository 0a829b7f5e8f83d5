import type { AudioWindow } from '../types';

/**
 * Fixed-capacity circular store of mono samples.
 *
 * Sample positions are absolute (counted from the first write since the last `clear`) and the
 * sample at position `p` lives at index `p % capacity`. Writes never block or fail: once the
 * buffer is full the oldest samples are overwritten.
 */
export class RingBuffer {
  private readonly data: Float32Array;
  private totalWritten = 0;
  private retainedFrom = 0;

  public constructor(
    public readonly capacity: number,
    public readonly sampleRate: number
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }

    this.data = new Float32Array(capacity);
  }

  public static forDuration(seconds: number, sampleRate: number): RingBuffer {
    return new RingBuffer(Math.max(1, Math.round(seconds * sampleRate)), sampleRate);
  }

  /** Number of samples currently retrievable. */
  public get available(): number {
    return Math.min(this.totalWritten - this.retainedFrom, this.capacity);
  }

  /** Absolute position one past the newest sample. */
  public get writePosition(): number {
    return this.totalWritten;
  }

  public write(samples: Float32Array): void {
    const incoming = samples.length;
    if (incoming === 0) {
      return;
    }

    // Only the newest `capacity` samples of an oversized write can survive.
    const kept = incoming > this.capacity ? samples.subarray(incoming - this.capacity) : samples;
    const start = (this.totalWritten + incoming - kept.length) % this.capacity;
    const firstSpan = Math.min(kept.length, this.capacity - start);

    this.data.set(kept.subarray(0, firstSpan), start);
    if (firstSpan < kept.length) {
      this.data.set(kept.subarray(firstSpan), 0);
    }

    this.totalWritten += incoming;
  }

  /**
   * Copies the most recent `min(durationSeconds, available)` of audio, oldest first. The copy
   * shares no memory with the buffer.
   */
  public snapshot(durationSeconds = Number.POSITIVE_INFINITY): AudioWindow {
    const requested = Number.isFinite(durationSeconds)
      ? Math.max(0, Math.floor(durationSeconds * this.sampleRate))
      : this.available;
    const count = Math.min(requested, this.available);
    const samples = new Float32Array(count);

    if (count > 0) {
      const start = (this.totalWritten - count) % this.capacity;
      const firstSpan = Math.min(count, this.capacity - start);
      samples.set(this.data.subarray(start, start + firstSpan), 0);
      if (firstSpan < count) {
        samples.set(this.data.subarray(0, count - firstSpan), firstSpan);
      }
    }

    return {
      samples,
      sampleRate: this.sampleRate,
      endPosition: this.totalWritten
    };
  }

  /** Drops every sample before `position`; later writes are unaffected. */
  public discardThrough(position: number): void {
    this.retainedFrom = Math.min(this.totalWritten, Math.max(this.retainedFrom, position));
  }

  public clear(): void {
    this.totalWritten = 0;
    this.retainedFrom = 0;
  }
}
