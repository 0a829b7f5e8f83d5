/** Regroups arbitrarily sized stdout chunks into frames of exactly `frameBytes` bytes. */
export class PcmFrameAssembler {
  private pendingChunks: Buffer[] = [];
  private pendingChunkOffset = 0;
  private pendingBytes = 0;

  public constructor(public readonly frameBytes: number) {
    if (!Number.isInteger(frameBytes) || frameBytes <= 0) {
      throw new Error(`Frame size must be a positive integer, got ${frameBytes}`);
    }
  }

  public get buffered(): number {
    return this.pendingBytes;
  }

  public push(chunk: Buffer): Buffer[] {
    if (chunk.length === 0) {
      return [];
    }

    this.pendingChunks.push(Buffer.from(chunk));
    this.pendingBytes += chunk.length;

    const frames: Buffer[] = [];
    while (this.pendingBytes >= this.frameBytes) {
      frames.push(this.read(this.frameBytes));
    }

    return frames;
  }

  /** Returns the leftover partial frame if it holds at least `minBytes`, and empties the queue. */
  public drain(minBytes: number): Buffer | undefined {
    const tail = this.pendingBytes > 0 && this.pendingBytes >= minBytes ? this.read(this.pendingBytes) : undefined;
    this.reset();
    return tail;
  }

  public reset(): void {
    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
  }

  private read(byteCount: number): Buffer {
    const output = Buffer.allocUnsafe(byteCount);
    let writeOffset = 0;

    while (writeOffset < byteCount) {
      const head = this.pendingChunks[0];
      if (!head) {
        break;
      }

      const available = head.length - this.pendingChunkOffset;
      const toCopy = Math.min(available, byteCount - writeOffset);
      head.copy(output, writeOffset, this.pendingChunkOffset, this.pendingChunkOffset + toCopy);

      writeOffset += toCopy;
      this.pendingChunkOffset += toCopy;
      this.pendingBytes -= toCopy;

      if (this.pendingChunkOffset >= head.length) {
        this.pendingChunks.shift();
        this.pendingChunkOffset = 0;
      }
    }

    return writeOffset === byteCount ? output : output.subarray(0, writeOffset);
  }
}
