export const REQUEST_HEADER_BYTES = 8; // uint32 jsonLen + uint32 binaryLen
export const RESPONSE_HEADER_BYTES = 4; // uint32 jsonLen
export const MAX_RESPONSE_JSON_BYTES = 8 * 1024 * 1024;

/** Header, JSON body and optional binary payload, in the order they go on the wire. */
export const encodeRequestFrame = (payload: Record<string, unknown>, binaryData?: Buffer): Buffer[] => {
  const jsonBytes = Buffer.from(JSON.stringify(payload), 'utf8');
  const binaryBytes = binaryData && binaryData.length > 0 ? binaryData : Buffer.alloc(0);
  const header = Buffer.allocUnsafe(REQUEST_HEADER_BYTES);
  header.writeUInt32LE(jsonBytes.length, 0);
  header.writeUInt32LE(binaryBytes.length, 4);

  return binaryBytes.length > 0 ? [header, jsonBytes, binaryBytes] : [header, jsonBytes];
};

export interface DecodedResponses {
  bodies: string[];
  /** Set when a header announced an impossible length; buffered bytes were dropped. */
  invalidLength?: number;
}

/** Reassembles length-prefixed JSON responses from arbitrarily chunked stdout data. */
export class ResponseFrameDecoder {
  private buffer = Buffer.alloc(0);

  public get bufferedBytes(): number {
    return this.buffer.length;
  }

  public push(chunk: Buffer): DecodedResponses {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    const bodies: string[] = [];

    while (this.buffer.length >= RESPONSE_HEADER_BYTES) {
      const jsonLength = this.buffer.readUInt32LE(0);
      if (jsonLength <= 0 || jsonLength > MAX_RESPONSE_JSON_BYTES) {
        this.buffer = Buffer.alloc(0);
        return { bodies, invalidLength: jsonLength };
      }

      const frameBytes = RESPONSE_HEADER_BYTES + jsonLength;
      if (this.buffer.length < frameBytes) {
        break;
      }

      bodies.push(this.buffer.subarray(RESPONSE_HEADER_BYTES, frameBytes).toString('utf8'));
      this.buffer = Buffer.from(this.buffer.subarray(frameBytes));
    }

    return { bodies };
  }

  public reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}
