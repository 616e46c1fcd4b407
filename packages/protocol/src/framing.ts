import { DEFAULT_MAX_FRAME_BYTES } from '@agentwire/core';
import { MalformedPayloadError } from './errors.js';

/** Size of the big-endian length prefix. */
export const FRAME_HEADER_BYTES = 4;

/** Prefix `body` with its 4-byte big-endian length. */
export function encodeFrame(body: Uint8Array, maxFrameBytes = DEFAULT_MAX_FRAME_BYTES): Buffer {
  if (body.byteLength > maxFrameBytes) {
    throw new MalformedPayloadError(
      `Frame of ${body.byteLength} bytes exceeds maximum of ${maxFrameBytes} bytes`,
      { length: body.byteLength, max_frame_bytes: maxFrameBytes },
    );
  }
  const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + body.byteLength);
  frame.writeUInt32BE(body.byteLength, 0);
  frame.set(body, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Reassembles length-prefixed frames from arbitrarily split chunks.
 *
 * Feed bytes with `push()` and drain complete bodies with `next()`. A header
 * declaring more than `maxFrameBytes` throws from `next()` before any of the
 * body is buffered.
 */
export class FrameDecoder {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private expected: number | null = null;

  constructor(private readonly maxFrameBytes = DEFAULT_MAX_FRAME_BYTES) {}

  get bufferedBytes(): number {
    return this.buffered;
  }

  push(chunk: Uint8Array): void {
    if (chunk.byteLength === 0) return;
    this.chunks.push(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    this.buffered += chunk.byteLength;
  }

  /** Next complete frame body, or `null` until more bytes arrive. */
  next(): Buffer | null {
    if (this.expected === null) {
      if (this.buffered < FRAME_HEADER_BYTES) return null;
      const length = this.take(FRAME_HEADER_BYTES).readUInt32BE(0);
      if (length > this.maxFrameBytes) {
        this.reset();
        throw new MalformedPayloadError(
          `Frame of ${length} bytes exceeds maximum of ${this.maxFrameBytes} bytes`,
          { length, max_frame_bytes: this.maxFrameBytes },
        );
      }
      this.expected = length;
    }
    if (this.buffered < this.expected) return null;
    const body = this.take(this.expected);
    this.expected = null;
    return body;
  }

  reset(): void {
    this.chunks = [];
    this.buffered = 0;
    this.expected = null;
  }

  private take(n: number): Buffer {
    const first = this.chunks[0];
    if (first && first.byteLength >= n) {
      const out = first.subarray(0, n);
      if (first.byteLength === n) this.chunks.shift();
      else this.chunks[0] = first.subarray(n);
      this.buffered -= n;
      return out;
    }

    const out = Buffer.allocUnsafe(n);
    let offset = 0;
    while (offset < n) {
      const head = this.chunks[0];
      if (!head) break;
      const count = Math.min(head.byteLength, n - offset);
      head.copy(out, offset, 0, count);
      offset += count;
      if (count === head.byteLength) this.chunks.shift();
      else this.chunks[0] = head.subarray(count);
    }
    this.buffered -= n;
    return out;
  }
}
