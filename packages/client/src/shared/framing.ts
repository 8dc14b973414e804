import { MessageTooLargeError } from "./errors.js";

const LENGTH_PREFIX_SIZE = 4;

export const DEFAULT_MAX_MESSAGE_SIZE = 32 * 1024 * 1024;

/** Prefixes `payload` with its length as a 4-byte big-endian integer. */
export function encodeFrame(
  payload: Uint8Array,
  maxMessageSize: number = DEFAULT_MAX_MESSAGE_SIZE
): Uint8Array {
  if (payload.byteLength > maxMessageSize) {
    throw new MessageTooLargeError(payload.byteLength, maxMessageSize);
  }
  const out = new Uint8Array(LENGTH_PREFIX_SIZE + payload.byteLength);
  const view = new DataView(out.buffer, out.byteOffset, out.byteLength);
  view.setUint32(0, payload.byteLength);
  out.set(payload, LENGTH_PREFIX_SIZE);
  return out;
}

/**
 * Reassembles length-prefixed frames from arbitrarily sized socket chunks.
 *
 * A chunk may hold several frames, or a frame may span many chunks; frames
 * come out in the order their last byte arrived. Each payload is allocated
 * once from its header and filled in place. Oversized frames are rejected
 * from their header, before the payload is buffered.
 */
export class FrameDecoder {
  private readonly header = new Uint8Array(LENGTH_PREFIX_SIZE);
  private headerFilled = 0;
  private payload: Uint8Array | null = null;
  private payloadFilled = 0;
  private pendingFailure: MessageTooLargeError | null = null;

  constructor(private readonly maxMessageSize: number = DEFAULT_MAX_MESSAGE_SIZE) {}

  get bufferedBytes(): number {
    return this.headerFilled + this.payloadFilled;
  }

  /**
   * Set when an oversized header followed complete frames in the same chunk.
   * Those frames are returned first; the next `push` throws this error.
   */
  get failure(): MessageTooLargeError | null {
    return this.pendingFailure;
  }

  push(chunk: Uint8Array): Uint8Array[] {
    if (this.pendingFailure) {
      throw this.pendingFailure;
    }

    const frames: Uint8Array[] = [];
    let offset = 0;
    while (offset < chunk.byteLength) {
      if (this.payload === null) {
        const take = Math.min(LENGTH_PREFIX_SIZE - this.headerFilled, chunk.byteLength - offset);
        this.header.set(chunk.subarray(offset, offset + take), this.headerFilled);
        this.headerFilled += take;
        offset += take;
        if (this.headerFilled < LENGTH_PREFIX_SIZE) {
          break;
        }

        this.headerFilled = 0;
        const length = new DataView(this.header.buffer).getUint32(0);
        if (length > this.maxMessageSize) {
          const error = new MessageTooLargeError(length, this.maxMessageSize);
          if (frames.length === 0) {
            throw error;
          }
          this.pendingFailure = error;
          return frames;
        }
        this.payload = new Uint8Array(length);
        this.payloadFilled = 0;
      }

      const take = Math.min(this.payload.byteLength - this.payloadFilled, chunk.byteLength - offset);
      this.payload.set(chunk.subarray(offset, offset + take), this.payloadFilled);
      this.payloadFilled += take;
      offset += take;
      if (this.payloadFilled === this.payload.byteLength) {
        frames.push(this.payload);
        this.payload = null;
        this.payloadFilled = 0;
      }
    }
    return frames;
  }
}
