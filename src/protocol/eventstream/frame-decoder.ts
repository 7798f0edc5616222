/**
 * Incremental event-stream frame decoder.
 *
 * Owns the accumulation buffer for one connection. Bytes are pushed in with
 * feed() in whatever chunking the transport delivers; tryExtractFrame() pulls
 * one validated frame out at a time, or reports that more bytes are needed.
 *
 * Any checksum or geometry failure is fatal: the decoder stays failed and
 * rethrows the same error on every later call.
 */

import { crc32 } from "@aws-crypto/crc32";
import {
  DEFAULT_MAX_FRAME_SIZE,
  MESSAGE_CRC_LENGTH,
  MIN_FRAME_LENGTH,
  PRELUDE_FIELDS_LENGTH,
  PRELUDE_LENGTH,
} from "./constants.js";
import { FrameCorruptionError } from "./errors.js";
import { concatBytes, decodeHeaders } from "./headers.js";
import type { ExtractResult, Frame } from "./types.js";

export interface FrameDecoderOptions {
  /** Upper bound on total_length; larger declared frames are rejected as corrupt */
  maxFrameSize?: number;
}

const NEED_MORE_DATA: ExtractResult = { status: "need-more-data" };

export class FrameDecoder {
  private buffer: Uint8Array = new Uint8Array(0);
  private failure: FrameCorruptionError | null = null;
  private readonly maxFrameSize: number;

  constructor(options: FrameDecoderOptions = {}) {
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
  }

  /**
   * Append newly arrived bytes. Ignored once the decoder has failed.
   */
  feed(chunk: Uint8Array): void {
    if (this.failure || chunk.byteLength === 0) return;
    this.buffer = this.buffer.byteLength === 0 ? chunk.slice() : concatBytes([this.buffer, chunk]);
  }

  /**
   * Try to extract one frame from the buffered bytes.
   *
   * Returns need-more-data without consuming anything when the prelude or the
   * declared frame is incomplete.
   *
   * @throws FrameCorruptionError on checksum mismatch or invalid lengths
   */
  tryExtractFrame(): ExtractResult {
    if (this.failure) throw this.failure;

    const buffered = this.buffer.byteLength;
    if (buffered < PRELUDE_LENGTH) return NEED_MORE_DATA;

    const view = new DataView(this.buffer.buffer, this.buffer.byteOffset, buffered);
    const totalLength = view.getUint32(0);
    const headersLength = view.getUint32(4);
    const preludeChecksum = view.getUint32(8);

    const expectedPrelude = checksum(this.buffer.subarray(0, PRELUDE_FIELDS_LENGTH));
    if (expectedPrelude !== preludeChecksum) {
      return this.fail(
        `Prelude checksum mismatch: expected ${hex(expectedPrelude)}, got ${hex(preludeChecksum)}`
      );
    }

    if (totalLength < MIN_FRAME_LENGTH) {
      return this.fail(`Frame too short: total_length ${totalLength} < ${MIN_FRAME_LENGTH}`);
    }
    if (totalLength > this.maxFrameSize) {
      return this.fail(`Frame too large: total_length ${totalLength} > ${this.maxFrameSize}`);
    }
    if (headersLength > totalLength - MIN_FRAME_LENGTH) {
      return this.fail(
        `Header block overruns frame: headers_length ${headersLength}, total_length ${totalLength}`
      );
    }

    // Partial frame: leave the buffer untouched until the rest arrives
    if (buffered < totalLength) return NEED_MORE_DATA;

    const messageEnd = totalLength - MESSAGE_CRC_LENGTH;
    const messageChecksum = view.getUint32(messageEnd);
    const expectedMessage = checksum(this.buffer.subarray(0, messageEnd));
    if (expectedMessage !== messageChecksum) {
      return this.fail(
        `Message checksum mismatch: expected ${hex(expectedMessage)}, got ${hex(messageChecksum)}`
      );
    }

    const headersEnd = PRELUDE_LENGTH + headersLength;
    let headers: Frame["headers"];
    try {
      headers = decodeHeaders(this.buffer.subarray(PRELUDE_LENGTH, headersEnd));
    } catch (err) {
      if (err instanceof FrameCorruptionError) {
        this.failure = err;
      }
      throw err;
    }

    const frame: Frame = {
      totalLength,
      headersLength,
      preludeChecksum,
      headers,
      payload: this.buffer.slice(headersEnd, messageEnd),
      messageChecksum,
    };

    // Keep only the residual tail
    this.buffer = this.buffer.slice(totalLength);

    return { status: "frame", frame };
  }

  /**
   * Drain every complete frame currently buffered
   *
   * @throws FrameCorruptionError as tryExtractFrame does
   */
  *frames(): Generator<Frame, void, undefined> {
    while (true) {
      const result = this.tryExtractFrame();
      if (result.status === "need-more-data") return;
      yield result.frame;
    }
  }

  /** Bytes held that are not yet part of an extracted frame */
  get bufferedLength(): number {
    return this.buffer.byteLength;
  }

  get failed(): boolean {
    return this.failure !== null;
  }

  private fail(reason: string): never {
    this.failure = new FrameCorruptionError(reason);
    throw this.failure;
  }
}

function checksum(bytes: Uint8Array): number {
  return crc32(bytes) >>> 0;
}

function hex(value: number): string {
  return `0x${value.toString(16).padStart(8, "0")}`;
}
