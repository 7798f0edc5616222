/**
 * Bridge pipeline: upstream byte chunks → canonical events.
 *
 * Drives one FrameDecoder and one EventTranslator sequentially. Yields
 * lazily as frames complete, and always ends with exactly one terminal
 * event (stream-stop or error). Stops pulling from the source as soon as
 * a terminal event has been produced.
 */

import { debugLog, log } from "../../logger.js";
import type { CanonicalEvent } from "./canonical-events.js";
import { FrameDecoder, type FrameDecoderOptions } from "./frame-decoder.js";
import { EventTranslator, type EventTranslatorOptions } from "./event-translator.js";
import { getStringHeader, type ExtractResult } from "./types.js";
import { HEADER_EVENT_TYPE } from "./constants.js";

export interface BridgeOptions extends EventTranslatorOptions, FrameDecoderOptions {}

export async function* bridgeEventStream(
  source: AsyncIterable<Uint8Array>,
  options: BridgeOptions
): AsyncGenerator<CanonicalEvent, void, undefined> {
  const decoder = new FrameDecoder(options);
  const translator = new EventTranslator(options);
  let bytesReceived = 0;
  let framesDecoded = 0;

  try {
    for await (const chunk of source) {
      bytesReceived += chunk.byteLength;
      decoder.feed(chunk);
      debugLog("frames", "chunk", () => ({ size: chunk.byteLength, buffered: decoder.bufferedLength }));

      while (true) {
        let result: ExtractResult;
        try {
          result = decoder.tryExtractFrame();
        } catch (err) {
          log(`[Bridge] Frame decoding failed after ${framesDecoded} frames / ${bytesReceived} bytes: ${err}`);
          yield* translator.fail(err);
          return;
        }
        if (result.status === "need-more-data") break;

        framesDecoded++;
        const { frame } = result;
        debugLog("frames", "frame", () => ({
          eventType: getStringHeader(frame.headers, HEADER_EVENT_TYPE),
          totalLength: frame.totalLength,
          payloadSize: frame.payload.byteLength,
        }));

        yield* translator.translate(frame);
        if (translator.streamTerminated) return;
      }
    }
  } catch (err) {
    log(`[Bridge] Upstream read failed: ${err}`);
    yield* translator.fail(err);
    return;
  }

  if (decoder.bufferedLength > 0) {
    log(`[Bridge] ${decoder.bufferedLength} bytes of an incomplete frame remained at end of stream`);
  }
  yield* translator.finish();
}
