/**
 * Event-stream protocol: binary frame codec and vendor → canonical event translation.
 */

export * from "./constants.js";
export * from "./errors.js";
export * from "./types.js";
export { concatBytes, decodeHeaders, encodeHeaders } from "./headers.js";
export { FrameDecoder, type FrameDecoderOptions } from "./frame-decoder.js";
export { encodeFrame, encodeEventFrame, encodeExceptionFrame, type HeaderInput } from "./frame-encoder.js";
export { classifyFrame, VendorEventType, type VendorEvent } from "./vendor-events.js";
export { EventTranslator, TranslatorState, type EventTranslatorOptions } from "./event-translator.js";
export { bridgeEventStream, type BridgeOptions } from "./bridge.js";
export * from "./canonical-events.js";
