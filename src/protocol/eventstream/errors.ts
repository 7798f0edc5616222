/**
 * Event-stream error classes.
 *
 * "Need more data" and unrecognized vendor events are not errors and are
 * never thrown; see FrameDecoder.tryExtractFrame and classifyFrame.
 */

export class EventStreamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EventStreamError";
  }
}

/**
 * Checksum mismatch or impossible frame geometry. Fatal for the connection:
 * the offset of the next frame can no longer be trusted.
 */
export class FrameCorruptionError extends EventStreamError {
  constructor(message: string) {
    super(message);
    this.name = "FrameCorruptionError";
  }
}

/**
 * Vendor events arrived in an order (or shape) the translator cannot accept.
 * Terminates the translation session.
 */
export class ProtocolViolationError extends EventStreamError {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolViolationError";
  }
}
