/**
 * Event-stream wire constants.
 *
 * | total_length (4B) | headers_length (4B) | prelude_crc (4B) | headers | payload | message_crc (4B) |
 *
 * All numeric fields are big-endian.
 */

export const PRELUDE_LENGTH = 12; // total_length(4) + headers_length(4) + prelude_crc(4)
export const PRELUDE_FIELDS_LENGTH = 8;
export const MESSAGE_CRC_LENGTH = 4;
export const MIN_FRAME_LENGTH = PRELUDE_LENGTH + MESSAGE_CRC_LENGTH;
export const DEFAULT_MAX_FRAME_SIZE = 16 * 1024 * 1024; // 16MB

// Header value type tags (1 byte)
export enum HeaderType {
  BOOL_TRUE = 0,
  BOOL_FALSE = 1,
  BYTE = 2,
  SHORT = 3,
  INTEGER = 4,
  LONG = 5,
  BYTE_ARRAY = 6,
  STRING = 7,
  TIMESTAMP = 8,
  UUID = 9,
}

// Well-known header names
export const HEADER_EVENT_TYPE = ":event-type";
export const HEADER_CONTENT_TYPE = ":content-type";
export const HEADER_MESSAGE_TYPE = ":message-type";
export const HEADER_EXCEPTION_TYPE = ":exception-type";
export const HEADER_ERROR_CODE = ":error-code";
export const HEADER_ERROR_MESSAGE = ":error-message";
