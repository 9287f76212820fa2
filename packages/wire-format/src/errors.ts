/**
 * Error types for wire format encoding and decoding.
 */

/**
 * Error codes shared by all wire errors.
 */
export type WireErrorCode =
  | "payload_too_large"
  | "invalid_field"
  | "malformed_payload"

/**
 * Why a payload was rejected by the decoder.
 */
export type MalformedPayloadReason =
  | "invalid_protobuf"
  | "unknown_type"
  | "missing_payload"
  | "invalid_field"
  | "state_value_mismatch"
  | "depth_exceeded"

/**
 * Base class for errors raised by the codec.
 */
export class WireError extends Error {
  override readonly name: string = "WireError"

  constructor(
    public readonly code: WireErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Thrown at encode time when an envelope serializes to more bytes than a
 * frame header can describe. Nothing is written to the wire.
 */
export class PayloadTooLargeError extends WireError {
  override readonly name = "PayloadTooLargeError"

  constructor(
    public readonly size: number,
    public readonly limit: number,
  ) {
    super(
      "payload_too_large",
      `Payload of ${size} bytes exceeds the frame limit of ${limit} bytes`,
    )
  }
}

/**
 * Thrown at encode time when a numeric field cannot be represented by its
 * wire type (for example a fractional entity id).
 */
export class InvalidFieldError extends WireError {
  override readonly name = "InvalidFieldError"

  constructor(
    public readonly field: string,
    message: string,
  ) {
    super("invalid_field", `${field}: ${message}`)
  }
}

/**
 * Thrown when frame bytes do not parse as an envelope. The stream cannot be
 * resynchronized after this; the connection must be torn down.
 */
export class MalformedPayloadError extends WireError {
  override readonly name = "MalformedPayloadError"

  constructor(
    public readonly reason: MalformedPayloadReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("malformed_payload", message, options)
  }
}

/**
 * Thrown when a StateValue is built with a field that does not match its
 * discriminant. This is an argument error and never reaches the wire.
 */
export class StateValueError extends TypeError {
  override readonly name = "StateValueError"
}
