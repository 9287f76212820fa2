/**
 * @arena-wire/wire-format
 *
 * Binary wire format for the arena-wire game protocol.
 *
 * - protobuf (proto2) envelopes, schema loaded at run time via protobufjs
 * - 2-byte big-endian length prefix per frame (payloads up to 65535 bytes)
 * - StateValue, the recursive tagged union carried by UpdateState
 * - FrameDecoder for transports that deliver partial or coalesced frames
 *
 * @example
 * ```typescript
 * import { encodeFrame, FrameDecoder, intValue } from "@arena-wire/wire-format"
 *
 * const frame = encodeFrame({
 *   type: "update-state",
 *   id: 7,
 *   stateId: "hp",
 *   value: intValue(30),
 * })
 *
 * const decoder = new FrameDecoder()
 * const result = decoder.push(frame)
 * if (result.status === "ok") {
 *   for (const envelope of result.envelopes) {
 *     console.log(envelope.type)
 *   }
 * }
 * ```
 */

// Constants
export {
  DEFAULT_MAX_VALUE_DEPTH,
  DisconnectReasonCode,
  FRAME_HEADER_SIZE,
  LoginResultReasonCode,
  MAX_PAYLOAD_SIZE,
  MessageType,
  type MessageTypeCode,
  PROTOCOL_VERSION,
  StateValueType,
} from "./constants.js"
// Decoding
export {
  type DecodeFrameResult,
  type DecodeOptions,
  decode,
  decodeFrame,
  fromWireFormat,
  fromWireStateValue,
} from "./decode.js"
// Encoding
export {
  encode,
  encodeFrame,
  toWireFormat,
  toWireStateValue,
} from "./encode.js"
// Envelope
export {
  type AddEntityMsg,
  type AssignControlMsg,
  type CombatHitMsg,
  type ConnectMsg,
  type DisconnectMsg,
  type DisconnectReason,
  type EntityDeathMsg,
  type Envelope,
  type EnvelopeType,
  type GameMsg,
  type LoginFailureReason,
  type LoginMsg,
  type LoginResultMsg,
  type LoginResultReason,
  type MoveMsg,
  type RemoveEntityMsg,
  type UpdateStateMsg,
} from "./envelope.js"
// Errors
export {
  InvalidFieldError,
  MalformedPayloadError,
  type MalformedPayloadReason,
  PayloadTooLargeError,
  StateValueError,
  WireError,
  type WireErrorCode,
} from "./errors.js"
// Stream decoding
export { FrameDecoder, type FrameDecoderResult } from "./frame-decoder.js"
// Value model
export {
  type ArrayValue,
  arrayValue,
  type BoolValue,
  boolValue,
  cloneStateValue,
  createStateValue,
  type FloatValue,
  floatValue,
  type IntValue,
  intValue,
  isInt32,
  isStateValue,
  isVector3,
  type PlainValue,
  type StateValue,
  type StateValueKind,
  type StringValue,
  stateValueDepth,
  stateValuesEqual,
  stringValue,
  toPlainValue,
  type Vector3,
  type Vector3Value,
  vector3,
  vector3Value,
} from "./state-value.js"
// Wire types (for advanced use cases)
export type { WireMessage, WireStateValue } from "./wire-types.js"
