/**
 * Wire format constants for the arena-wire game protocol.
 *
 * Numeric values are fixed by `proto/protocol.proto` and must not change.
 */

/** Protocol version announced in Connect */
export const PROTOCOL_VERSION = 1

/** Frame header size in bytes (uint16 payload length, big-endian) */
export const FRAME_HEADER_SIZE = 2

/** Largest payload a frame header can describe */
export const MAX_PAYLOAD_SIZE = 0xffff

/** Default ceiling on StateValue array nesting accepted by the decoder */
export const DEFAULT_MAX_VALUE_DEPTH = 32

/** Envelope discriminators (`Message.Type`) */
export const MessageType = {
  Connect: 1,
  Disconnect: 2,
  Login: 3,
  LoginResult: 4,
  AddEntity: 5,
  RemoveEntity: 6,
  UpdateState: 7,
  Move: 8,
  AssignControl: 9,
  EntityDeath: 10,
  CombatHit: 11,
} as const

export type MessageTypeCode = (typeof MessageType)[keyof typeof MessageType]

/** `Disconnect.Reason` */
export const DisconnectReasonCode = {
  Quit: 1,
  ProtocolError: 2,
  WrongProtocolVersion: 3,
  Kicked: 4,
} as const

/** `LoginResult.Reason` */
export const LoginResultReasonCode = {
  Accepted: 0,
  AccessDenied: 1,
  ServerFull: 2,
  Banned: 3,
} as const

/** `StateValue.Type` */
export const StateValueType = {
  Bool: 1,
  Int: 2,
  Float: 3,
  String: 4,
  Array: 5,
  Vector3: 6,
} as const

export const INT32_MIN = -0x80000000
export const INT32_MAX = 0x7fffffff
export const UINT32_MAX = 0xffffffff
