/**
 * Encoding functions for wire format.
 *
 * Converts Envelopes to the protobuf object shape and then to framed binary.
 */

import {
  DisconnectReasonCode,
  FRAME_HEADER_SIZE,
  INT32_MAX,
  INT32_MIN,
  LoginResultReasonCode,
  MAX_PAYLOAD_SIZE,
  MessageType,
  StateValueType,
  UINT32_MAX,
} from "./constants.js"
import type {
  DisconnectReason,
  Envelope,
  LoginResultReason,
} from "./envelope.js"
import { InvalidFieldError, PayloadTooLargeError } from "./errors.js"
import { getMessageType } from "./schema.js"
import type { StateValue, Vector3 } from "./state-value.js"
import type { WireMessage, WireStateValue, WireVector3 } from "./wire-types.js"

const DISCONNECT_REASON_CODES = {
  quit: DisconnectReasonCode.Quit,
  "protocol-error": DisconnectReasonCode.ProtocolError,
  "wrong-protocol-version": DisconnectReasonCode.WrongProtocolVersion,
  kicked: DisconnectReasonCode.Kicked,
} as const satisfies Record<DisconnectReason, number>

const LOGIN_RESULT_REASON_CODES = {
  accepted: LoginResultReasonCode.Accepted,
  "access-denied": LoginResultReasonCode.AccessDenied,
  "server-full": LoginResultReasonCode.ServerFull,
  banned: LoginResultReasonCode.Banned,
} as const satisfies Record<LoginResultReason, number>

function int32(field: string, value: number): number {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new InvalidFieldError(field, `expected int32, got ${value}`)
  }
  return value
}

function uint32(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
    throw new InvalidFieldError(field, `expected uint32, got ${value}`)
  }
  return value
}

/** Rejects numbers a 32-bit float cannot hold exactly, so decode(encode(m)) equals m */
function float32(field: string, value: number): number {
  if (Math.fround(value) !== value) {
    throw new InvalidFieldError(field, `expected float32, got ${value}`)
  }
  return value
}

function optionalInt32(field: string, value: number | undefined) {
  return value === undefined ? undefined : int32(field, value)
}

function toWireVector3(field: string, v: Vector3): WireVector3 {
  return {
    x: float32(`${field}.x`, v.x),
    y: float32(`${field}.y`, v.y),
    z: float32(`${field}.z`, v.z),
  }
}

/**
 * Convert a StateValue tree to its wire shape.
 */
export function toWireStateValue(
  value: StateValue,
  field = "value",
): WireStateValue {
  switch (value.type) {
    case "bool":
      return { type: StateValueType.Bool, boolVal: value.value }
    case "int":
      return {
        type: StateValueType.Int,
        intVal: int32(`${field}.intVal`, value.value),
      }
    case "float":
      return {
        type: StateValueType.Float,
        floatVal: float32(`${field}.floatVal`, value.value),
      }
    case "string":
      return { type: StateValueType.String, stringVal: value.value }
    case "vector3":
      return {
        type: StateValueType.Vector3,
        vector3Val: toWireVector3(`${field}.vector3Val`, value.value),
      }
    case "array":
      return {
        type: StateValueType.Array,
        arrayVal: value.value.map((element, i) =>
          toWireStateValue(element, `${field}.arrayVal[${i}]`),
        ),
      }
  }
}

/**
 * Convert an Envelope to wire format.
 *
 * @throws InvalidFieldError if a numeric field does not fit its wire type,
 *   including floats that 32 bits cannot represent exactly
 */
export function toWireFormat(msg: Envelope): WireMessage {
  switch (msg.type) {
    case "connect":
      return {
        type: MessageType.Connect,
        connect: {
          version: uint32("connect.version", msg.version),
          versionStr: msg.versionStr,
        },
      }

    case "disconnect":
      return {
        type: MessageType.Disconnect,
        disconnect: {
          reason: DISCONNECT_REASON_CODES[msg.reason],
          reasonStr: msg.reasonStr,
        },
      }

    case "login":
      return {
        type: MessageType.Login,
        login: {
          name: msg.name,
          authtoken: msg.authtoken,
          permissions:
            msg.permissions === undefined
              ? undefined
              : uint32("login.permissions", msg.permissions),
        },
      }

    case "login-result":
      return {
        type: MessageType.LoginResult,
        loginResult: {
          succeeded: msg.succeeded,
          reason:
            msg.reason === undefined
              ? undefined
              : LOGIN_RESULT_REASON_CODES[msg.reason],
        },
      }

    case "add-entity":
      return {
        type: MessageType.AddEntity,
        addEntity: { id: int32("addEntity.id", msg.id), name: msg.name },
      }

    case "remove-entity":
      return {
        type: MessageType.RemoveEntity,
        removeEntity: { id: int32("removeEntity.id", msg.id), name: msg.name },
      }

    case "update-state":
      return {
        type: MessageType.UpdateState,
        updateState: {
          id: int32("updateState.id", msg.id),
          stateId: msg.stateId,
          value: toWireStateValue(msg.value, "updateState.value"),
        },
      }

    case "move":
      return {
        type: MessageType.Move,
        move: { direction: toWireVector3("move.direction", msg.direction) },
      }

    case "assign-control":
      return {
        type: MessageType.AssignControl,
        assignControl: {
          uid: int32("assignControl.uid", msg.uid),
          revoked: msg.revoked,
        },
      }

    case "entity-death":
      return {
        type: MessageType.EntityDeath,
        entityDeath: {
          uid: int32("entityDeath.uid", msg.uid),
          name: msg.name,
          killerUid: optionalInt32("entityDeath.killerUid", msg.killerUid),
          killerName: msg.killerName,
        },
      }

    case "combat-hit":
      return {
        type: MessageType.CombatHit,
        combatHit: {
          attackerUid: int32("combatHit.attackerUid", msg.attackerUid),
          attackerName: msg.attackerName,
          victimUid: int32("combatHit.victimUid", msg.victimUid),
          victimName: msg.victimName,
          damage: float32("combatHit.damage", msg.damage),
        },
      }
  }
}

/**
 * Encode an Envelope to protobuf binary (without frame header).
 */
export function encode(msg: Envelope): Uint8Array {
  const Message = getMessageType()
  return Message.encode(Message.fromObject(toWireFormat(msg))).finish()
}

/**
 * Encode an Envelope to a length-prefixed frame.
 *
 * Frame Structure:
 * ┌──────────────────────────────┬───────────────────────────────────┐
 * │ Payload Length               │ Payload                           │
 * │ (2 bytes, uint16 big-endian) │ (serialized protocol.Message)     │
 * └──────────────────────────────┴───────────────────────────────────┘
 *
 * @throws PayloadTooLargeError if the payload exceeds 65535 bytes
 */
export function encodeFrame(msg: Envelope): Uint8Array {
  const payload = encode(msg)
  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new PayloadTooLargeError(payload.length, MAX_PAYLOAD_SIZE)
  }

  const frame = new Uint8Array(FRAME_HEADER_SIZE + payload.length)
  const view = new DataView(frame.buffer)
  view.setUint16(0, payload.length, false)
  frame.set(payload, FRAME_HEADER_SIZE)

  return frame
}
