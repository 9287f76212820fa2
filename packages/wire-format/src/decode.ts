/**
 * Decoding functions for wire format.
 *
 * Converts protobuf binary back to Envelopes. Anything that does not describe
 * a well-formed Envelope is rejected with MalformedPayloadError.
 */

import type { ZodType } from "zod"
import {
  DEFAULT_MAX_VALUE_DEPTH,
  DisconnectReasonCode,
  FRAME_HEADER_SIZE,
  LoginResultReasonCode,
  MessageType,
  StateValueType,
} from "./constants.js"
import type {
  DisconnectReason,
  Envelope,
  LoginResultReason,
} from "./envelope.js"
import { MalformedPayloadError } from "./errors.js"
import { getMessageType, TO_OBJECT_OPTIONS } from "./schema.js"
import { isInt32, type StateValue, vector3 } from "./state-value.js"
import {
  type WireMessage,
  type WireStateValue,
  wireMessageSchema,
  wireStateValueSchema,
} from "./wire-types.js"

export type DecodeOptions = {
  /** Deepest StateValue nesting accepted (default: 32) */
  maxValueDepth?: number
}

/**
 * Result of reading one frame from a buffer.
 */
export type DecodeFrameResult =
  | { status: "complete"; envelope: Envelope; bytesConsumed: number }
  | { status: "incomplete"; bytesNeeded: number }

const DISCONNECT_REASONS = new Map<number, DisconnectReason>([
  [DisconnectReasonCode.Quit, "quit"],
  [DisconnectReasonCode.ProtocolError, "protocol-error"],
  [DisconnectReasonCode.WrongProtocolVersion, "wrong-protocol-version"],
  [DisconnectReasonCode.Kicked, "kicked"],
])

const LOGIN_RESULT_REASONS = new Map<number, LoginResultReason>([
  [LoginResultReasonCode.Accepted, "accepted"],
  [LoginResultReasonCode.AccessDenied, "access-denied"],
  [LoginResultReasonCode.ServerFull, "server-full"],
  [LoginResultReasonCode.Banned, "banned"],
])

function parseWith<T>(schema: ZodType<T>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues.at(0)
    const where =
      issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : ""
    throw new MalformedPayloadError(
      "invalid_field",
      `Invalid ${what}${where}: ${issue?.message ?? "unknown issue"}`,
    )
  }
  return result.data
}

function missingPayload(field: string): never {
  throw new MalformedPayloadError(
    "missing_payload",
    `Message type requires the '${field}' payload`,
  )
}

function mismatch(message: string): never {
  throw new MalformedPayloadError("state_value_mismatch", message)
}

/**
 * Names of the value fields populated on a wire StateValue.
 */
function populatedFields(wire: WireStateValue): string[] {
  const fields: string[] = []
  if (wire.boolVal !== undefined) fields.push("boolVal")
  if (wire.intVal !== undefined) fields.push("intVal")
  if (wire.floatVal !== undefined) fields.push("floatVal")
  if (wire.stringVal !== undefined) fields.push("stringVal")
  if (wire.vector3Val !== undefined) fields.push("vector3Val")
  if (wire.arrayVal !== undefined && wire.arrayVal.length > 0) {
    fields.push("arrayVal")
  }
  return fields
}

/**
 * Convert a wire StateValue back to the domain union.
 *
 * `depth` is the nesting level of `raw` itself, starting at 1, so the check
 * agrees with `stateValueDepth`.
 */
export function fromWireStateValue(
  raw: unknown,
  depth: number,
  maxDepth: number,
): StateValue {
  if (depth > maxDepth) {
    throw new MalformedPayloadError(
      "depth_exceeded",
      `StateValue nesting exceeds the limit of ${maxDepth}`,
    )
  }

  const wire = parseWith(wireStateValueSchema, raw, "StateValue")
  const fields = populatedFields(wire)

  const expectOnly = (field: string) => {
    if (fields.length !== 1 || fields[0] !== field) {
      mismatch(
        `StateValue of type ${wire.type} must populate only ${field}, found [${fields.join(", ")}]`,
      )
    }
  }

  switch (wire.type) {
    case StateValueType.Bool:
      expectOnly("boolVal")
      if (wire.boolVal === undefined) return mismatch("boolVal missing")
      return { type: "bool", value: wire.boolVal }

    case StateValueType.Int:
      expectOnly("intVal")
      if (wire.intVal === undefined || !isInt32(wire.intVal)) {
        return mismatch("intVal missing")
      }
      return { type: "int", value: wire.intVal }

    case StateValueType.Float:
      expectOnly("floatVal")
      if (wire.floatVal === undefined) return mismatch("floatVal missing")
      return { type: "float", value: wire.floatVal }

    case StateValueType.String:
      expectOnly("stringVal")
      if (wire.stringVal === undefined) return mismatch("stringVal missing")
      return { type: "string", value: wire.stringVal }

    case StateValueType.Vector3: {
      expectOnly("vector3Val")
      const v = wire.vector3Val
      if (v === undefined) return mismatch("vector3Val missing")
      return { type: "vector3", value: vector3(v.x, v.y, v.z) }
    }

    case StateValueType.Array: {
      // An array without elements has nothing on the wire
      if (fields.some(field => field !== "arrayVal")) {
        mismatch(
          `StateValue of type ${wire.type} must populate only arrayVal, found [${fields.join(", ")}]`,
        )
      }
      const elements = wire.arrayVal ?? []
      return {
        type: "array",
        value: elements.map(element =>
          fromWireStateValue(element, depth + 1, maxDepth),
        ),
      }
    }

    default:
      throw new MalformedPayloadError(
        "unknown_type",
        `Unknown StateValue type: ${wire.type}`,
      )
  }
}

/**
 * Convert wire format back to an Envelope.
 *
 * Only the payload named by `type` is read; any other populated payload is
 * ignored.
 */
export function fromWireFormat(
  wire: WireMessage,
  options: DecodeOptions = {},
): Envelope {
  const maxDepth = options.maxValueDepth ?? DEFAULT_MAX_VALUE_DEPTH

  switch (wire.type) {
    case MessageType.Connect: {
      const p = wire.connect ?? missingPayload("connect")
      return { type: "connect", version: p.version, versionStr: p.versionStr }
    }

    case MessageType.Disconnect: {
      const p = wire.disconnect ?? missingPayload("disconnect")
      const reason = DISCONNECT_REASONS.get(p.reason)
      if (reason === undefined) {
        throw new MalformedPayloadError(
          "invalid_field",
          `Unknown disconnect reason: ${p.reason}`,
        )
      }
      return { type: "disconnect", reason, reasonStr: p.reasonStr }
    }

    case MessageType.Login: {
      const p = wire.login ?? missingPayload("login")
      return {
        type: "login",
        name: p.name,
        authtoken: p.authtoken,
        permissions: p.permissions,
      }
    }

    case MessageType.LoginResult: {
      const p = wire.loginResult ?? missingPayload("loginResult")
      if (p.reason === undefined) {
        return { type: "login-result", succeeded: p.succeeded }
      }
      const reason = LOGIN_RESULT_REASONS.get(p.reason)
      if (reason === undefined) {
        throw new MalformedPayloadError(
          "invalid_field",
          `Unknown login result reason: ${p.reason}`,
        )
      }
      return { type: "login-result", succeeded: p.succeeded, reason }
    }

    case MessageType.AddEntity: {
      const p = wire.addEntity ?? missingPayload("addEntity")
      return { type: "add-entity", id: p.id, name: p.name }
    }

    case MessageType.RemoveEntity: {
      const p = wire.removeEntity ?? missingPayload("removeEntity")
      return { type: "remove-entity", id: p.id, name: p.name }
    }

    case MessageType.UpdateState: {
      const p = wire.updateState ?? missingPayload("updateState")
      return {
        type: "update-state",
        id: p.id,
        stateId: p.stateId,
        value: fromWireStateValue(p.value, 1, maxDepth),
      }
    }

    case MessageType.Move: {
      const p = wire.move ?? missingPayload("move")
      const { x, y, z } = p.direction
      return { type: "move", direction: vector3(x, y, z) }
    }

    case MessageType.AssignControl: {
      const p = wire.assignControl ?? missingPayload("assignControl")
      return { type: "assign-control", uid: p.uid, revoked: p.revoked }
    }

    case MessageType.EntityDeath: {
      const p = wire.entityDeath ?? missingPayload("entityDeath")
      return {
        type: "entity-death",
        uid: p.uid,
        name: p.name,
        killerUid: p.killerUid,
        killerName: p.killerName,
      }
    }

    case MessageType.CombatHit: {
      const p = wire.combatHit ?? missingPayload("combatHit")
      return {
        type: "combat-hit",
        attackerUid: p.attackerUid,
        attackerName: p.attackerName,
        victimUid: p.victimUid,
        victimName: p.victimName,
        damage: p.damage,
      }
    }

    default:
      throw new MalformedPayloadError(
        "unknown_type",
        `Unknown message type: ${wire.type}`,
      )
  }
}

/**
 * Decode protobuf binary (without frame header) to an Envelope.
 *
 * Nesting beyond `maxValueDepth` is reported as `depth_exceeded`. protobufjs
 * parses the whole tree before that check, so a value nested deeply enough
 * to exhaust the stack fails inside the parser and is reported as
 * `invalid_protobuf` instead.
 *
 * @throws MalformedPayloadError if the bytes are not a well-formed Envelope
 */
export function decode(data: Uint8Array, options?: DecodeOptions): Envelope {
  const Message = getMessageType()

  let raw: unknown
  try {
    raw = Message.toObject(Message.decode(data), TO_OBJECT_OPTIONS)
  } catch (error) {
    throw new MalformedPayloadError(
      "invalid_protobuf",
      `Failed to parse envelope: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }

  return fromWireFormat(parseWith(wireMessageSchema, raw, "Message"), options)
}

/**
 * Read one frame starting at `offset`.
 *
 * An incomplete frame is not an error: the result says how many more bytes
 * are needed before the frame can be read.
 *
 * @throws MalformedPayloadError if a complete frame holds a malformed payload
 */
export function decodeFrame(
  buffer: Uint8Array,
  offset = 0,
  options?: DecodeOptions,
): DecodeFrameResult {
  const available = buffer.length - offset
  if (available < FRAME_HEADER_SIZE) {
    return { status: "incomplete", bytesNeeded: FRAME_HEADER_SIZE - available }
  }

  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
  const payloadLength = view.getUint16(offset, false)
  const frameLength = FRAME_HEADER_SIZE + payloadLength

  if (available < frameLength) {
    return { status: "incomplete", bytesNeeded: frameLength - available }
  }

  const start = offset + FRAME_HEADER_SIZE
  const envelope = decode(buffer.subarray(start, start + payloadLength), options)

  return { status: "complete", envelope, bytesConsumed: frameLength }
}
