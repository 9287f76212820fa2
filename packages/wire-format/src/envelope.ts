/**
 * Envelope - the domain representation of one protocol message.
 *
 * On the wire a Message carries a `type` and one optional field per payload.
 * Here each message type is its own variant, so an envelope always carries
 * exactly the payload its discriminant names.
 */

import type { StateValue, Vector3 } from "./state-value.js"

export type DisconnectReason =
  | "quit"
  | "protocol-error"
  | "wrong-protocol-version"
  | "kicked"

export type LoginFailureReason = "access-denied" | "server-full" | "banned"

export type LoginResultReason = "accepted" | LoginFailureReason

export type ConnectMsg = {
  type: "connect"
  version: number
  versionStr?: string
}

export type DisconnectMsg = {
  type: "disconnect"
  reason: DisconnectReason
  reasonStr?: string
}

export type LoginMsg = {
  type: "login"
  name: string
  authtoken?: string
  /** Requested permission set */
  permissions?: number
}

/**
 * `reason` is only meaningful when `succeeded` is false.
 */
export type LoginResultMsg = {
  type: "login-result"
  succeeded: boolean
  reason?: LoginResultReason
}

export type AddEntityMsg = {
  type: "add-entity"
  id: number
  name?: string
}

export type RemoveEntityMsg = {
  type: "remove-entity"
  id: number
  name?: string
}

export type UpdateStateMsg = {
  type: "update-state"
  id: number
  stateId: string
  value: StateValue
}

/**
 * Movement intent, client to server only.
 */
export type MoveMsg = {
  type: "move"
  direction: Vector3
}

/**
 * Grants (or with `revoked`, withdraws) the client's control of an entity.
 */
export type AssignControlMsg = {
  type: "assign-control"
  uid: number
  revoked?: boolean
}

export type EntityDeathMsg = {
  type: "entity-death"
  uid: number
  name?: string
  killerUid?: number
  killerName?: string
}

export type CombatHitMsg = {
  type: "combat-hit"
  attackerUid: number
  attackerName?: string
  victimUid: number
  victimName?: string
  damage: number
}

export type Envelope =
  | ConnectMsg
  | DisconnectMsg
  | LoginMsg
  | LoginResultMsg
  | AddEntityMsg
  | RemoveEntityMsg
  | UpdateStateMsg
  | MoveMsg
  | AssignControlMsg
  | EntityDeathMsg
  | CombatHitMsg

export type EnvelopeType = Envelope["type"]

/** Messages that make up general game traffic */
export type GameMsg =
  | AddEntityMsg
  | RemoveEntityMsg
  | UpdateStateMsg
  | MoveMsg
  | AssignControlMsg
  | EntityDeathMsg
  | CombatHitMsg
