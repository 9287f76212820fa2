/**
 * Handshake rules: which phase may follow which, and which envelopes each
 * role may receive or send in each phase.
 *
 * ```
 * Client                                   Server
 *   | awaiting-connect-ack                   | awaiting-connect
 *   |-- Connect{version} ------------------->|
 *   |<------------------- Connect{version} --| awaiting-login
 *   |-- Login{name, authtoken?} ------------>|
 *   | awaiting-login-result                  | awaiting-login-result
 *   |                                        |  (LoginAuthority decides)
 *   |<---------------- LoginResult{true} ----|
 *   | established                            | established
 * ```
 *
 * Disconnect is accepted in every phase but `closed`.
 */

import type { EnvelopeType, GameMsg } from "@arena-wire/wire-format"
import type { Phase, Role } from "./types.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// TRANSITIONS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * Map of valid phase transitions.
 * Key is the "from" phase, value is the list of valid "to" phases.
 */
export const VALID_TRANSITIONS: Record<Phase, readonly Phase[]> = {
  "awaiting-connect": ["awaiting-login", "closed"],
  "awaiting-connect-ack": ["awaiting-login-result", "closed"],
  "awaiting-login": ["awaiting-login-result", "closed"],
  "awaiting-login-result": ["established", "closed"],
  established: ["closed"],
  closed: [],
}

export function isValidTransition(from: Phase, to: Phase): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

export function initialPhase(role: Role): Phase {
  return role === "server" ? "awaiting-connect" : "awaiting-connect-ack"
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// PERMITTED ENVELOPES
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/** Game traffic a server accepts from its client */
const SERVER_INBOUND: ReadonlySet<GameMsg["type"]> = new Set([
  "add-entity",
  "remove-entity",
  "update-state",
  "move",
  "entity-death",
  "combat-hit",
])

/** Game traffic a client accepts from its server */
const CLIENT_INBOUND: ReadonlySet<GameMsg["type"]> = new Set([
  "add-entity",
  "remove-entity",
  "update-state",
  "assign-control",
  "entity-death",
  "combat-hit",
])

const HANDSHAKE_INBOUND: Record<Role, Partial<Record<Phase, EnvelopeType>>> = {
  server: {
    "awaiting-connect": "connect",
    "awaiting-login": "login",
  },
  client: {
    "awaiting-connect-ack": "connect",
    "awaiting-login-result": "login-result",
  },
}

function gameInbound(role: Role): ReadonlySet<string> {
  return role === "server" ? SERVER_INBOUND : CLIENT_INBOUND
}

/**
 * Whether `role` may receive an envelope of `type` while in `phase`.
 *
 * Nothing is permitted in `closed`; callers drop such envelopes rather than
 * treating them as violations.
 */
export function canReceive(
  role: Role,
  phase: Phase,
  type: EnvelopeType,
): boolean {
  if (phase === "closed") return false
  if (type === "disconnect") return true
  if (phase === "established") return gameInbound(role).has(type)
  return HANDSHAKE_INBOUND[role][phase] === type
}

/**
 * Whether the application may send game traffic of `type` from `role`.
 * A side may send exactly what its peer may receive once established.
 */
export function canSend(role: Role, type: GameMsg["type"]): boolean {
  return gameInbound(role === "server" ? "client" : "server").has(type)
}
