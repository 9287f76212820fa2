import type {
  DisconnectReason,
  LoginFailureReason,
  RemoveEntityMsg,
  StateValue,
  UpdateStateMsg,
} from "@arena-wire/wire-format"

/**
 * Which end of the connection a session runs on.
 */
export type Role = "server" | "client"

/**
 * Handshake phase of a session.
 *
 * A server starts in `awaiting-connect`, a client in `awaiting-connect-ack`.
 * Both reach `established` after a successful login and end in `closed`.
 */
export type Phase =
  | "awaiting-connect"
  | "awaiting-connect-ack"
  | "awaiting-login"
  | "awaiting-login-result"
  | "established"
  | "closed"

export type ConnectionId = number

/**
 * Who a client logs in as. On the server this is what the client sent in
 * Login; on the client it is what it will send.
 */
export type LoginIdentity = {
  name: string
  authtoken?: string
  permissions?: number
}

/**
 * An entity announced by the peer and the latest value of each named state.
 */
export type EntityRecord = {
  id: number
  name?: string
  states: Map<string, StateValue>
}

/**
 * Why a session ended.
 */
export type CloseReason =
  | { type: "disconnect-received"; reason: DisconnectReason; reasonStr?: string }
  | { type: "disconnect-sent"; reason: DisconnectReason; reasonStr?: string }
  | { type: "login-failed"; reason: LoginFailureReason }
  | { type: "transport-closed" }
  | { type: "send-overflow"; bufferedBytes: number }

export type MinorErrorCode = "unknown-entity-update" | "unknown-entity-remove"

/**
 * A tolerated protocol violation. The offending message is dropped and the
 * connection stays up.
 */
export type MinorError =
  | {
      code: "unknown-entity-update"
      message: string
      envelope: UpdateStateMsg
    }
  | {
      code: "unknown-entity-remove"
      message: string
      envelope: RemoveEntityMsg
    }

/**
 * Timer API for dependency injection (enables testing).
 */
export interface TimerAPI {
  setTimeout: (fn: () => void, ms: number) => unknown
  clearTimeout: (id: unknown) => void
}
