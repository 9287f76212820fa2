/**
 * Session Program - per-connection protocol state
 *
 * This module implements the state machine for one end of an arena-wire
 * connection: the handshake, then entity and state synchronization. It
 * follows The Elm Architecture (TEA) pattern with immutable updates via the
 * mutative library. The update function never touches the transport; it
 * returns commands that the GameConnection runtime executes.
 *
 * ## Message Flow
 *
 * 1. **Handshake**: Connect / Connect / Login / LoginResult. The server asks
 *    its LoginAuthority for a verdict through `cmd/verify-login` and receives
 *    the answer as `session/login-verdict`.
 * 2. **Synchronization**: once `established`, entity messages update the
 *    model's view of the peer's world and are surfaced as events.
 * 3. **Teardown**: Disconnect in either direction, a protocol violation, a
 *    malformed frame or a lost transport moves the session to `closed`.
 */

import { getLogger, type Logger } from "@logtape/logtape"
import type {
  DisconnectReason,
  Envelope,
  GameMsg,
  LoginFailureReason,
  MalformedPayloadError,
} from "@arena-wire/wire-format"
import type { Patch } from "mutative"
import type { LoginVerdict } from "./authority.js"
import { initialPhase } from "./handshake.js"
import { sessionDispatcher } from "./session/session-dispatcher.js"
import type {
  CloseReason,
  EntityRecord,
  LoginIdentity,
  MinorError,
  Phase,
  Role,
} from "./types.js"
import { makeImmutableUpdate } from "./utils/make-immutable-update.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// STATE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type SessionModel = {
  role: Role
  phase: Phase

  /** Our protocol version and the free-form string sent alongside it */
  protocolVersion: number
  versionStr: string

  /** What the peer announced in its Connect */
  peerVersion?: { version: number; versionStr?: string }

  /**
   * Server: the identity the client logged in with.
   * Client: the identity it logs in as (set by `session/start`).
   */
  identity?: LoginIdentity

  /** Entities the peer announced, with their latest states */
  entities: Map<number, EntityRecord>

  /** Entity ids we announced to the peer */
  announced: Set<number>

  /** Client only: entities the server assigned to us */
  controlled: Set<number>

  minorErrors: number

  closeReason?: CloseReason
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// MESSAGES (inputs to the update function)
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type SessionMessage =
  // Client: begin the handshake
  | { type: "session/start"; identity: LoginIdentity }

  // Inbound traffic
  | { type: "session/receive"; envelope: Envelope }
  | { type: "session/malformed-frame"; error: MalformedPayloadError }

  // Server: the LoginAuthority answered
  | { type: "session/login-verdict"; verdict: LoginVerdict }

  // Local requests
  | { type: "session/send"; envelope: GameMsg; frame?: Uint8Array }
  | {
      type: "session/disconnect"
      reason: DisconnectReason
      reasonStr?: string
    }

  // Runtime signals
  | { type: "session/transport-closed" }
  | { type: "session/send-overflow"; bufferedBytes: number }
  | { type: "session/handshake-timeout" }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// COMMANDS (outputs of the update function)
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type Command =
  // Transport
  | { type: "cmd/send"; envelope: Envelope; frame?: Uint8Array }
  | { type: "cmd/close-transport" }

  // Collaborators
  | { type: "cmd/verify-login"; identity: LoginIdentity }

  // Events
  | { type: "cmd/emit-phase-changed"; from: Phase; to: Phase }
  | { type: "cmd/emit-established"; identity?: LoginIdentity }
  | { type: "cmd/emit-message"; envelope: GameMsg }
  | { type: "cmd/emit-minor-error"; error: MinorError }
  | { type: "cmd/emit-login-rejected"; reason: LoginFailureReason }
  | { type: "cmd/emit-closed"; reason: CloseReason }

  // Utilities
  | { type: "cmd/batch"; commands: Command[] }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// PROGRAM DEFINITION
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type SessionInit = {
  role: Role
  protocolVersion: number
  versionStr: string
}

/**
 * Initialize a session for one end of a connection.
 */
export function init({
  role,
  protocolVersion,
  versionStr,
}: SessionInit): [SessionModel, Command?] {
  return [
    {
      role,
      phase: initialPhase(role),
      protocolVersion,
      versionStr,
      entities: new Map(),
      announced: new Set(),
      controlled: new Set(),
      minorErrors: 0,
    },
  ]
}

function createSessionLogic(sessionLogger: Logger) {
  const logger = sessionLogger.getChild("program")

  return function mutatingUpdate(
    msg: SessionMessage,
    model: SessionModel,
  ): Command | undefined {
    // Inbound envelopes are traced by the runtime
    if (msg.type !== "session/receive" && msg.type !== "session/send") {
      logger.trace("{type}", { ...msg })
    }

    return sessionDispatcher(msg, model, logger)
  }
}

type CreateSessionUpdateParams = {
  logger?: Logger
  onUpdate?: (patches: Patch[]) => void
}

/**
 * Creates the session update function.
 *
 * ```typescript
 * const update = createSessionUpdate({ logger: getLogger(["my-game"]) })
 * const [model] = init({ role: "server", protocolVersion: 1, versionStr: "" })
 * const [next, command] = update(
 *   { type: "session/receive", envelope: { type: "connect", version: 1 } },
 *   model,
 * )
 * ```
 */
export function createSessionUpdate({
  logger,
  onUpdate,
}: CreateSessionUpdateParams = {}) {
  return makeImmutableUpdate(
    createSessionLogic(logger ?? getLogger(["@arena-wire", "session"])),
    onUpdate,
  )
}
