import type { DisconnectReason } from "@arena-wire/wire-format"
import { isValidTransition } from "../handshake.js"
import type { Command, SessionModel } from "../session-program.js"
import type { CloseReason, Phase } from "../types.js"

/**
 * Batch multiple commands into a single command if needed
 */
export function batchAsNeeded(
  ...commandSequence: (Command | undefined)[]
): Command | undefined {
  const definedCommands: Command[] = commandSequence.flatMap(c =>
    c ? [c] : [],
  )

  if (definedCommands.length === 0) {
    return
  }

  if (definedCommands.length === 1) {
    return definedCommands[0]
  }

  return { type: "cmd/batch", commands: definedCommands }
}

/**
 * Move the session to `to`, returning the phase-changed event.
 *
 * @throws Error if the handshake table does not allow the transition
 */
export function transitionTo(model: SessionModel, to: Phase): Command {
  const from = model.phase
  if (!isValidTransition(from, to)) {
    throw new Error(`Invalid phase transition: ${from} -> ${to}`)
  }
  model.phase = to
  return { type: "cmd/emit-phase-changed", from, to }
}

/**
 * Close the session: transition, tear down the transport and report why.
 */
export function closeSession(
  model: SessionModel,
  reason: CloseReason,
): Command {
  const phaseChanged = transitionTo(model, "closed")
  model.closeReason = reason

  return {
    type: "cmd/batch",
    commands: [
      phaseChanged,
      { type: "cmd/close-transport" },
      { type: "cmd/emit-closed", reason },
    ],
  }
}

/**
 * Send Disconnect to the peer, then close.
 */
export function disconnectAndClose(
  model: SessionModel,
  reason: DisconnectReason,
  reasonStr?: string,
): Command {
  return {
    type: "cmd/batch",
    commands: [
      { type: "cmd/send", envelope: { type: "disconnect", reason, reasonStr } },
      closeSession(model, { type: "disconnect-sent", reason, reasonStr }),
    ],
  }
}
