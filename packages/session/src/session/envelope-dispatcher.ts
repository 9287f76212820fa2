import type { Envelope } from "@arena-wire/wire-format"
import { canReceive } from "../handshake.js"
import type { Command } from "../session-program.js"
import { handleAddEntity } from "./entities/handle-add-entity.js"
import { handleAssignControl } from "./entities/handle-assign-control.js"
import { handleGameNotice } from "./entities/handle-game-notice.js"
import { handleRemoveEntity } from "./entities/handle-remove-entity.js"
import { handleUpdateState } from "./entities/handle-update-state.js"
import { handleConnect } from "./handshake/handle-connect.js"
import { handleDisconnect } from "./handshake/handle-disconnect.js"
import { handleLogin } from "./handshake/handle-login.js"
import { handleLoginResult } from "./handshake/handle-login-result.js"
import type { SessionHandlerContext } from "./types.js"
import { disconnectAndClose } from "./utils.js"

/**
 * Route an envelope received from the peer.
 *
 * The handshake table is consulted first: an envelope the current phase (or
 * our role) does not permit is a protocol violation and ends the session.
 * Envelopes arriving after the session closed are dropped.
 */
export function envelopeDispatcher(
  envelope: Envelope,
  ctx: SessionHandlerContext,
): Command | undefined {
  const { model, logger } = ctx

  if (model.phase === "closed") {
    logger.debug("dropping {envelopeType} received after close", {
      envelopeType: envelope.type,
    })
    return
  }

  if (!canReceive(model.role, model.phase, envelope.type)) {
    const reasonStr = `unexpected ${envelope.type} in phase ${model.phase}`
    logger.error("protocol violation: {reasonStr}", { reasonStr })
    return disconnectAndClose(model, "protocol-error", reasonStr)
  }

  switch (envelope.type) {
    case "connect":
      return handleConnect(envelope, ctx)

    case "login":
      return handleLogin(envelope, ctx)

    case "login-result":
      return handleLoginResult(envelope, ctx)

    case "disconnect":
      return handleDisconnect(envelope, ctx)

    case "add-entity":
      return handleAddEntity(envelope, ctx)

    case "remove-entity":
      return handleRemoveEntity(envelope, ctx)

    case "update-state":
      return handleUpdateState(envelope, ctx)

    case "assign-control":
      return handleAssignControl(envelope, ctx)

    case "move":
    case "entity-death":
    case "combat-hit":
      return handleGameNotice(envelope, ctx)
  }
}
