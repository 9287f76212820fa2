/**
 * Handle session/start - client side of connection handshake
 *
 * The client opens the handshake by announcing its protocol version. The
 * identity to log in with is kept until the server's Connect arrives.
 */

import type { Command, SessionMessage } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"

type StartMessage = Extract<SessionMessage, { type: "session/start" }>

export function handleStart(
  msg: StartMessage,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  if (model.role !== "client") {
    logger.warn("ignoring session/start on a server session")
    return
  }
  if (model.identity || model.phase !== "awaiting-connect-ack") {
    logger.warn("ignoring repeated session/start in phase {phase}", {
      phase: model.phase,
    })
    return
  }

  model.identity = { ...msg.identity }

  return {
    type: "cmd/send",
    envelope: {
      type: "connect",
      version: model.protocolVersion,
      versionStr: model.versionStr,
    },
  }
}
