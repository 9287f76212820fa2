import type { Command, SessionMessage } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { disconnectAndClose } from "../utils.js"

type HandshakeTimeoutMessage = Extract<
  SessionMessage,
  { type: "session/handshake-timeout" }
>

export function handleHandshakeTimeout(
  _msg: HandshakeTimeoutMessage,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  if (model.phase === "established" || model.phase === "closed") return

  logger.warn("handshake timed out in phase {phase}", { phase: model.phase })
  return disconnectAndClose(model, "protocol-error", "handshake timed out")
}
