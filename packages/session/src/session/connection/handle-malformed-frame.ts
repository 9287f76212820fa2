import type { Command, SessionMessage } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { disconnectAndClose } from "../utils.js"

type MalformedFrameMessage = Extract<
  SessionMessage,
  { type: "session/malformed-frame" }
>

/**
 * A frame that does not decode ends the session with PROTOCOL_ERROR.
 */
export function handleMalformedFrame(
  msg: MalformedFrameMessage,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  if (model.phase === "closed") return

  logger.error("malformed frame ({reason}): {message}", {
    reason: msg.error.reason,
    message: msg.error.message,
  })
  return disconnectAndClose(model, "protocol-error", msg.error.message)
}
