import type { Command, SessionMessage } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { disconnectAndClose } from "../utils.js"

type DisconnectMessage = Extract<SessionMessage, { type: "session/disconnect" }>

export function handleLocalDisconnect(
  msg: DisconnectMessage,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  if (model.phase === "closed") {
    logger.debug("disconnect requested on a closed session")
    return
  }

  return disconnectAndClose(model, msg.reason, msg.reasonStr)
}
