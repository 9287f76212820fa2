import type { Command, SessionMessage } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { closeSession } from "../utils.js"

type TransportClosedMessage = Extract<
  SessionMessage,
  { type: "session/transport-closed" }
>

/**
 * The byte stream went away without a Disconnect.
 */
export function handleTransportClosed(
  _msg: TransportClosedMessage,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  if (model.phase === "closed") return

  logger.info("transport closed in phase {phase}", { phase: model.phase })
  return closeSession(model, { type: "transport-closed" })
}
