import type { DisconnectMsg } from "@arena-wire/wire-format"
import type { Command } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { closeSession } from "../utils.js"

export function handleDisconnect(
  msg: DisconnectMsg,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  logger.info("peer disconnected: {reason} {reasonStr}", {
    reason: msg.reason,
    reasonStr: msg.reasonStr ?? "",
  })

  return closeSession(model, {
    type: "disconnect-received",
    reason: msg.reason,
    reasonStr: msg.reasonStr,
  })
}
