import type { AssignControlMsg } from "@arena-wire/wire-format"
import type { Command } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"

export function handleAssignControl(
  msg: AssignControlMsg,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  if (msg.revoked) {
    model.controlled.delete(msg.uid)
    logger.debug("control of entity {uid} revoked", { uid: msg.uid })
  } else {
    model.controlled.add(msg.uid)
    logger.debug("control of entity {uid} assigned", { uid: msg.uid })
  }

  return { type: "cmd/emit-message", envelope: msg }
}
