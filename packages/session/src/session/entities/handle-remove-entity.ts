import type { RemoveEntityMsg } from "@arena-wire/wire-format"
import type { Command } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { isKnownEntity, reportMinorError } from "./utils.js"

export function handleRemoveEntity(
  msg: RemoveEntityMsg,
  ctx: SessionHandlerContext,
): Command | undefined {
  const { model } = ctx

  if (!isKnownEntity(model, msg.id)) {
    return reportMinorError(
      {
        code: "unknown-entity-remove",
        message: `RemoveEntity for unknown entity ${msg.id}`,
        envelope: msg,
      },
      ctx,
    )
  }

  model.entities.delete(msg.id)
  model.controlled.delete(msg.id)

  return { type: "cmd/emit-message", envelope: msg }
}
