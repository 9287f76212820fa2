import type { UpdateStateMsg } from "@arena-wire/wire-format"
import type { Command } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { reportMinorError } from "./utils.js"

/**
 * Handle UpdateState - replace one named state of a known entity
 *
 * An update for an id the peer never announced is a minor error.
 */
export function handleUpdateState(
  msg: UpdateStateMsg,
  ctx: SessionHandlerContext,
): Command | undefined {
  const entity = ctx.model.entities.get(msg.id)

  if (!entity) {
    return reportMinorError(
      {
        code: "unknown-entity-update",
        message: `UpdateState '${msg.stateId}' for unknown entity ${msg.id}`,
        envelope: msg,
      },
      ctx,
    )
  }

  entity.states.set(msg.stateId, msg.value)

  return { type: "cmd/emit-message", envelope: msg }
}
