import type { AddEntityMsg } from "@arena-wire/wire-format"
import type { Command } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"

/**
 * Handle AddEntity - register an entity the peer announced
 *
 * Announcing a known id again refreshes its name and keeps its states.
 */
export function handleAddEntity(
  msg: AddEntityMsg,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  const existing = model.entities.get(msg.id)

  if (existing) {
    logger.debug("entity {id} announced again", { id: msg.id })
    if (msg.name !== undefined) existing.name = msg.name
  } else {
    model.entities.set(msg.id, {
      id: msg.id,
      name: msg.name,
      states: new Map(),
    })
  }

  return { type: "cmd/emit-message", envelope: msg }
}
