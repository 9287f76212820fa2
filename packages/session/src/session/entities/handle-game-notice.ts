import type {
  CombatHitMsg,
  EntityDeathMsg,
  MoveMsg,
} from "@arena-wire/wire-format"
import type { Command } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"

/**
 * Move, EntityDeath and CombatHit leave the session model untouched; they
 * are handed to the application as they are.
 */
export function handleGameNotice(
  msg: MoveMsg | EntityDeathMsg | CombatHitMsg,
  _ctx: SessionHandlerContext,
): Command | undefined {
  return { type: "cmd/emit-message", envelope: msg }
}
