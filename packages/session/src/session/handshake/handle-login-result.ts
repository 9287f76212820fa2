/**
 * Handle LoginResult - client side
 *
 * Success establishes the session. Failure closes it; the server follows a
 * failed result with Disconnect{KICKED}.
 */

import type { LoginResultMsg } from "@arena-wire/wire-format"
import type { Command } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { batchAsNeeded, closeSession, transitionTo } from "../utils.js"

export function handleLoginResult(
  msg: LoginResultMsg,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  if (msg.succeeded) {
    logger.info("logged in as {name}", { name: model.identity?.name })
    return batchAsNeeded(transitionTo(model, "established"), {
      type: "cmd/emit-established",
      identity: model.identity && { ...model.identity },
    })
  }

  // A failed result without a usable reason is treated as access-denied
  const reason =
    msg.reason === undefined || msg.reason === "accepted"
      ? "access-denied"
      : msg.reason

  logger.warn("login rejected: {reason}", { reason })
  return batchAsNeeded(
    { type: "cmd/emit-login-rejected", reason },
    closeSession(model, { type: "login-failed", reason }),
  )
}
