/**
 * Handle session/login-verdict - server side
 *
 * Accept: LoginResult{succeeded}, established.
 * Reject: LoginResult{failed, reason}, Disconnect{KICKED}, closed.
 */

import type { Command, SessionMessage } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { batchAsNeeded, closeSession, transitionTo } from "../utils.js"

type LoginVerdictMessage = Extract<
  SessionMessage,
  { type: "session/login-verdict" }
>

export function handleLoginVerdict(
  msg: LoginVerdictMessage,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  // The client may have gone away while the authority was deciding
  if (model.phase !== "awaiting-login-result" || model.role !== "server") {
    logger.debug("ignoring login verdict in phase {phase}", {
      phase: model.phase,
    })
    return
  }

  const { verdict } = msg
  const name = model.identity?.name

  if (verdict.accepted) {
    logger.info("login accepted for {name}", { name })
    return batchAsNeeded(
      {
        type: "cmd/send",
        envelope: { type: "login-result", succeeded: true },
      },
      transitionTo(model, "established"),
      {
        type: "cmd/emit-established",
        identity: model.identity && { ...model.identity },
      },
    )
  }

  logger.info("login rejected for {name}: {reason}", {
    name,
    reason: verdict.reason,
  })
  return batchAsNeeded(
    {
      type: "cmd/send",
      envelope: {
        type: "login-result",
        succeeded: false,
        reason: verdict.reason,
      },
    },
    {
      type: "cmd/send",
      envelope: {
        type: "disconnect",
        reason: "kicked",
        reasonStr: `login failed: ${verdict.reason}`,
      },
    },
    { type: "cmd/emit-login-rejected", reason: verdict.reason },
    closeSession(model, { type: "login-failed", reason: verdict.reason }),
  )
}
