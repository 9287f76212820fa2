/**
 * Handle Login - server side
 *
 * The session waits in `awaiting-login-result` while the runtime asks the
 * LoginAuthority; the answer comes back as `session/login-verdict`.
 */

import type { LoginMsg } from "@arena-wire/wire-format"
import type { Command } from "../../session-program.js"
import type { LoginIdentity } from "../../types.js"
import type { SessionHandlerContext } from "../types.js"
import { batchAsNeeded, transitionTo } from "../utils.js"

export function handleLogin(
  msg: LoginMsg,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  const identity: LoginIdentity = { name: msg.name }
  if (msg.authtoken !== undefined) identity.authtoken = msg.authtoken
  if (msg.permissions !== undefined) identity.permissions = msg.permissions

  model.identity = identity
  logger.debug("login requested by {name}", { name: msg.name })

  return batchAsNeeded(transitionTo(model, "awaiting-login-result"), {
    type: "cmd/verify-login",
    identity: { ...identity },
  })
}
