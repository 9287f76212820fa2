/**
 * Handle Connect - both sides of the version exchange
 *
 * ```
 * Client                          Server (awaiting-connect)
 *   |-- Connect{version} --------->|  version matches: reply, awaiting-login
 *   |<-------- Connect{version} ---|  otherwise: Disconnect, closed
 *   |                              |
 *   | (awaiting-connect-ack)       |
 *   |   version matches: Login, awaiting-login-result
 *   |   otherwise: Disconnect, closed
 * ```
 */

import type { ConnectMsg } from "@arena-wire/wire-format"
import type { Command } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { batchAsNeeded, disconnectAndClose, transitionTo } from "../utils.js"

export function handleConnect(
  msg: ConnectMsg,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  model.peerVersion = { version: msg.version, versionStr: msg.versionStr }

  if (msg.version !== model.protocolVersion) {
    const reasonStr = `protocol version ${msg.version} is not supported, expected ${model.protocolVersion}`
    logger.warn("version mismatch: {reasonStr}", { reasonStr })
    return disconnectAndClose(model, "wrong-protocol-version", reasonStr)
  }

  if (model.role === "server") {
    return batchAsNeeded(
      {
        type: "cmd/send",
        envelope: {
          type: "connect",
          version: model.protocolVersion,
          versionStr: model.versionStr,
        },
      },
      transitionTo(model, "awaiting-login"),
    )
  }

  const identity = model.identity
  if (!identity) {
    // The server spoke first; canReceive only lets this through after start
    const reasonStr = "connect received before the handshake started"
    logger.error("protocol violation: {reasonStr}", { reasonStr })
    return disconnectAndClose(model, "protocol-error", reasonStr)
  }

  return batchAsNeeded(
    {
      type: "cmd/send",
      envelope: {
        type: "login",
        name: identity.name,
        authtoken: identity.authtoken,
        permissions: identity.permissions,
      },
    },
    transitionTo(model, "awaiting-login-result"),
  )
}
