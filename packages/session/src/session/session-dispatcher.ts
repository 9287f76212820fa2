import type { Logger } from "@logtape/logtape"
import type {
  Command,
  SessionMessage,
  SessionModel,
} from "../session-program.js"
import { handleHandshakeTimeout } from "./connection/handle-handshake-timeout.js"
import { handleLocalDisconnect } from "./connection/handle-local-disconnect.js"
import { handleMalformedFrame } from "./connection/handle-malformed-frame.js"
import { handleSend } from "./connection/handle-send.js"
import { handleSendOverflow } from "./connection/handle-send-overflow.js"
import { handleTransportClosed } from "./connection/handle-transport-closed.js"
import { envelopeDispatcher } from "./envelope-dispatcher.js"
import { handleLoginVerdict } from "./handshake/handle-login-verdict.js"
import { handleStart } from "./handshake/handle-start.js"

export function sessionDispatcher(
  msg: SessionMessage,
  model: SessionModel,
  logger: Logger,
): Command | undefined {
  const ctx = { model, logger }

  switch (msg.type) {
    case "session/start":
      return handleStart(msg, ctx)

    case "session/receive":
      // Envelopes from the peer are routed through the envelope dispatcher
      return envelopeDispatcher(msg.envelope, ctx)

    case "session/malformed-frame":
      return handleMalformedFrame(msg, ctx)

    case "session/login-verdict":
      return handleLoginVerdict(msg, ctx)

    case "session/send":
      return handleSend(msg, ctx)

    case "session/disconnect":
      return handleLocalDisconnect(msg, ctx)

    case "session/transport-closed":
      return handleTransportClosed(msg, ctx)

    case "session/send-overflow":
      return handleSendOverflow(msg, ctx)

    case "session/handshake-timeout":
      return handleHandshakeTimeout(msg, ctx)
  }
}
