import type { Command, SessionMessage } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"
import { closeSession } from "../utils.js"

type SendOverflowMessage = Extract<
  SessionMessage,
  { type: "session/send-overflow" }
>

/**
 * The peer stopped reading: more than the configured limit is waiting in the
 * transport's send buffer. The connection is dropped without a Disconnect,
 * which would only join the queue.
 */
export function handleSendOverflow(
  msg: SendOverflowMessage,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  if (model.phase === "closed") return

  logger.error("send buffer overflow ({bufferedBytes} bytes)", {
    bufferedBytes: msg.bufferedBytes,
  })
  return closeSession(model, {
    type: "send-overflow",
    bufferedBytes: msg.bufferedBytes,
  })
}
