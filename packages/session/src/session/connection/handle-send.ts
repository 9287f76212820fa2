import type { Command, SessionMessage } from "../../session-program.js"
import type { SessionHandlerContext } from "../types.js"

type SendMessage = Extract<SessionMessage, { type: "session/send" }>

/**
 * Handle session/send - outbound game traffic
 *
 * The runtime has already checked direction and encoded the frame. Here we track
 * which entities we announced, so updates for unannounced ids show up in the
 * log before the peer reports them as minor errors.
 */
export function handleSend(
  msg: SendMessage,
  { model, logger }: SessionHandlerContext,
): Command | undefined {
  const { envelope } = msg

  // Queued behind a message that closed the session
  if (model.phase !== "established") {
    logger.debug("dropping outbound {envelopeType} in phase {phase}", {
      envelopeType: envelope.type,
      phase: model.phase,
    })
    return
  }

  switch (envelope.type) {
    case "add-entity":
      model.announced.add(envelope.id)
      break
    case "remove-entity":
      model.announced.delete(envelope.id)
      break
    case "update-state":
      if (!model.announced.has(envelope.id)) {
        logger.warn("sending UpdateState for unannounced entity {id}", {
          id: envelope.id,
        })
      }
      break
  }

  return { type: "cmd/send", envelope, frame: msg.frame }
}
