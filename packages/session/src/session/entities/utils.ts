import type { Command, SessionModel } from "../../session-program.js"
import type { MinorError } from "../../types.js"
import type { SessionHandlerContext } from "../types.js"

/**
 * Record a tolerated violation: the offending message is dropped and the
 * connection stays up.
 */
export function reportMinorError(
  error: MinorError,
  { model, logger }: SessionHandlerContext,
): Command {
  model.minorErrors++
  logger.warn("minor protocol error ({code}): {message}", {
    code: error.code,
    message: error.message,
  })
  return { type: "cmd/emit-minor-error", error }
}

export function isKnownEntity(model: SessionModel, id: number): boolean {
  return model.entities.has(id)
}
