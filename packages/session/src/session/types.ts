import type { Logger } from "@logtape/logtape"
import type { SessionModel } from "../session-program.js"

/**
 * Context passed to every session message handler.
 */
export type SessionHandlerContext = {
  model: SessionModel
  logger: Logger
}
