import type { CloseReason } from "./types.js"

export type SessionErrorCode =
  | "not-established"
  | "wrong-direction"
  | "already-started"
  | "wrong-role"
  | "connection-closed"
  | "login-rejected"
  | "timeout"

/**
 * Raised for local misuse of a connection (sending before the handshake
 * finished, sending client-only traffic from a server) and to reject promises
 * such as `waitForPhase` when the session ends first.
 */
export class SessionError extends Error {
  override readonly name = "SessionError"

  constructor(
    public readonly code: SessionErrorCode,
    message: string,
    public readonly closeReason?: CloseReason,
  ) {
    super(message)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SessionError)
    }
  }
}

export function describeCloseReason(reason: CloseReason): string {
  switch (reason.type) {
    case "disconnect-received":
      return reason.reasonStr
        ? `disconnected by peer (${reason.reason}): ${reason.reasonStr}`
        : `disconnected by peer (${reason.reason})`
    case "disconnect-sent":
      return reason.reasonStr
        ? `disconnected (${reason.reason}): ${reason.reasonStr}`
        : `disconnected (${reason.reason})`
    case "login-failed":
      return `login failed: ${reason.reason}`
    case "transport-closed":
      return "transport closed"
    case "send-overflow":
      return `send buffer overflow at ${reason.bufferedBytes} bytes`
  }
}
