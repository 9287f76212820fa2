/**
 * @arena-wire/session
 *
 * Connection handshake and entity synchronization for the arena-wire game
 * protocol, on top of `@arena-wire/wire-format`.
 */

export * from "./authority.js"
export * from "./byte-stream.js"
export * from "./client.js"
export * from "./connection.js"
export * from "./errors.js"
export * from "./handshake.js"
export * from "./server.js"
export {
  type Command,
  createSessionUpdate,
  init,
  type SessionInit,
  type SessionMessage,
  type SessionModel,
} from "./session-program.js"
export * from "./types.js"
