/**
 * TCP transport for arena-wire.
 *
 * @packageDocumentation
 */

export { connectTcp } from "./client.js"
export { type NetSocketLike, wrapNetSocket } from "./net-stream.js"
export {
  attachNetServer,
  type ListenTcpOptions,
  listenTcp,
  type NetServerLike,
} from "./server.js"
