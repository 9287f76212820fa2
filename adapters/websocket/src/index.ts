/**
 * WebSocket transport for arena-wire.
 *
 * Binary WebSocket messages carry the same length-prefixed frames as TCP;
 * a frame may span several messages and a message may hold several frames.
 *
 * @packageDocumentation
 */

export { connectWebSocket } from "./client.js"
export { attachWebSocketServer, type WsServerLike } from "./server.js"
export { type WsSocketLike, wrapWsSocket } from "./ws-stream.js"
