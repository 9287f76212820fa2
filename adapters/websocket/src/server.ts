import type { GameServer } from "@arena-wire/session"
import { getLogger } from "@logtape/logtape"
import { type WsSocketLike, wrapWsSocket } from "./ws-stream.js"

const logger = getLogger(["@arena-wire", "adapter-websocket", "server"])

/**
 * The part of a `ws` WebSocketServer used here.
 */
export interface WsServerLike {
  on(event: "connection", listener: (socket: WsSocketLike) => void): unknown
  off(event: "connection", listener: (socket: WsSocketLike) => void): unknown
}

/**
 * Hand every WebSocket the server accepts to `gameServer`.
 *
 * @example
 * ```typescript
 * import { WebSocketServer } from "ws"
 *
 * const wss = new WebSocketServer({ port: 7778 })
 * const detach = attachWebSocketServer(wss, gameServer)
 * ```
 *
 * @returns a function that stops accepting new sockets
 */
export function attachWebSocketServer(
  wss: WsServerLike,
  gameServer: GameServer,
): () => void {
  const onConnection = (socket: WsSocketLike) => {
    const connection = gameServer.accept(wrapWsSocket(socket))
    logger.info("websocket client connected as {connectionId}", {
      connectionId: connection.id,
    })
  }

  wss.on("connection", onConnection)
  return () => {
    wss.off("connection", onConnection)
  }
}
