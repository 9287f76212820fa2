import { createServer, type Server } from "node:net"
import type { GameServer } from "@arena-wire/session"
import { getLogger } from "@logtape/logtape"
import { type NetSocketLike, wrapNetSocket } from "./net-stream.js"

const logger = getLogger(["@arena-wire", "adapter-tcp", "server"])

export interface NetServerLike {
  on(event: "connection", listener: (socket: NetSocketLike) => void): unknown
  off(event: "connection", listener: (socket: NetSocketLike) => void): unknown
}

export type ListenTcpOptions = {
  port: number
  host?: string
}

/**
 * Hand every socket `netServer` accepts to `gameServer`.
 *
 * @returns a function that stops accepting new sockets
 */
export function attachNetServer(
  netServer: NetServerLike,
  gameServer: GameServer,
): () => void {
  const onConnection = (socket: NetSocketLike) => {
    const connection = gameServer.accept(wrapNetSocket(socket))
    logger.info("tcp client connected as {connectionId}", {
      connectionId: connection.id,
    })
  }

  netServer.on("connection", onConnection)
  return () => {
    netServer.off("connection", onConnection)
  }
}

/**
 * Start a TCP listener for `gameServer`. Resolves once it is bound.
 *
 * @example
 * ```typescript
 * const server = new GameServer({ options: { maxClients: 16 } })
 * const listener = await listenTcp(server, { port: 7777 })
 * ```
 */
export function listenTcp(
  gameServer: GameServer,
  { port, host = "0.0.0.0" }: ListenTcpOptions,
): Promise<Server> {
  const netServer = createServer(socket => {
    socket.setNoDelay(true)
  })
  attachNetServer(netServer, gameServer)

  return new Promise((resolve, reject) => {
    netServer.once("error", reject)
    netServer.listen(port, host, () => {
      netServer.off("error", reject)
      logger.info("listening on {host}:{port}", { host, port })
      resolve(netServer)
    })
  })
}
