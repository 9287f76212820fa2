import { env, logger } from "./config.js"

import { listenTcp } from "@arena-wire/adapter-tcp"
import { attachWebSocketServer } from "@arena-wire/adapter-websocket"
import { GameServer } from "@arena-wire/session"
import { WebSocketServer } from "ws"
import { GameWorld } from "./world.js"

const serverLogger = logger.getChild("server")

const gameServer = new GameServer({
  options: { maxClients: 32, handshakeTimeoutMs: 10_000 },
})

const world = new GameWorld(gameServer)
world.attach()

const tcpServer = await listenTcp(gameServer, { port: env.TCP_PORT })

const wss = new WebSocketServer({ port: env.WS_PORT })
attachWebSocketServer(wss, gameServer)
wss.on("listening", () => {
  serverLogger.info`WebSocket listening on port ${env.WS_PORT}`
})

serverLogger.info`Goblin camp open with ${world.actors.size} goblins`

// Graceful shutdown
process.on("SIGINT", () => {
  serverLogger.info`Shutting down`
  gameServer.close()
  tcpServer.close()
  wss.close()
})
