import { logger } from "./config.js"

import { connectTcp } from "@arena-wire/adapter-tcp"
import { connectWebSocket } from "@arena-wire/adapter-websocket"
import { describeCloseReason, GameClient } from "@arena-wire/session"
import { vector3 } from "@arena-wire/wire-format"
import meow from "meow"

const cli = meow(
  `
  Usage
    $ npm run bot -- [options]

  Options
    --host          Server host (default localhost)
    --port, -p      Server port (default 7777)
    --websocket     Connect over WebSocket to this URL instead of TCP
    --name, -n      Player name (default bot)
    --steps, -s     Number of moves before leaving (default 20)
    --interval, -i  Milliseconds between moves (default 500)

  Examples
    $ npm run bot -- --name grog --steps 50
    $ npm run bot -- --websocket ws://localhost:7778
`,
  {
    importMeta: import.meta,
    flags: {
      host: { type: "string", default: "localhost" },
      port: { type: "number", shortFlag: "p", default: 7777 },
      websocket: { type: "string" },
      name: { type: "string", shortFlag: "n", default: "bot" },
      steps: { type: "number", shortFlag: "s", default: 20 },
      interval: { type: "number", shortFlag: "i", default: 500 },
    },
  },
)

const botLogger = logger.getChild("bot")

const DIRECTIONS = [
  vector3(1, 0, 0),
  vector3(-1, 0, 0),
  vector3(0, 1, 0),
  vector3(0, -1, 0),
]

const { host, port, websocket, name, steps, interval } = cli.flags

const stream = websocket
  ? await connectWebSocket(websocket)
  : await connectTcp(host, port)

const client = new GameClient()

client.emitter.on("message", ({ envelope }) => {
  switch (envelope.type) {
    case "combat-hit":
      botLogger.info`${envelope.attackerName} hits ${envelope.victimName} for ${envelope.damage}`
      break
    case "entity-death":
      botLogger.info`${envelope.name} was killed by ${envelope.killerName}`
      break
  }
})

client.emitter.on("disconnected", ({ reason }) => {
  botLogger.info`Disconnected: ${describeCloseReason(reason)}`
})

await client.connect(stream, { name }, { timeoutMs: 5_000 })
botLogger.info`Logged in as ${name}, world has ${client.world.size} entities`

let remaining = steps
const timer = setInterval(() => {
  if (!client.isConnected || remaining-- <= 0) {
    clearInterval(timer)
    client.disconnect()
    return
  }
  const direction = DIRECTIONS[Math.floor(Math.random() * DIRECTIONS.length)]
  if (direction) client.move(direction)
}, interval)
