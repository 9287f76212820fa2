import type { ByteStream } from "@arena-wire/session"
import WebSocket from "ws"
import { wrapWsSocket } from "./ws-stream.js"

/**
 * Open a WebSocket to `url` and expose it as a ByteStream once connected.
 *
 * @example
 * ```typescript
 * const client = new GameClient()
 * await client.connect(await connectWebSocket("ws://localhost:7778"), {
 *   name: "alice",
 * })
 * ```
 */
export function connectWebSocket(url: string): Promise<ByteStream> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url)

    const onError = (error: Error) => {
      ws.off("open", onOpen)
      reject(error)
    }
    const onOpen = () => {
      ws.off("error", onError)
      resolve(wrapWsSocket(ws))
    }

    ws.once("open", onOpen)
    ws.once("error", onError)
  })
}
