import type { ByteStream } from "@arena-wire/session"
import { getLogger } from "@logtape/logtape"

const logger = getLogger(["@arena-wire", "adapter-websocket"])

/** `ws` hands binary messages over as one of these */
type RawData = Buffer | ArrayBuffer | Buffer[]

const OPEN = 1

/**
 * The part of a `ws` WebSocket the stream wrapper uses.
 */
export interface WsSocketLike {
  send(data: Uint8Array): void
  close(code?: number, reason?: string): void
  on(
    event: "message",
    listener: (data: RawData, isBinary: boolean) => void,
  ): unknown
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown
  on(event: "error", listener: (error: Error) => void): unknown
  readonly readyState: number
  readonly bufferedAmount: number
}

function toUint8Array(data: RawData): Uint8Array {
  if (Array.isArray(data)) {
    return new Uint8Array(Buffer.concat(data))
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data)
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
}

/**
 * Expose a `ws` WebSocket as a ByteStream.
 *
 * Each binary message is one chunk of the byte stream; message boundaries
 * need not match frame boundaries. Text messages are not part of the
 * protocol and close the socket with 1003 (unsupported data).
 */
export function wrapWsSocket(ws: WsSocketLike): ByteStream {
  let closing = false

  return {
    send(data) {
      ws.send(data)
    },

    close() {
      if (closing) return
      closing = true
      ws.close(1000, "")
    },

    onData(handler) {
      ws.on("message", (data, isBinary) => {
        if (!isBinary) {
          logger.warn("closing socket that sent a text message")
          closing = true
          ws.close(1003, "binary frames only")
          return
        }
        handler(toUint8Array(data))
      })
    },

    onClose(handler) {
      ws.on("close", (code, reason) => {
        logger.debug("socket closed: {code} {reason}", {
          code,
          reason: reason.toString(),
        })
        handler()
      })
    },

    onError(handler) {
      ws.on("error", handler)
    },

    get bufferedAmount() {
      return ws.bufferedAmount
    },

    get isOpen() {
      return !closing && ws.readyState === OPEN
    },
  }
}
