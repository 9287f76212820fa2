import type { ByteStream } from "@arena-wire/session"
import { getLogger } from "@logtape/logtape"

const logger = getLogger(["@arena-wire", "adapter-tcp"])

/**
 * The part of a `node:net` Socket the stream wrapper uses.
 */
export interface NetSocketLike {
  write(data: Uint8Array): boolean
  end(): unknown
  on(event: "data", listener: (data: Buffer) => void): unknown
  on(event: "close", listener: (hadError: boolean) => void): unknown
  on(event: "error", listener: (error: Error) => void): unknown
  readonly writableLength: number
  readonly writable: boolean
  readonly destroyed: boolean
}

/**
 * Expose a TCP socket as a ByteStream. Chunks arrive as the kernel hands
 * them over; the session's frame decoder does the reassembly.
 */
export function wrapNetSocket(socket: NetSocketLike): ByteStream {
  let closing = false

  return {
    send(data) {
      socket.write(data)
    },

    close() {
      if (closing) return
      closing = true
      socket.end()
    },

    onData(handler) {
      socket.on("data", data => {
        handler(new Uint8Array(data.buffer, data.byteOffset, data.byteLength))
      })
    },

    onClose(handler) {
      socket.on("close", hadError => {
        logger.debug("socket closed (hadError={hadError})", { hadError })
        handler()
      })
    },

    onError(handler) {
      socket.on("error", handler)
    },

    get bufferedAmount() {
      return socket.writableLength
    },

    get isOpen() {
      return !closing && socket.writable && !socket.destroyed
    },
  }
}
