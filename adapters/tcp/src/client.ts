import { connect } from "node:net"
import type { ByteStream } from "@arena-wire/session"
import { wrapNetSocket } from "./net-stream.js"

/**
 * Open a TCP connection and expose it as a ByteStream once connected.
 */
export function connectTcp(host: string, port: number): Promise<ByteStream> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host, port, noDelay: true })

    const onError = (error: Error) => {
      socket.off("connect", onConnect)
      reject(error)
    }
    const onConnect = () => {
      socket.off("error", onError)
      resolve(wrapNetSocket(socket))
    }

    socket.once("connect", onConnect)
    socket.once("error", onError)
  })
}
