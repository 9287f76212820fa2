/**
 * ByteStream - the transport contract a GameConnection runs over.
 *
 * A stream is reliable and ordered. Chunk boundaries carry no meaning: the
 * connection reassembles frames from whatever slices arrive.
 */
export interface ByteStream {
  /** Queue bytes for the peer */
  send(data: Uint8Array): void

  /** Close the stream; `onClose` handlers fire once */
  close(): void

  /** Register a handler for incoming bytes */
  onData(handler: (chunk: Uint8Array) => void): void

  /** Register a handler for the end of the stream */
  onClose(handler: () => void): void

  /** Register a handler for transport errors */
  onError(handler: (error: Error) => void): void

  /** Bytes accepted by `send` but not yet handed to the network */
  readonly bufferedAmount: number

  readonly isOpen: boolean
}

type StreamEnd = ByteStream & {
  connect(peer: StreamEnd): void
  deliver(chunk: Uint8Array): void
  end(): void
}

function createStreamEnd(): StreamEnd {
  const dataHandlers: Array<(chunk: Uint8Array) => void> = []
  const closeHandlers: Array<() => void> = []
  const pending: Uint8Array[] = []
  let open = true
  let peer: StreamEnd | undefined

  const end: StreamEnd = {
    connect(other) {
      peer = other
    },

    send(data) {
      if (!open) return
      // Copy: the sender may reuse its buffer
      peer?.deliver(data.slice())
    },

    close() {
      if (!open) return
      end.end()
      peer?.end()
    },

    onData(handler) {
      dataHandlers.push(handler)
      // Bytes that arrived before anyone listened
      for (const chunk of pending.splice(0)) handler(chunk)
    },

    onClose(handler) {
      closeHandlers.push(handler)
    },

    onError() {
      // In-memory delivery cannot fail
    },

    get bufferedAmount() {
      return 0
    },

    get isOpen() {
      return open
    },

    deliver(chunk) {
      if (!open) return
      if (dataHandlers.length === 0) {
        pending.push(chunk)
        return
      }
      for (const handler of dataHandlers) handler(chunk)
    },

    end() {
      if (!open) return
      open = false
      for (const handler of closeHandlers) handler()
    },
  }

  return end
}

/**
 * Two in-memory streams joined back to back. Bytes sent on one are delivered
 * synchronously to the other; closing either closes both.
 *
 * @example
 * ```typescript
 * const [serverSide, clientSide] = createInProcessStreamPair()
 * server.accept(serverSide)
 * await client.connect(clientSide, { name: "alice" })
 * ```
 */
export function createInProcessStreamPair(): [ByteStream, ByteStream] {
  const a = createStreamEnd()
  const b = createStreamEnd()
  a.connect(b)
  b.connect(a)
  return [a, b]
}
