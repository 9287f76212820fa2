import { type Envelope, FrameDecoder } from "@arena-wire/wire-format"
import type { ByteStream } from "./byte-stream.js"
import type { TimerAPI } from "./types.js"

/**
 * Let pending event listeners run. Emittery delivers events a few microtasks
 * after they are emitted; a macrotask boundary is past all of them.
 */
export async function flushEvents(): Promise<void> {
  await new Promise<void>(resolve => setTimeout(resolve, 0))
}

/**
 * A timer whose callbacks only run when the test says so.
 */
export function createManualTimer() {
  const pending = new Map<number, { fn: () => void; ms: number }>()
  let nextId = 1

  const timer: TimerAPI = {
    setTimeout: (fn, ms) => {
      const id = nextId++
      pending.set(id, { fn, ms })
      return id
    },
    clearTimeout: id => {
      if (typeof id === "number") pending.delete(id)
    },
  }

  return {
    timer,
    pending,
    fireAll() {
      for (const [id, { fn }] of [...pending]) {
        pending.delete(id)
        fn()
      }
    },
  }
}

/**
 * Collects everything written to the other end of a stream and decodes it.
 */
export function recordEnvelopes(stream: ByteStream): Envelope[] {
  const decoder = new FrameDecoder()
  const envelopes: Envelope[] = []
  stream.onData(chunk => {
    const result = decoder.push(chunk)
    if (result.status === "error") throw result.error
    envelopes.push(...result.envelopes)
  })
  return envelopes
}

/**
 * A ByteStream driven by the test: bytes are pushed in with `deliver`, sent
 * frames are recorded and `bufferedAmount` can be set.
 */
export class MockByteStream implements ByteStream {
  readonly sent: Uint8Array[] = []
  bufferedAmount = 0
  isOpen = true

  readonly #dataHandlers: Array<(chunk: Uint8Array) => void> = []
  readonly #closeHandlers: Array<() => void> = []
  readonly #errorHandlers: Array<(error: Error) => void> = []

  send(data: Uint8Array): void {
    this.sent.push(data)
  }

  close(): void {
    if (!this.isOpen) return
    this.isOpen = false
    for (const handler of this.#closeHandlers) handler()
  }

  onData(handler: (chunk: Uint8Array) => void): void {
    this.#dataHandlers.push(handler)
  }

  onClose(handler: () => void): void {
    this.#closeHandlers.push(handler)
  }

  onError(handler: (error: Error) => void): void {
    this.#errorHandlers.push(handler)
  }

  deliver(chunk: Uint8Array): void {
    for (const handler of this.#dataHandlers) handler(chunk)
  }

  fail(error: Error): void {
    for (const handler of this.#errorHandlers) handler(error)
  }
}
