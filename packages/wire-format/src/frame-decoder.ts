/**
 * Stateful frame decoding for stream transports.
 *
 * A TCP read or a WebSocket message may hold part of a frame, or several
 * frames at once. FrameDecoder buffers bytes across pushes and hands back
 * whole envelopes in arrival order. Pure frame parsing is in `decode.ts`.
 */

import { type DecodeOptions, decodeFrame } from "./decode.js"
import type { Envelope } from "./envelope.js"
import { MalformedPayloadError } from "./errors.js"

/**
 * Result of pushing a chunk into the decoder.
 *
 * On error, `envelopes` holds the frames that were decoded from the chunk
 * before the malformed one.
 */
export type FrameDecoderResult =
  | { status: "ok"; envelopes: Envelope[] }
  | { status: "error"; error: MalformedPayloadError; envelopes: Envelope[] }

const EMPTY = new Uint8Array(0)

export class FrameDecoder {
  private buffer: Uint8Array = EMPTY
  private failure: MalformedPayloadError | undefined

  constructor(private readonly options: DecodeOptions = {}) {}

  /**
   * Append a chunk and decode every frame it completes.
   *
   * Once a malformed frame has been seen the stream cannot be resynchronized:
   * every later push reports the same error.
   */
  push(chunk: Uint8Array): FrameDecoderResult {
    if (this.failure) {
      return { status: "error", error: this.failure, envelopes: [] }
    }

    this.buffer = this.buffer.length === 0 ? chunk : concat(this.buffer, chunk)

    const envelopes: Envelope[] = []
    let offset = 0

    while (offset < this.buffer.length) {
      let result: ReturnType<typeof decodeFrame>
      try {
        result = decodeFrame(this.buffer, offset, this.options)
      } catch (error) {
        if (!(error instanceof MalformedPayloadError)) throw error
        this.failure = error
        this.buffer = EMPTY
        return { status: "error", error, envelopes }
      }

      if (result.status === "incomplete") break

      envelopes.push(result.envelope)
      offset += result.bytesConsumed
    }

    // Keep only the unread tail; copy so the caller's chunk can be reused
    this.buffer = offset === 0 ? this.buffer.slice() : this.buffer.slice(offset)

    return { status: "ok", envelopes }
  }

  /** Bytes held for a frame that has not fully arrived */
  get bufferedBytes(): number {
    return this.buffer.length
  }

  get isPoisoned(): boolean {
    return this.failure !== undefined
  }
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length)
  out.set(a, 0)
  out.set(b, a.length)
  return out
}
