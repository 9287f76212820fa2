/**
 * WorkQueue - deferred execution for a connection's dispatch loop
 *
 * Transports may deliver bytes synchronously from inside a send (the
 * in-process stream pair does). Work items are queued and processed
 * iteratively rather than recursively, so one message is fully handled
 * before the next one starts.
 *
 * @example
 * ```typescript
 * const queue = new WorkQueue(() => {
 *   // Called at quiescence (when queue is empty)
 *   checkSendBuffer()
 * })
 *
 * queue.enqueue(() => handleFrame(frame1))
 * queue.enqueue(() => handleFrame(frame2))
 * ```
 */
export class WorkQueue {
  #queue: Array<() => void> = []
  #isProcessing = false
  readonly #onQuiescent: () => void

  /**
   * @param onQuiescent - Callback invoked when the queue becomes empty.
   */
  constructor(onQuiescent: () => void) {
    this.#onQuiescent = onQuiescent
  }

  /**
   * Enqueue work to be processed.
   *
   * If not currently processing, starts processing immediately.
   * If already processing, the work runs after everything queued before it.
   */
  enqueue(work: () => void): void {
    this.#queue.push(work)
    this.#processUntilQuiescent()
  }

  #processUntilQuiescent(): void {
    if (this.#isProcessing) return

    this.#isProcessing = true
    try {
      let work = this.#queue.shift()
      while (work) {
        work()
        work = this.#queue.shift()
      }
      this.#onQuiescent()
    } finally {
      this.#isProcessing = false
    }

    // onQuiescent may have queued more work
    if (this.#queue.length > 0) {
      this.#processUntilQuiescent()
    }
  }
}
