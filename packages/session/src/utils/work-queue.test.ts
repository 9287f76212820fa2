import { describe, expect, it, vi } from "vitest"
import { WorkQueue } from "./work-queue.js"

describe("WorkQueue", () => {
  it("should run work immediately when idle", () => {
    const handled: string[] = []
    const queue = new WorkQueue(() => {})

    queue.enqueue(() => handled.push("connect"))

    expect(handled).toEqual(["connect"])
  })

  it("should defer work enqueued while processing until the current item finishes", () => {
    const handled: string[] = []
    const queue = new WorkQueue(() => {})

    queue.enqueue(() => {
      handled.push("login:start")
      // A synchronous peer answering from inside our send
      queue.enqueue(() => handled.push("login-result"))
      handled.push("login:end")
    })

    expect(handled).toEqual(["login:start", "login:end", "login-result"])
  })

  it("should call onQuiescent once per drain", () => {
    const onQuiescent = vi.fn()
    const queue = new WorkQueue(onQuiescent)

    queue.enqueue(() => {
      queue.enqueue(() => {})
      queue.enqueue(() => {})
    })

    expect(onQuiescent).toHaveBeenCalledTimes(1)
  })

  it("should process work enqueued from onQuiescent", () => {
    const handled: string[] = []
    let checks = 0
    const queue = new WorkQueue(() => {
      checks++
      if (checks === 1) queue.enqueue(() => handled.push("send-overflow"))
    })

    queue.enqueue(() => handled.push("send"))

    expect(handled).toEqual(["send", "send-overflow"])
    expect(checks).toBe(2)
  })

  it("should keep accepting work after an item throws", () => {
    const queue = new WorkQueue(() => {})

    expect(() =>
      queue.enqueue(() => {
        throw new Error("bad frame")
      }),
    ).toThrow("bad frame")

    const handled: number[] = []
    queue.enqueue(() => handled.push(1))
    expect(handled).toEqual([1])
  })
})
