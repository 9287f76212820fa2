import { describe, expect, it } from "vitest"
import { parseEnv } from "./env.js"

describe("parseEnv", () => {
  it("should fall back to the default ports and level", () => {
    expect(parseEnv({})).toEqual({
      TCP_PORT: 7777,
      WS_PORT: 7778,
      LOG_LEVEL: "info",
    })
  })

  it("should read ports from strings", () => {
    const env = parseEnv({ TCP_PORT: "9000", WS_PORT: "9001", LOG_LEVEL: "trace" })

    expect(env.TCP_PORT).toBe(9000)
    expect(env.WS_PORT).toBe(9001)
    expect(env.LOG_LEVEL).toBe("trace")
  })

  it("should reject a port out of range", () => {
    expect(() => parseEnv({ TCP_PORT: "70000" })).toThrow(
      /^invalid environment: TCP_PORT: /,
    )
  })

  it("should reject an unknown log level", () => {
    expect(() => parseEnv({ LOG_LEVEL: "verbose" })).toThrow(
      /^invalid environment: LOG_LEVEL: /,
    )
  })
})
