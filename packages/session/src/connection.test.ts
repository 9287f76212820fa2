import {
  encodeFrame,
  type GameMsg,
  intValue,
  InvalidFieldError,
  PayloadTooLargeError,
  vector3,
} from "@arena-wire/wire-format"
import { describe, expect, it } from "vitest"
import { createStaticAuthority, type LoginAuthority } from "./authority.js"
import { createInProcessStreamPair } from "./byte-stream.js"
import { GameConnection, type GameConnectionOptions } from "./connection.js"
import { SessionError } from "./errors.js"
import {
  createManualTimer,
  flushEvents,
  MockByteStream,
  recordEnvelopes,
} from "./test-utils.js"
import type { MinorError, Phase } from "./types.js"

function connectPair({
  authority,
  serverOptions,
  clientOptions,
}: {
  authority?: LoginAuthority
  serverOptions?: Partial<GameConnectionOptions>
  clientOptions?: Partial<GameConnectionOptions>
} = {}) {
  const [serverStream, clientStream] = createInProcessStreamPair()
  const server = new GameConnection({
    stream: serverStream,
    role: "server",
    id: 1,
    authority,
    options: serverOptions,
  })
  const client = new GameConnection({
    stream: clientStream,
    role: "client",
    options: clientOptions,
  })
  return { server, client }
}

function captureError(fn: () => void): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error("expected an error")
}

async function establishedPair() {
  const pair = connectPair()
  pair.client.start({ name: "alice" })
  await pair.client.waitForPhase("established")
  return pair
}

describe("GameConnection", () => {
  describe("handshake", () => {
    it("should establish both ends over an in-process stream", async () => {
      const { server, client } = connectPair()
      const clientPhases: Phase[] = []
      client.emitter.on("phase-changed", ({ to }) => {
        clientPhases.push(to)
      })

      client.start({ name: "alice", authtoken: "test-secret" })
      await client.waitForPhase("established")
      await flushEvents()

      expect(server.phase).toBe("established")
      expect(server.identity).toEqual({ name: "alice", authtoken: "test-secret" })
      expect(server.model.peerVersion).toEqual({
        version: 1,
        versionStr: "0.1.0",
      })
      expect(clientPhases).toEqual(["awaiting-login-result", "established"])
    })

    it("should emit established with the identity on the server", async () => {
      const { server, client } = connectPair()
      const identities: unknown[] = []
      server.emitter.on("established", ({ identity }) => {
        identities.push(identity)
      })

      client.start({ name: "alice" })
      await client.waitForPhase("established")
      await flushEvents()

      expect(identities).toEqual([{ name: "alice" }])
    })

    it("should close both ends on a protocol version mismatch", async () => {
      const { server, client } = connectPair({
        clientOptions: { protocolVersion: 2 },
      })
      const reasonStr = "protocol version 2 is not supported, expected 1"

      client.start({ name: "alice" })

      expect(server.closeReason).toEqual({
        type: "disconnect-sent",
        reason: "wrong-protocol-version",
        reasonStr,
      })
      expect(client.closeReason).toEqual({
        type: "disconnect-received",
        reason: "wrong-protocol-version",
        reasonStr,
      })
      await expect(client.waitForPhase("established")).rejects.toMatchObject({
        code: "connection-closed",
      })
    })

    it("should reject waitForPhase with login-rejected when the login fails", async () => {
      const { server, client } = connectPair({
        authority: createStaticAuthority({ banned: ["mallory"] }),
      })
      const rejections: string[] = []
      client.emitter.on("login-rejected", ({ reason }) => {
        rejections.push(reason)
      })

      client.start({ name: "mallory" })
      const established = client.waitForPhase("established")

      await expect(established).rejects.toMatchObject({
        code: "login-rejected",
        closeReason: { type: "login-failed", reason: "banned" },
      })
      await flushEvents()
      expect(rejections).toEqual(["banned"])
      expect(server.closeReason).toEqual({
        type: "login-failed",
        reason: "banned",
      })
    })

    it("should accept a login after an asynchronous authority decides", async () => {
      const { client } = connectPair({
        authority: {
          verify: async () => {
            await flushEvents()
            return { accepted: true }
          },
        },
      })

      client.start({ name: "alice" })
      expect(client.phase).toBe("awaiting-login-result")

      await client.waitForPhase("established")
      expect(client.isEstablished).toBe(true)
    })

    it("should refuse a second start", () => {
      const { client } = connectPair()
      client.start({ name: "alice" })

      expect(() => client.start({ name: "alice" })).toThrow(SessionError)
    })

    it("should throw for an identity that cannot be encoded and stay unstarted", () => {
      const { server, client } = connectPair()

      expect(() => client.start({ name: "alice", permissions: 1.5 })).toThrow(
        InvalidFieldError,
      )
      expect(client.phase).toBe("awaiting-connect-ack")
      expect(server.phase).toBe("awaiting-connect")
    })

    it("should throw for a protocol version that cannot be encoded", () => {
      const [stream] = createInProcessStreamPair()

      expect(
        () =>
          new GameConnection({
            stream,
            role: "client",
            options: { protocolVersion: -1 },
          }),
      ).toThrow(InvalidFieldError)
    })

    it("should refuse start on a server connection", () => {
      const { server } = connectPair()

      expect(() => server.start({ name: "alice" })).toThrow(
        "only a client starts the handshake",
      )
    })

    it("should disconnect a client that does not log in in time", () => {
      const manual = createManualTimer()
      const [serverStream, rawClient] = createInProcessStreamPair()
      const received = recordEnvelopes(rawClient)
      const server = new GameConnection({
        stream: serverStream,
        role: "server",
        options: { handshakeTimeoutMs: 5000, timer: manual.timer },
      })

      expect([...manual.pending.values()].map(p => p.ms)).toEqual([5000])
      manual.fireAll()

      expect(received).toEqual([
        {
          type: "disconnect",
          reason: "protocol-error",
          reasonStr: "handshake timed out",
        },
      ])
      expect(server.phase).toBe("closed")
    })

    it("should clear the handshake timer once established", async () => {
      const manual = createManualTimer()
      const { client } = connectPair({
        serverOptions: { handshakeTimeoutMs: 5000, timer: manual.timer },
      })

      client.start({ name: "alice" })
      await client.waitForPhase("established")

      expect(manual.pending.size).toBe(0)
    })

    it("should reject waitForPhase after its timeout", async () => {
      const manual = createManualTimer()
      const [, clientStream] = createInProcessStreamPair()
      const client = new GameConnection({
        stream: clientStream,
        role: "client",
        options: { timer: manual.timer },
      })
      client.start({ name: "alice" })

      const established = client.waitForPhase("established", { timeoutMs: 50 })
      manual.fireAll()

      await expect(established).rejects.toMatchObject({ code: "timeout" })
    })
  })

  describe("entity synchronization", () => {
    it("should mirror entities and states sent by the server", async () => {
      const { server, client } = await establishedPair()
      const messages: GameMsg[] = []
      client.emitter.on("message", ({ envelope }) => {
        messages.push(envelope)
      })

      server.send({ type: "add-entity", id: 7, name: "goblin" })
      server.send({
        type: "update-state",
        id: 7,
        stateId: "hp",
        value: intValue(30),
      })
      await flushEvents()

      expect(client.entities.get(7)?.name).toBe("goblin")
      expect(client.entities.get(7)?.states.get("hp")).toEqual(intValue(30))
      expect(messages.map(m => m.type)).toEqual(["add-entity", "update-state"])
    })

    it("should stay connected after an update for an unknown entity", async () => {
      const { server, client } = await establishedPair()
      const minorErrors: MinorError[] = []
      client.emitter.on("minor-error", ({ error }) => {
        minorErrors.push(error)
      })

      server.send({
        type: "update-state",
        id: 42,
        stateId: "hp",
        value: intValue(1),
      })
      await flushEvents()

      expect(client.phase).toBe("established")
      expect(server.phase).toBe("established")
      expect(client.minorErrors).toBe(1)
      expect(minorErrors.map(e => e.code)).toEqual(["unknown-entity-update"])

      server.send({ type: "add-entity", id: 42 })
      server.send({
        type: "update-state",
        id: 42,
        stateId: "hp",
        value: intValue(2),
      })
      expect(client.entities.get(42)?.states.get("hp")).toEqual(intValue(2))
    })

    it("should track control assigned by the server", async () => {
      const { server, client } = await establishedPair()

      server.send({ type: "add-entity", id: 3, name: "alice" })
      server.send({ type: "assign-control", uid: 3 })

      expect([...client.controlled]).toEqual([3])
    })

    it("should deliver Move from the client to the server", async () => {
      const { server, client } = await establishedPair()
      const moves: GameMsg[] = []
      server.emitter.on("message", ({ envelope }) => {
        moves.push(envelope)
      })

      client.send({ type: "move", direction: vector3(1, 0, -1) })
      await flushEvents()

      expect(moves).toEqual([{ type: "move", direction: { x: 1, y: 0, z: -1 } }])
    })
  })

  describe("send", () => {
    it("should refuse game traffic before the session is established", () => {
      const { client } = connectPair()

      expect(() =>
        client.send({ type: "move", direction: vector3(1, 0, 0) }),
      ).toThrow("cannot send move in phase awaiting-connect-ack")
    })

    it("should refuse traffic in the wrong direction", async () => {
      const { server, client } = await establishedPair()

      const error = captureError(() =>
        client.send({ type: "assign-control", uid: 1 }),
      )

      expect(error).toBeInstanceOf(SessionError)
      expect(error).toMatchObject({ code: "wrong-direction" })
      expect(() =>
        server.send({ type: "move", direction: vector3(0, 0, 0) }),
      ).toThrow("a server may not send move")
    })

    it("should throw PayloadTooLargeError and send nothing", async () => {
      const { server, client } = await establishedPair()

      expect(() =>
        server.send({ type: "add-entity", id: 1, name: "x".repeat(70_000) }),
      ).toThrow(PayloadTooLargeError)
      expect(client.entities.size).toBe(0)
      expect(server.phase).toBe("established")
    })

    it("should refuse sends after close with the close reason", async () => {
      const { server, client } = await establishedPair()
      client.disconnect()

      expect(() => server.send({ type: "add-entity", id: 1 })).toThrow(
        "disconnected by peer (quit)",
      )
    })
  })

  describe("teardown", () => {
    it("should send Disconnect on disconnect", async () => {
      const { server, client } = await establishedPair()
      const closed: unknown[] = []
      server.emitter.on("closed", ({ reason }) => {
        closed.push(reason)
      })

      client.disconnect("quit", "Client disconnected")
      await flushEvents()

      expect(client.closeReason).toEqual({
        type: "disconnect-sent",
        reason: "quit",
        reasonStr: "Client disconnected",
      })
      expect(closed).toEqual([
        {
          type: "disconnect-received",
          reason: "quit",
          reasonStr: "Client disconnected",
        },
      ])
    })

    it("should kick with KICKED", async () => {
      const { server, client } = await establishedPair()

      server.kick("too slow")

      expect(client.closeReason).toEqual({
        type: "disconnect-received",
        reason: "kicked",
        reasonStr: "too slow",
      })
    })

    it("should disconnect a peer that sends Move before logging in", () => {
      const [serverStream, rawClient] = createInProcessStreamPair()
      const received = recordEnvelopes(rawClient)
      const server = new GameConnection({ stream: serverStream, role: "server" })

      rawClient.send(encodeFrame({ type: "move", direction: vector3(1, 0, 0) }))

      expect(received).toEqual([
        {
          type: "disconnect",
          reason: "protocol-error",
          reasonStr: "unexpected move in phase awaiting-connect",
        },
      ])
      expect(server.phase).toBe("closed")
      expect(rawClient.isOpen).toBe(false)
    })

    it("should disconnect on a malformed frame", () => {
      const [serverStream, rawClient] = createInProcessStreamPair()
      const received = recordEnvelopes(rawClient)
      const server = new GameConnection({ stream: serverStream, role: "server" })

      rawClient.send(new Uint8Array([0x00, 0x02, 0x08, 99]))

      expect(received).toEqual([
        {
          type: "disconnect",
          reason: "protocol-error",
          reasonStr: "Unknown message type: 99",
        },
      ])
      expect(server.closeReason?.type).toBe("disconnect-sent")
    })

    it("should close both ends when the transport goes away", async () => {
      const { server, client } = await establishedPair()
      const stream = new MockByteStream()
      const orphan = new GameConnection({ stream, role: "server" })

      stream.close()

      expect(orphan.closeReason).toEqual({ type: "transport-closed" })
      expect(server.phase).toBe("established")
      expect(client.phase).toBe("established")
    })

    it("should treat a transport error as a lost transport", () => {
      const stream = new MockByteStream()
      const connection = new GameConnection({ stream, role: "server" })

      stream.fail(new Error("socket hang up"))

      expect(connection.closeReason).toEqual({ type: "transport-closed" })
    })

    it("should close a slow consumer", () => {
      const stream = new MockByteStream()
      const connection = new GameConnection({
        stream,
        role: "server",
        options: { maxBufferedBytes: 10 },
      })
      stream.bufferedAmount = 100

      stream.deliver(encodeFrame({ type: "connect", version: 1 }))

      expect(stream.sent).toHaveLength(1)
      expect(stream.isOpen).toBe(false)
      expect(connection.closeReason).toEqual({
        type: "send-overflow",
        bufferedBytes: 100,
      })
    })
  })
})
