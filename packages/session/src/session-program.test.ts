import {
  intValue,
  MalformedPayloadError,
  stringValue,
  vector3,
} from "@arena-wire/wire-format"
import { beforeEach, describe, expect, it, vi } from "vitest"
import { rejected } from "./authority.js"
import {
  createSessionUpdate,
  type SessionMessage,
  type SessionModel,
} from "./session-program.js"
import {
  commandTypes,
  createModel,
  expectCommand,
  flattenCommands,
  sentEnvelopes,
} from "./session/test-utils.js"

const CLOSE_COMMANDS = [
  "cmd/emit-phase-changed",
  "cmd/close-transport",
  "cmd/emit-closed",
]

describe("session program", () => {
  let update: ReturnType<typeof createSessionUpdate>

  beforeEach(() => {
    update = createSessionUpdate()
  })

  function receive(model: SessionModel, msg: SessionMessage) {
    return update(msg, model)
  }

  describe("server handshake", () => {
    it("should answer a matching Connect and wait for Login", () => {
      const model = createModel("server")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "connect", version: 1, versionStr: "0.1.0" },
      })

      expect(sentEnvelopes(command)).toEqual([
        { type: "connect", version: 1, versionStr: "0.1.0" },
      ])
      expect(commandTypes(command)).toEqual([
        "cmd/send",
        "cmd/emit-phase-changed",
      ])
      expect(next.phase).toBe("awaiting-login")
      expect(next.peerVersion).toEqual({ version: 1, versionStr: "0.1.0" })
    })

    it("should refuse a Connect with another protocol version", () => {
      const model = createModel("server")
      const reasonStr = "protocol version 2 is not supported, expected 1"

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "connect", version: 2 },
      })

      expect(sentEnvelopes(command)).toEqual([
        { type: "disconnect", reason: "wrong-protocol-version", reasonStr },
      ])
      expect(commandTypes(command)).toEqual(["cmd/send", ...CLOSE_COMMANDS])
      expect(next.phase).toBe("closed")
      expect(next.closeReason).toEqual({
        type: "disconnect-sent",
        reason: "wrong-protocol-version",
        reasonStr,
      })
    })

    it("should ask the authority about a Login", () => {
      const model = createModel("server", "awaiting-login")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "login", name: "alice", authtoken: "test-secret" },
      })

      expect(next.phase).toBe("awaiting-login-result")
      expect(next.identity).toEqual({ name: "alice", authtoken: "test-secret" })
      expect(commandTypes(command)).toEqual([
        "cmd/emit-phase-changed",
        "cmd/verify-login",
      ])
      const verify = flattenCommands(command)[1]
      expectCommand(verify, "cmd/verify-login")
      expect(verify.identity).toEqual({ name: "alice", authtoken: "test-secret" })
    })

    it("should establish the session when the login is accepted", () => {
      const model = createModel("server", "awaiting-login-result", {
        identity: { name: "alice" },
      })

      const [next, command] = update(
        { type: "session/login-verdict", verdict: { accepted: true } },
        model,
      )

      expect(sentEnvelopes(command)).toEqual([
        { type: "login-result", succeeded: true },
      ])
      expect(commandTypes(command)).toEqual([
        "cmd/send",
        "cmd/emit-phase-changed",
        "cmd/emit-established",
      ])
      const established = flattenCommands(command)[2]
      expectCommand(established, "cmd/emit-established")
      expect(established.identity).toEqual({ name: "alice" })
      expect(next.phase).toBe("established")
    })

    it("should send LoginResult then Disconnect when the login is rejected", () => {
      const model = createModel("server", "awaiting-login-result", {
        identity: { name: "mallory" },
      })

      const [next, command] = update(
        { type: "session/login-verdict", verdict: rejected("server-full") },
        model,
      )

      expect(sentEnvelopes(command)).toEqual([
        { type: "login-result", succeeded: false, reason: "server-full" },
        {
          type: "disconnect",
          reason: "kicked",
          reasonStr: "login failed: server-full",
        },
      ])
      expect(commandTypes(command)).toEqual([
        "cmd/send",
        "cmd/send",
        "cmd/emit-login-rejected",
        ...CLOSE_COMMANDS,
      ])
      expect(next.closeReason).toEqual({
        type: "login-failed",
        reason: "server-full",
      })
    })

    it("should ignore a verdict that arrives after the session closed", () => {
      const model = createModel("server", "closed")

      const [next, command] = update(
        { type: "session/login-verdict", verdict: { accepted: true } },
        model,
      )

      expect(command).toBeUndefined()
      expect(next).toBe(model)
    })

    it("should treat Login before Connect as a protocol error", () => {
      const model = createModel("server")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "login", name: "alice" },
      })

      expect(sentEnvelopes(command)).toEqual([
        {
          type: "disconnect",
          reason: "protocol-error",
          reasonStr: "unexpected login in phase awaiting-connect",
        },
      ])
      expect(next.phase).toBe("closed")
    })

    it("should treat Move before the session is established as a protocol error", () => {
      const model = createModel("server", "awaiting-login")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "move", direction: vector3(1, 0, 0) },
      })

      expect(sentEnvelopes(command)).toEqual([
        {
          type: "disconnect",
          reason: "protocol-error",
          reasonStr: "unexpected move in phase awaiting-login",
        },
      ])
      expect(next.phase).toBe("closed")
    })

    it("should refuse AssignControl sent by a client", () => {
      const model = createModel("server", "established")

      const [next] = receive(model, {
        type: "session/receive",
        envelope: { type: "assign-control", uid: 3 },
      })

      expect(next.closeReason).toEqual({
        type: "disconnect-sent",
        reason: "protocol-error",
        reasonStr: "unexpected assign-control in phase established",
      })
    })

    it("should hand Move to the application once established", () => {
      const model = createModel("server", "established")
      const envelope = { type: "move", direction: vector3(0, 0, 1) } as const

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope,
      })

      expectCommand(command, "cmd/emit-message")
      expect(command.envelope).toEqual(envelope)
      expect(next).toBe(model)
    })
  })

  describe("client handshake", () => {
    it("should send Connect on start", () => {
      const model = createModel("client")

      const [next, command] = update(
        { type: "session/start", identity: { name: "alice" } },
        model,
      )

      expect(sentEnvelopes(command)).toEqual([
        { type: "connect", version: 1, versionStr: "0.1.0" },
      ])
      expect(next.identity).toEqual({ name: "alice" })
      expect(next.phase).toBe("awaiting-connect-ack")
    })

    it("should ignore a second start", () => {
      const model = createModel("client", undefined, {
        identity: { name: "alice" },
      })

      const [next, command] = update(
        { type: "session/start", identity: { name: "bob" } },
        model,
      )

      expect(command).toBeUndefined()
      expect(next.identity).toEqual({ name: "alice" })
    })

    it("should ignore start on a server session", () => {
      const model = createModel("server")

      const [, command] = update(
        { type: "session/start", identity: { name: "alice" } },
        model,
      )

      expect(command).toBeUndefined()
    })

    it("should log in after the server's Connect", () => {
      const model = createModel("client", undefined, {
        identity: { name: "alice", authtoken: "test-secret", permissions: 3 },
      })

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "connect", version: 1 },
      })

      expect(sentEnvelopes(command)).toEqual([
        {
          type: "login",
          name: "alice",
          authtoken: "test-secret",
          permissions: 3,
        },
      ])
      expect(next.phase).toBe("awaiting-login-result")
    })

    it("should disconnect when the server answers with another version", () => {
      const model = createModel("client", undefined, {
        identity: { name: "alice" },
      })

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "connect", version: 3 },
      })

      expect(sentEnvelopes(command)).toEqual([
        {
          type: "disconnect",
          reason: "wrong-protocol-version",
          reasonStr: "protocol version 3 is not supported, expected 1",
        },
      ])
      expect(next.phase).toBe("closed")
    })

    it("should refuse a Connect that arrives before start", () => {
      const model = createModel("client")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "connect", version: 1 },
      })

      expect(sentEnvelopes(command)).toEqual([
        {
          type: "disconnect",
          reason: "protocol-error",
          reasonStr: "connect received before the handshake started",
        },
      ])
      expect(next.phase).toBe("closed")
    })

    it("should be established by a successful LoginResult", () => {
      const model = createModel("client", "awaiting-login-result", {
        identity: { name: "alice" },
      })

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "login-result", succeeded: true },
      })

      expect(commandTypes(command)).toEqual([
        "cmd/emit-phase-changed",
        "cmd/emit-established",
      ])
      expect(next.phase).toBe("established")
    })

    it("should close on a failed LoginResult", () => {
      const model = createModel("client", "awaiting-login-result", {
        identity: { name: "alice" },
      })

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "login-result", succeeded: false, reason: "banned" },
      })

      expect(sentEnvelopes(command)).toEqual([])
      expect(commandTypes(command)).toEqual([
        "cmd/emit-login-rejected",
        ...CLOSE_COMMANDS,
      ])
      expect(next.closeReason).toEqual({ type: "login-failed", reason: "banned" })
    })

    it("should read a failed LoginResult without reason as access-denied", () => {
      const model = createModel("client", "awaiting-login-result")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "login-result", succeeded: false },
      })

      const rejectedCommand = flattenCommands(command)[0]
      expectCommand(rejectedCommand, "cmd/emit-login-rejected")
      expect(rejectedCommand.reason).toBe("access-denied")
      expect(next.closeReason).toEqual({
        type: "login-failed",
        reason: "access-denied",
      })
    })
  })

  describe("entity synchronization", () => {
    it("should register an announced entity", () => {
      const model = createModel("client", "established")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "add-entity", id: 7, name: "goblin" },
      })

      expect(next.entities.get(7)).toEqual({
        id: 7,
        name: "goblin",
        states: new Map(),
      })
      expectCommand(command, "cmd/emit-message")
      expect(command.envelope).toEqual({
        type: "add-entity",
        id: 7,
        name: "goblin",
      })
    })

    it("should store the latest value of each state", () => {
      const [withGoblin] = receive(createModel("client", "established"), {
        type: "session/receive",
        envelope: { type: "add-entity", id: 7, name: "goblin" },
      })

      const [next, command] = receive(withGoblin, {
        type: "session/receive",
        envelope: {
          type: "update-state",
          id: 7,
          stateId: "hp",
          value: intValue(30),
        },
      })

      expect(next.entities.get(7)?.states.get("hp")).toEqual(intValue(30))
      expectCommand(command, "cmd/emit-message")
      expect(withGoblin.entities.get(7)?.states.size).toBe(0)
    })

    it("should keep states and refresh the name when an entity is announced again", () => {
      const model = createModel("client", "established", {
        entities: new Map([
          [7, { id: 7, name: "goblin", states: new Map([["hp", intValue(5)]]) }],
        ]),
      })

      const [next] = receive(model, {
        type: "session/receive",
        envelope: { type: "add-entity", id: 7, name: "goblin chief" },
      })

      expect(next.entities.get(7)?.name).toBe("goblin chief")
      expect(next.entities.get(7)?.states.get("hp")).toEqual(intValue(5))
      expect(next.minorErrors).toBe(0)
    })

    it("should tolerate UpdateState for an unknown entity", () => {
      const model = createModel("client", "established")
      const envelope = {
        type: "update-state",
        id: 42,
        stateId: "hp",
        value: intValue(1),
      } as const

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope,
      })

      expect(next.phase).toBe("established")
      expect(next.minorErrors).toBe(1)
      expect(next.entities.has(42)).toBe(false)
      expectCommand(command, "cmd/emit-minor-error")
      expect(command.error).toEqual({
        code: "unknown-entity-update",
        message: "UpdateState 'hp' for unknown entity 42",
        envelope,
      })
    })

    it("should tolerate RemoveEntity for an unknown entity", () => {
      const model = createModel("server", "established")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "remove-entity", id: 9 },
      })

      expect(next.phase).toBe("established")
      expectCommand(command, "cmd/emit-minor-error")
      expect(command.error.code).toBe("unknown-entity-remove")
      expect(command.error.message).toBe("RemoveEntity for unknown entity 9")
    })

    it("should forget a removed entity and any control of it", () => {
      const model = createModel("client", "established", {
        entities: new Map([[3, { id: 3, name: "alice", states: new Map() }]]),
        controlled: new Set([3]),
      })

      const [next] = receive(model, {
        type: "session/receive",
        envelope: { type: "remove-entity", id: 3 },
      })

      expect(next.entities.has(3)).toBe(false)
      expect(next.controlled.has(3)).toBe(false)
    })

    it("should track assigned and revoked control", () => {
      const model = createModel("client", "established")

      const [assigned] = receive(model, {
        type: "session/receive",
        envelope: { type: "assign-control", uid: 3 },
      })
      const [revoked] = receive(assigned, {
        type: "session/receive",
        envelope: { type: "assign-control", uid: 3, revoked: true },
      })

      expect([...assigned.controlled]).toEqual([3])
      expect([...revoked.controlled]).toEqual([])
    })

    it("should pass combat notices through untouched", () => {
      const model = createModel("client", "established")
      const envelope = {
        type: "combat-hit",
        attackerUid: 1,
        victimUid: 7,
        damage: 4,
      } as const

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope,
      })

      expectCommand(command, "cmd/emit-message")
      expect(command.envelope).toEqual(envelope)
      expect(next).toBe(model)
    })
  })

  describe("outbound traffic", () => {
    it("should remember announced entities", () => {
      const model = createModel("server", "established")

      const [announced, command] = update(
        {
          type: "session/send",
          envelope: { type: "add-entity", id: 5, name: "goblin" },
        },
        model,
      )
      const [removed] = update(
        { type: "session/send", envelope: { type: "remove-entity", id: 5 } },
        announced,
      )

      expectCommand(command, "cmd/send")
      expect(command.envelope).toEqual({
        type: "add-entity",
        id: 5,
        name: "goblin",
      })
      expect(announced.announced.has(5)).toBe(true)
      expect(removed.announced.has(5)).toBe(false)
    })

    it("should pass the pre-encoded frame through", () => {
      const model = createModel("server", "established", {
        announced: new Set([5]),
      })
      const frame = new Uint8Array([0, 1, 2])

      const [, command] = update(
        {
          type: "session/send",
          envelope: {
            type: "update-state",
            id: 5,
            stateId: "name",
            value: stringValue("Grok"),
          },
          frame,
        },
        model,
      )

      expectCommand(command, "cmd/send")
      expect(command.frame).toBe(frame)
    })

    it("should drop a send queued behind the close", () => {
      const model = createModel("server", "closed")

      const [, command] = update(
        { type: "session/send", envelope: { type: "add-entity", id: 5 } },
        model,
      )

      expect(command).toBeUndefined()
    })
  })

  describe("teardown", () => {
    it("should close when the peer disconnects", () => {
      const model = createModel("client", "established")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "disconnect", reason: "kicked", reasonStr: "bye" },
      })

      expect(sentEnvelopes(command)).toEqual([])
      expect(commandTypes(command)).toEqual(CLOSE_COMMANDS)
      expect(next.closeReason).toEqual({
        type: "disconnect-received",
        reason: "kicked",
        reasonStr: "bye",
      })
    })

    it("should accept Disconnect during the handshake", () => {
      const model = createModel("server", "awaiting-login")

      const [next] = receive(model, {
        type: "session/receive",
        envelope: { type: "disconnect", reason: "quit" },
      })

      expect(next.phase).toBe("closed")
    })

    it("should drop envelopes received after the session closed", () => {
      const model = createModel("server", "closed")

      const [next, command] = receive(model, {
        type: "session/receive",
        envelope: { type: "move", direction: vector3(1, 0, 0) },
      })

      expect(command).toBeUndefined()
      expect(next).toBe(model)
    })

    it("should disconnect with PROTOCOL_ERROR on a malformed frame", () => {
      const model = createModel("server", "established")
      const error = new MalformedPayloadError(
        "unknown_type",
        "Unknown message type: 99",
      )

      const [next, command] = update(
        { type: "session/malformed-frame", error },
        model,
      )

      expect(sentEnvelopes(command)).toEqual([
        {
          type: "disconnect",
          reason: "protocol-error",
          reasonStr: "Unknown message type: 99",
        },
      ])
      expect(next.phase).toBe("closed")
    })

    it("should send Disconnect on a local disconnect", () => {
      const model = createModel("client", "established")

      const [next, command] = update(
        {
          type: "session/disconnect",
          reason: "quit",
          reasonStr: "Client disconnected",
        },
        model,
      )

      expect(sentEnvelopes(command)).toEqual([
        { type: "disconnect", reason: "quit", reasonStr: "Client disconnected" },
      ])
      expect(next.closeReason).toEqual({
        type: "disconnect-sent",
        reason: "quit",
        reasonStr: "Client disconnected",
      })
    })

    it("should do nothing on a local disconnect after close", () => {
      const model = createModel("client", "closed")

      const [, command] = update(
        { type: "session/disconnect", reason: "quit" },
        model,
      )

      expect(command).toBeUndefined()
    })

    it("should close when the transport goes away", () => {
      const model = createModel("server", "awaiting-login")

      const [next, command] = update({ type: "session/transport-closed" }, model)

      expect(sentEnvelopes(command)).toEqual([])
      expect(commandTypes(command)).toEqual(CLOSE_COMMANDS)
      expect(next.closeReason).toEqual({ type: "transport-closed" })
    })

    it("should close a slow consumer without a Disconnect", () => {
      const model = createModel("server", "established")

      const [next, command] = update(
        { type: "session/send-overflow", bufferedBytes: 2_000_000 },
        model,
      )

      expect(sentEnvelopes(command)).toEqual([])
      expect(next.closeReason).toEqual({
        type: "send-overflow",
        bufferedBytes: 2_000_000,
      })
    })

    it("should disconnect a handshake that takes too long", () => {
      const model = createModel("server", "awaiting-login")

      const [next, command] = update(
        { type: "session/handshake-timeout" },
        model,
      )

      expect(sentEnvelopes(command)).toEqual([
        {
          type: "disconnect",
          reason: "protocol-error",
          reasonStr: "handshake timed out",
        },
      ])
      expect(next.phase).toBe("closed")
    })

    it("should ignore the handshake timeout once established", () => {
      const model = createModel("server", "established")

      const [, command] = update({ type: "session/handshake-timeout" }, model)

      expect(command).toBeUndefined()
    })
  })

  it("should report patches for model changes", () => {
    const onUpdate = vi.fn()
    const withPatches = createSessionUpdate({ onUpdate })

    withPatches(
      { type: "session/transport-closed" },
      createModel("server", "established"),
    )

    expect(onUpdate).toHaveBeenCalledTimes(1)
    expect(onUpdate.mock.calls[0]?.[0].length).toBeGreaterThan(0)
  })
})
