import { getLogger, type Logger } from "@logtape/logtape"
import type { GameMsg, Vector3 } from "@arena-wire/wire-format"
import Emittery from "emittery"
import type { ByteStream } from "./byte-stream.js"
import {
  encodeLogin,
  GameConnection,
  type GameConnectionOptions,
} from "./connection.js"
import { SessionError } from "./errors.js"
import type {
  CloseReason,
  EntityRecord,
  LoginIdentity,
  MinorError,
  Phase,
} from "./types.js"

export type GameClientEvents = {
  established: { identity?: LoginIdentity }
  message: { envelope: GameMsg }
  "minor-error": { error: MinorError }
  disconnected: { reason: CloseReason }
}

export type GameClientParams = {
  options?: Partial<GameConnectionOptions>
  logger?: Logger
}

const NO_ENTITIES: ReadonlyMap<number, EntityRecord> = new Map()
const NO_CONTROLLED: ReadonlySet<number> = new Set()

/**
 * The player's end of a connection: logs in, mirrors the server's entities
 * and sends movement intents.
 *
 * @example
 * ```typescript
 * const client = new GameClient()
 * await client.connect(await connectTcp("localhost", 7777), { name: "alice" })
 * for (const uid of client.controlled) {
 *   console.log(client.world.get(uid)?.states.get("Position"))
 * }
 * client.move(vector3(1, 0, 0))
 * ```
 */
export class GameClient {
  readonly logger: Logger
  readonly emitter = new Emittery<GameClientEvents>()

  readonly #options: Partial<GameConnectionOptions>
  readonly #baseLogger: Logger
  #connection: GameConnection | undefined

  constructor({ options = {}, logger }: GameClientParams = {}) {
    this.#options = options
    this.#baseLogger = logger ?? getLogger(["@arena-wire", "session"])
    this.logger = this.#baseLogger.getChild("client")
  }

  get connection(): GameConnection | undefined {
    return this.#connection
  }

  get phase(): Phase | undefined {
    return this.#connection?.phase
  }

  get isConnected(): boolean {
    return this.#connection?.isEstablished ?? false
  }

  /** Entities the server announced, with their latest states */
  get world(): ReadonlyMap<number, EntityRecord> {
    return this.#connection?.entities ?? NO_ENTITIES
  }

  /** Entities the server assigned to this client */
  get controlled(): ReadonlySet<number> {
    return this.#connection?.controlled ?? NO_CONTROLLED
  }

  /**
   * Run the handshake over `stream`. Resolves once logged in.
   *
   * @throws InvalidFieldError when `identity` cannot be encoded, before
   *   anything is sent
   * @throws SessionError `login-rejected` when the server refuses the login,
   *   `connection-closed` when it disconnects, `timeout` when `timeoutMs`
   *   passes first (the connection is then closed)
   */
  async connect(
    stream: ByteStream,
    identity: LoginIdentity,
    { timeoutMs = 0 }: { timeoutMs?: number } = {},
  ): Promise<void> {
    if (this.#connection && !this.#connection.isClosed) {
      throw new SessionError("already-started", "client is already connected")
    }
    encodeLogin(identity)

    const connection = new GameConnection({
      stream,
      role: "client",
      options: this.#options,
      logger: this.#baseLogger,
    })
    this.#connection = connection

    connection.emitter.on("established", ({ identity }) => {
      this.#emit("established", { identity })
    })
    connection.emitter.on("message", ({ envelope }) => {
      this.#emit("message", { envelope })
    })
    connection.emitter.on("minor-error", ({ error }) => {
      this.#emit("minor-error", { error })
    })
    connection.emitter.on("closed", ({ reason }) => {
      this.#emit("disconnected", { reason })
    })

    connection.start(identity)

    try {
      await connection.waitForPhase("established", { timeoutMs })
    } catch (error) {
      if (error instanceof SessionError && error.code === "timeout") {
        connection.disconnect("protocol-error", "handshake timed out")
      }
      throw error
    }
  }

  send(envelope: GameMsg): void {
    this.#requireConnection().send(envelope)
  }

  move(direction: Vector3): void {
    this.send({ type: "move", direction })
  }

  disconnect(reasonStr = "Client disconnected"): void {
    this.#connection?.disconnect("quit", reasonStr)
  }

  #requireConnection(): GameConnection {
    if (!this.#connection) {
      throw new SessionError("not-established", "client is not connected")
    }
    return this.#connection
  }

  #emit<Name extends keyof GameClientEvents>(
    name: Name,
    data: GameClientEvents[Name],
  ): void {
    this.emitter.emit(name, data).catch(error => {
      this.logger.error("{event} listener failed: {error}", {
        event: name,
        error,
      })
    })
  }
}
