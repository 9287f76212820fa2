import { getLogger, type Logger } from "@logtape/logtape"
import { encodeFrame, type GameMsg } from "@arena-wire/wire-format"
import Emittery from "emittery"
import { acceptAll, type LoginAuthority, withCapacity } from "./authority.js"
import type { ByteStream } from "./byte-stream.js"
import {
  DEFAULT_CONNECTION_OPTIONS,
  GameConnection,
  type GameConnectionOptions,
} from "./connection.js"
import { SessionError } from "./errors.js"
import { canSend } from "./handshake.js"
import type {
  CloseReason,
  ConnectionId,
  LoginIdentity,
  MinorError,
} from "./types.js"

export type GameServerEvents = {
  connection: { connectionId: ConnectionId; connection: GameConnection }
  established: {
    connectionId: ConnectionId
    connection: GameConnection
    identity?: LoginIdentity
  }
  message: {
    connectionId: ConnectionId
    connection: GameConnection
    envelope: GameMsg
  }
  "minor-error": { connectionId: ConnectionId; error: MinorError }
  disconnected: {
    connectionId: ConnectionId
    connection: GameConnection
    reason: CloseReason
  }
}

export type GameServerOptions = GameConnectionOptions & {
  /** Logins beyond this many established clients get SERVER_FULL; 0 = no limit */
  maxClients: number
}

export const DEFAULT_SERVER_OPTIONS: GameServerOptions = {
  ...DEFAULT_CONNECTION_OPTIONS,
  maxClients: 0,
}

export type GameServerParams = {
  authority?: LoginAuthority
  options?: Partial<GameServerOptions>
  logger?: Logger
}

/**
 * Runs one GameConnection per accepted byte stream.
 *
 * Transports hand streams to `accept`; the server numbers them, applies its
 * LoginAuthority and capacity limit, and re-emits each connection's events
 * tagged with its id.
 *
 * @example
 * ```typescript
 * const server = new GameServer({ options: { maxClients: 16 } })
 * server.emitter.on("established", ({ connection }) => {
 *   connection.send({ type: "add-entity", id: 1, name: "goblin" })
 * })
 * listenTcp(netServer, server)
 * ```
 */
export class GameServer {
  readonly logger: Logger
  readonly options: GameServerOptions
  readonly emitter = new Emittery<GameServerEvents>()

  readonly #baseLogger: Logger
  readonly #authority: LoginAuthority
  readonly #connections = new Map<ConnectionId, GameConnection>()
  /** Connections holding a login slot: verifying or established */
  readonly #admitted = new Set<ConnectionId>()
  #nextConnectionId: ConnectionId = 1

  constructor({ authority = acceptAll, options, logger }: GameServerParams = {}) {
    this.options = { ...DEFAULT_SERVER_OPTIONS, ...options }
    this.#baseLogger = logger ?? getLogger(["@arena-wire", "session"])
    this.logger = this.#baseLogger.getChild("server")

    this.#authority = authority
  }

  get connections(): ReadonlyMap<ConnectionId, GameConnection> {
    return this.#connections
  }

  get establishedCount(): number {
    let count = 0
    for (const connection of this.#connections.values()) {
      if (connection.isEstablished) count++
    }
    return count
  }

  getConnection(connectionId: ConnectionId): GameConnection | undefined {
    return this.#connections.get(connectionId)
  }

  /**
   * Start serving a newly opened byte stream.
   */
  accept(stream: ByteStream): GameConnection {
    const connectionId = this.#nextConnectionId++
    const { maxClients: _maxClients, ...connectionOptions } = this.options

    const connection = new GameConnection({
      stream,
      role: "server",
      id: connectionId,
      authority: this.#authorityFor(connectionId),
      options: connectionOptions,
      logger: this.#baseLogger,
    })
    this.#connections.set(connectionId, connection)

    connection.emitter.on("established", ({ identity }) => {
      this.#emit("established", { connectionId, connection, identity })
    })
    connection.emitter.on("message", ({ envelope }) => {
      this.#emit("message", { connectionId, connection, envelope })
    })
    connection.emitter.on("minor-error", ({ error }) => {
      this.#emit("minor-error", { connectionId, error })
    })
    connection.emitter.on("closed", ({ reason }) => {
      this.#connections.delete(connectionId)
      this.#admitted.delete(connectionId)
      this.#emit("disconnected", { connectionId, connection, reason })
    })

    this.logger.debug("accepted connection {connectionId}", {
      connectionId,
      totalConnections: this.#connections.size,
    })
    this.#emit("connection", { connectionId, connection })

    return connection
  }

  /**
   * Send `envelope` to every established connection, except `except`.
   *
   * The envelope is encoded once. A connection whose transport fails is
   * logged and skipped; the others still get the envelope.
   *
   * @throws SessionError `wrong-direction` for an envelope only clients send
   * @returns how many connections it was sent to
   */
  broadcast(
    envelope: GameMsg,
    { except }: { except?: ConnectionId } = {},
  ): number {
    if (!canSend("server", envelope.type)) {
      throw new SessionError(
        "wrong-direction",
        `a server may not send ${envelope.type}`,
      )
    }
    const frame = encodeFrame(envelope)

    let sent = 0
    for (const connection of this.#connections.values()) {
      if (connection.id === except || !connection.isEstablished) continue
      try {
        connection.send(envelope, { frame })
        sent++
      } catch (error) {
        this.logger.warn(
          "broadcast of {type} to connection {connectionId} failed: {error}",
          { type: envelope.type, connectionId: connection.id, error },
        )
      }
    }
    return sent
  }

  /**
   * Disconnect a client with KICKED.
   *
   * @returns false if there is no such connection
   */
  kick(connectionId: ConnectionId, reasonStr?: string): boolean {
    const connection = this.#connections.get(connectionId)
    if (!connection) return false
    connection.kick(reasonStr)
    return true
  }

  /**
   * Disconnect every client.
   */
  close(reasonStr = "server shutting down"): void {
    for (const connection of [...this.#connections.values()]) {
      connection.disconnect("quit", reasonStr)
    }
    this.logger.info("server closed")
  }

  #authorityFor(connectionId: ConnectionId): LoginAuthority {
    const { maxClients } = this.options
    if (maxClients <= 0) return this.#authority

    return withCapacity(this.#authority, {
      acquire: () => {
        if (this.#admitted.size >= maxClients) return false
        this.#admitted.add(connectionId)
        return true
      },
      release: () => {
        this.#admitted.delete(connectionId)
      },
    })
  }

  #emit<Name extends keyof GameServerEvents>(
    name: Name,
    data: GameServerEvents[Name],
  ): void {
    this.emitter.emit(name, data).catch(error => {
      this.logger.error("{event} listener failed: {error}", {
        event: name,
        error,
      })
    })
  }
}
