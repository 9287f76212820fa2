import { getLogger, type Logger } from "@logtape/logtape"
import {
  type DisconnectReason,
  type Envelope,
  encodeFrame,
  FrameDecoder,
  type GameMsg,
  type LoginFailureReason,
} from "@arena-wire/wire-format"
import Emittery from "emittery"
import type { Patch } from "mutative"
import { acceptAll, type LoginAuthority, verifyLogin } from "./authority.js"
import type { ByteStream } from "./byte-stream.js"
import { describeCloseReason, SessionError } from "./errors.js"
import { canSend } from "./handshake.js"
import {
  type Command,
  createSessionUpdate,
  init as programInit,
  type SessionMessage,
  type SessionModel,
} from "./session-program.js"
import type {
  CloseReason,
  ConnectionId,
  EntityRecord,
  LoginIdentity,
  MinorError,
  Phase,
  Role,
  TimerAPI,
} from "./types.js"
import { WorkQueue } from "./utils/work-queue.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// TYPES
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type GameConnectionEvents = {
  "phase-changed": { from: Phase; to: Phase }
  established: { identity?: LoginIdentity }
  message: { envelope: GameMsg }
  "minor-error": { error: MinorError }
  "login-rejected": { reason: LoginFailureReason }
  closed: { reason: CloseReason }
}

export type GameConnectionOptions = {
  /** Version announced in Connect; a peer announcing another is refused */
  protocolVersion: number
  versionStr: string
  /** Deepest StateValue nesting accepted from the peer */
  maxValueDepth: number
  /** Close the connection once this many bytes wait in the send buffer */
  maxBufferedBytes: number
  /** Close a connection that has not logged in after this long; 0 disables */
  handshakeTimeoutMs: number
  timer: TimerAPI
}

/**
 * Default timer API using global setTimeout/clearTimeout.
 */
const DEFAULT_TIMER_API: TimerAPI = {
  setTimeout: (fn, ms) => setTimeout(fn, ms),
  clearTimeout: id => clearTimeout(id as ReturnType<typeof setTimeout>),
}

export const DEFAULT_CONNECTION_OPTIONS: GameConnectionOptions = {
  protocolVersion: 1,
  versionStr: "0.1.0",
  maxValueDepth: 32,
  maxBufferedBytes: 1024 * 1024,
  handshakeTimeoutMs: 0,
  timer: DEFAULT_TIMER_API,
}

export type GameConnectionParams = {
  stream: ByteStream
  role: Role
  id?: ConnectionId
  /** Server only: decides each Login. Defaults to accepting everyone. */
  authority?: LoginAuthority
  options?: Partial<GameConnectionOptions>
  logger?: Logger
  onUpdate?: (patches: Patch[]) => void
}

type SessionUpdate = (
  msg: SessionMessage,
  model: SessionModel,
) => [SessionModel, Command | undefined]

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// CONNECTION
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * One end of an arena-wire connection.
 *
 * Bytes from the stream are reassembled into envelopes and fed to the session
 * program one at a time, in arrival order. The program's commands are
 * executed here: frames are written to the stream, the LoginAuthority is
 * consulted and events are emitted.
 *
 * @example
 * ```typescript
 * const connection = new GameConnection({ stream, role: "client" })
 * connection.emitter.on("message", ({ envelope }) => render(envelope))
 * connection.start({ name: "alice" })
 * await connection.waitForPhase("established")
 * connection.send({ type: "move", direction: vector3(1, 0, 0) })
 * ```
 */
/**
 * Encode the Login a client would send as `identity`.
 *
 * @throws InvalidFieldError if a field does not fit its wire type
 */
export function encodeLogin(identity: LoginIdentity): Uint8Array {
  return encodeFrame({
    type: "login",
    name: identity.name,
    authtoken: identity.authtoken,
    permissions: identity.permissions,
  })
}

export class GameConnection {
  readonly id: ConnectionId
  readonly role: Role
  readonly logger: Logger
  readonly options: GameConnectionOptions

  readonly emitter = new Emittery<GameConnectionEvents>()

  readonly #stream: ByteStream
  readonly #authority: LoginAuthority
  readonly #decoder: FrameDecoder
  readonly #workQueue: WorkQueue
  readonly #updateFn: SessionUpdate

  #model: SessionModel
  #handshakeTimer: unknown

  constructor({
    stream,
    role,
    id = 0,
    authority = acceptAll,
    options,
    logger: preferredLogger,
    onUpdate,
  }: GameConnectionParams) {
    this.id = id
    this.role = role
    this.options = { ...DEFAULT_CONNECTION_OPTIONS, ...options }
    // Throws InvalidFieldError for a version that cannot go on the wire
    encodeFrame({
      type: "connect",
      version: this.options.protocolVersion,
      versionStr: this.options.versionStr,
    })

    const sessionLogger = (
      preferredLogger ?? getLogger(["@arena-wire", "session"])
    ).with({ connectionId: id, role })
    this.logger = sessionLogger.getChild("connection")

    this.#stream = stream
    this.#authority = authority
    this.#decoder = new FrameDecoder({
      maxValueDepth: this.options.maxValueDepth,
    })
    this.#updateFn = createSessionUpdate({ logger: sessionLogger, onUpdate })

    const [initialModel] = programInit({
      role,
      protocolVersion: this.options.protocolVersion,
      versionStr: this.options.versionStr,
    })
    this.#model = initialModel

    this.#workQueue = new WorkQueue(() => this.#checkSendBuffer())

    stream.onData(chunk => {
      this.#workQueue.enqueue(() => this.#receive(chunk))
    })
    stream.onClose(() => {
      this.#dispatch({ type: "session/transport-closed" })
    })
    stream.onError(error => {
      this.logger.error("transport error: {error}", { error })
      this.#dispatch({ type: "session/transport-closed" })
    })

    if (this.options.handshakeTimeoutMs > 0) {
      this.#handshakeTimer = this.options.timer.setTimeout(() => {
        this.#handshakeTimer = undefined
        this.#dispatch({ type: "session/handshake-timeout" })
      }, this.options.handshakeTimeoutMs)
    }

    this.logger.info("connection opened")
  }

  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
  // PUBLIC API - State
  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

  get model(): SessionModel {
    return this.#model
  }

  get phase(): Phase {
    return this.#model.phase
  }

  get isEstablished(): boolean {
    return this.#model.phase === "established"
  }

  get isClosed(): boolean {
    return this.#model.phase === "closed"
  }

  /** Server: who logged in. Client: who we log in as. */
  get identity(): LoginIdentity | undefined {
    return this.#model.identity
  }

  /** Entities the peer announced, keyed by id */
  get entities(): ReadonlyMap<number, EntityRecord> {
    return this.#model.entities
  }

  /** Entity ids the server put under this client's control */
  get controlled(): ReadonlySet<number> {
    return this.#model.controlled
  }

  get minorErrors(): number {
    return this.#model.minorErrors
  }

  get closeReason(): CloseReason | undefined {
    return this.#model.closeReason
  }

  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
  // PUBLIC API - Actions
  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

  /**
   * Client: open the handshake, logging in as `identity` once the server
   * confirms the protocol version.
   *
   * @throws InvalidFieldError if `identity` cannot be encoded; the handshake
   *   is then not started
   */
  start(identity: LoginIdentity): void {
    if (this.role !== "client") {
      throw new SessionError("wrong-role", "only a client starts the handshake")
    }
    if (this.#model.identity || this.#model.phase !== "awaiting-connect-ack") {
      throw new SessionError("already-started", "handshake already started")
    }
    encodeLogin(identity)
    this.#dispatch({ type: "session/start", identity })
  }

  /**
   * Send game traffic to the peer.
   *
   * The envelope is encoded before this returns, so PayloadTooLargeError and
   * InvalidFieldError reach the caller and nothing is written. Pass `frame`
   * when the envelope was already encoded with `encodeFrame`.
   *
   * @throws SessionError if the session is not established or `envelope` may
   *   not be sent by this side
   */
  send(envelope: GameMsg, { frame }: { frame?: Uint8Array } = {}): void {
    const { phase } = this.#model

    if (phase === "closed") {
      throw this.#closedError()
    }
    if (phase !== "established") {
      throw new SessionError(
        "not-established",
        `cannot send ${envelope.type} in phase ${phase}`,
      )
    }
    if (!canSend(this.role, envelope.type)) {
      throw new SessionError(
        "wrong-direction",
        `a ${this.role} may not send ${envelope.type}`,
      )
    }

    this.#dispatch({
      type: "session/send",
      envelope,
      frame: frame ?? encodeFrame(envelope),
    })
  }

  /**
   * Send Disconnect and close. Does nothing once closed.
   */
  disconnect(reason: DisconnectReason = "quit", reasonStr?: string): void {
    this.#dispatch({ type: "session/disconnect", reason, reasonStr })
  }

  kick(reasonStr?: string): void {
    this.disconnect("kicked", reasonStr)
  }

  /**
   * Resolves once the session reaches `phase`. Rejects if the session closes
   * first or `timeoutMs` passes.
   */
  waitForPhase(
    phase: Phase,
    { timeoutMs = 0 }: { timeoutMs?: number } = {},
  ): Promise<void> {
    if (this.#model.phase === phase) return Promise.resolve()
    if (this.#model.phase === "closed") {
      return Promise.reject(this.#closedError())
    }

    return new Promise((resolve, reject) => {
      let timer: unknown

      const unsubscribe = this.emitter.on("phase-changed", ({ to }) => {
        if (to === phase) {
          cleanup()
          resolve()
        } else if (to === "closed") {
          cleanup()
          reject(this.#closedError())
        }
      })

      const cleanup = () => {
        unsubscribe()
        if (timer !== undefined) this.options.timer.clearTimeout(timer)
      }

      if (timeoutMs > 0) {
        timer = this.options.timer.setTimeout(() => {
          timer = undefined
          cleanup()
          reject(
            new SessionError(
              "timeout",
              `phase ${phase} not reached within ${timeoutMs}ms`,
            ),
          )
        }, timeoutMs)
      }
    })
  }

  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
  // INTERNAL
  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

  /**
   * Every message goes through the work queue, including those raised while
   * it is running: a peer that answers synchronously (the in-process stream
   * pair does) must not have its reply handled before the message that
   * caused it.
   */
  #dispatch(message: SessionMessage): void {
    this.#workQueue.enqueue(() => this.#dispatchInternal(message))
  }

  #dispatchInternal(message: SessionMessage): void {
    const [newModel, command] = this.#updateFn(message, this.#model)
    this.#model = newModel

    if (command) {
      this.#executeCommand(command)
    }
  }

  #receive(chunk: Uint8Array): void {
    const result = this.#decoder.push(chunk)

    for (const envelope of result.envelopes) {
      this.#traceEnvelope("in", envelope)
      this.#dispatchInternal({ type: "session/receive", envelope })
    }

    if (result.status === "error") {
      this.#dispatchInternal({
        type: "session/malformed-frame",
        error: result.error,
      })
    }
  }

  #executeCommand(command: Command): void {
    switch (command.type) {
      case "cmd/send":
        this.#write(command.envelope, command.frame)
        break

      case "cmd/close-transport":
        this.#clearHandshakeTimer()
        if (this.#stream.isOpen) this.#stream.close()
        break

      case "cmd/verify-login":
        verifyLogin(this.#authority, command.identity, error => {
          this.logger.error("login authority failed: {error}", { error })
        })
          .then(verdict => {
            this.#dispatch({ type: "session/login-verdict", verdict })
          })
          .catch(error => {
            this.logger.error("could not apply login verdict: {error}", {
              error,
            })
          })
        break

      case "cmd/emit-phase-changed":
        this.logger.debug("phase {from} -> {to}", {
          from: command.from,
          to: command.to,
        })
        if (command.to === "established" || command.to === "closed") {
          this.#clearHandshakeTimer()
        }
        this.#emit("phase-changed", { from: command.from, to: command.to })
        break

      case "cmd/emit-established":
        this.logger.info("session established as {name}", {
          name: command.identity?.name,
        })
        this.#emit("established", { identity: command.identity })
        break

      case "cmd/emit-message":
        this.#emit("message", { envelope: command.envelope })
        break

      case "cmd/emit-minor-error":
        this.#emit("minor-error", { error: command.error })
        break

      case "cmd/emit-login-rejected":
        this.#emit("login-rejected", { reason: command.reason })
        break

      case "cmd/emit-closed":
        this.logger.info("connection closed: {description}", {
          description: describeCloseReason(command.reason),
        })
        this.#emit("closed", { reason: command.reason })
        break

      case "cmd/batch":
        for (const cmd of command.commands) {
          this.#executeCommand(cmd)
        }
        break
    }
  }

  #write(envelope: Envelope, preEncoded?: Uint8Array): void {
    if (!this.#stream.isOpen) {
      this.logger.debug("not sending {type}: transport closed", {
        type: envelope.type,
      })
      return
    }

    let frame = preEncoded
    if (!frame) {
      try {
        frame = encodeFrame(envelope)
      } catch (error) {
        // The session already counts this envelope as sent, so it cannot go on
        this.logger.error("could not encode {type}, closing: {error}", {
          type: envelope.type,
          error,
        })
        this.#stream.close()
        return
      }
    }

    this.#traceEnvelope("out", envelope)
    this.#stream.send(frame)
  }

  #checkSendBuffer(): void {
    const bufferedBytes = this.#stream.bufferedAmount
    if (
      bufferedBytes > this.options.maxBufferedBytes &&
      this.#model.phase !== "closed"
    ) {
      this.#dispatch({ type: "session/send-overflow", bufferedBytes })
    }
  }

  #traceEnvelope(dir: "in" | "out", envelope: Envelope): void {
    this.logger.trace("{dir} {type}", { dir, type: envelope.type })
  }

  #clearHandshakeTimer(): void {
    if (this.#handshakeTimer === undefined) return
    this.options.timer.clearTimeout(this.#handshakeTimer)
    this.#handshakeTimer = undefined
  }

  #closedError(): SessionError {
    const reason = this.#model.closeReason
    const description = reason
      ? describeCloseReason(reason)
      : "connection closed"

    return new SessionError(
      reason?.type === "login-failed" ? "login-rejected" : "connection-closed",
      description,
      reason,
    )
  }

  #emit<Name extends keyof GameConnectionEvents>(
    name: Name,
    data: GameConnectionEvents[Name],
  ): void {
    this.emitter.emit(name, data).catch(error => {
      this.logger.error("{event} listener failed: {error}", {
        event: name,
        error,
      })
    })
  }
}
