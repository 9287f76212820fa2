import type { ConnectionId, GameConnection, GameServer } from "@arena-wire/session"
import {
  type GameMsg,
  intValue,
  stringValue,
  type Vector3,
  vector3,
  vector3Value,
} from "@arena-wire/wire-format"
import { getLogger } from "@logtape/logtape"

const logger = getLogger(["goblin-camp", "world"])

export type ActorKind = "player" | "goblin"

export type Actor = {
  uid: number
  name: string
  kind: ActorKind
  position: Vector3
  health: number
  maxHealth: number
  asset: string
  kills: number
  connectionId?: ConnectionId
}

export type GoblinSpawn = {
  name: string
  position: Vector3
  health: number
}

export type GameWorldOptions = {
  goblins: GoblinSpawn[]
  playerSpawn: Vector3
  playerHealth: number
  attackDamage: number
}

export const DEFAULT_WORLD_OPTIONS: GameWorldOptions = {
  goblins: [
    { name: "goblin", position: vector3(3, 0, 0), health: 20 },
    { name: "goblin archer", position: vector3(0, 4, 0), health: 10 },
    { name: "goblin chief", position: vector3(-5, -5, 0), health: 40 },
  ],
  playerSpawn: vector3(0, 0, 0),
  playerHealth: 100,
  attackDamage: 10,
}

function addVectors(a: Vector3, b: Vector3): Vector3 {
  return vector3(a.x + b.x, a.y + b.y, a.z + b.z)
}

function sameTile(a: Vector3, b: Vector3): boolean {
  return (
    Math.round(a.x) === Math.round(b.x) &&
    Math.round(a.y) === Math.round(b.y) &&
    Math.round(a.z) === Math.round(b.z)
  )
}

/**
 * The envelopes that introduce `actor` to a client.
 */
export function describeActor(actor: Actor): GameMsg[] {
  const messages: GameMsg[] = [
    { type: "add-entity", id: actor.uid, name: actor.name },
    {
      type: "update-state",
      id: actor.uid,
      stateId: "Position",
      value: vector3Value(actor.position),
    },
    {
      type: "update-state",
      id: actor.uid,
      stateId: "Health",
      value: intValue(actor.health),
    },
    {
      type: "update-state",
      id: actor.uid,
      stateId: "MaxHealth",
      value: intValue(actor.maxHealth),
    },
    {
      type: "update-state",
      id: actor.uid,
      stateId: "Asset",
      value: stringValue(actor.asset),
    },
  ]
  if (actor.kind === "player") {
    messages.push({
      type: "update-state",
      id: actor.uid,
      stateId: "KillCount",
      value: intValue(actor.kills),
    })
  }
  return messages
}

/**
 * A server-authoritative camp of goblins. Every login gets a player entity
 * it controls; walking into a goblin attacks it.
 */
export class GameWorld {
  readonly #server: GameServer
  readonly #options: GameWorldOptions
  readonly #actors = new Map<number, Actor>()
  #nextUid = 1

  constructor(server: GameServer, options: Partial<GameWorldOptions> = {}) {
    this.#server = server
    this.#options = { ...DEFAULT_WORLD_OPTIONS, ...options }

    for (const goblin of this.#options.goblins) {
      this.#spawn({
        name: goblin.name,
        kind: "goblin",
        position: goblin.position,
        health: goblin.health,
        maxHealth: goblin.health,
        asset: "goblin",
        kills: 0,
      })
    }
  }

  get actors(): ReadonlyMap<number, Actor> {
    return this.#actors
  }

  playerFor(connectionId: ConnectionId): Actor | undefined {
    for (const actor of this.#actors.values()) {
      if (actor.connectionId === connectionId) return actor
    }
    return undefined
  }

  /**
   * Start reacting to the server's events.
   *
   * @returns a function that stops it
   */
  attach(): () => void {
    const unsubscribers = [
      this.#server.emitter.on("established", ({ connection, identity }) => {
        this.join(connection, identity?.name ?? `player ${connection.id}`)
      }),
      this.#server.emitter.on("message", ({ connectionId, envelope }) => {
        this.handleMessage(connectionId, envelope)
      }),
      this.#server.emitter.on("disconnected", ({ connectionId }) => {
        this.leave(connectionId)
      }),
    ]
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe()
    }
  }

  join(connection: GameConnection, name: string): Actor {
    for (const actor of this.#actors.values()) {
      for (const message of describeActor(actor)) connection.send(message)
    }

    const player = this.#spawn({
      name,
      kind: "player",
      position: this.#options.playerSpawn,
      health: this.#options.playerHealth,
      maxHealth: this.#options.playerHealth,
      asset: "adventurer",
      kills: 0,
      connectionId: connection.id,
    })
    for (const message of describeActor(player)) this.#broadcast(message)
    connection.send({ type: "assign-control", uid: player.uid })

    logger.info("{name} joined as entity {uid}", { name, uid: player.uid })
    return player
  }

  leave(connectionId: ConnectionId): void {
    const player = this.playerFor(connectionId)
    if (!player) return
    this.#actors.delete(player.uid)
    this.#broadcast({ type: "remove-entity", id: player.uid, name: player.name })
    logger.info("{name} left", { name: player.name })
  }

  handleMessage(connectionId: ConnectionId, envelope: GameMsg): void {
    if (envelope.type !== "move") {
      logger.debug("ignoring {type} from connection {connectionId}", {
        type: envelope.type,
        connectionId,
      })
      return
    }

    const player = this.playerFor(connectionId)
    if (!player) return

    const target = addVectors(player.position, envelope.direction)
    const victim = this.#goblinAt(target)
    if (victim) {
      this.#attack(player, victim)
      return
    }

    player.position = target
    this.#broadcast({
      type: "update-state",
      id: player.uid,
      stateId: "Position",
      value: vector3Value(target),
    })
  }

  #goblinAt(position: Vector3): Actor | undefined {
    for (const actor of this.#actors.values()) {
      if (actor.kind === "goblin" && sameTile(actor.position, position)) {
        return actor
      }
    }
    return undefined
  }

  #attack(attacker: Actor, victim: Actor): void {
    const damage = Math.min(this.#options.attackDamage, victim.health)
    victim.health -= damage

    this.#broadcast({
      type: "combat-hit",
      attackerUid: attacker.uid,
      attackerName: attacker.name,
      victimUid: victim.uid,
      victimName: victim.name,
      damage,
    })

    if (victim.health > 0) {
      this.#broadcast({
        type: "update-state",
        id: victim.uid,
        stateId: "Health",
        value: intValue(victim.health),
      })
      return
    }

    this.#actors.delete(victim.uid)
    attacker.kills++
    this.#broadcast({
      type: "entity-death",
      uid: victim.uid,
      name: victim.name,
      killerUid: attacker.uid,
      killerName: attacker.name,
    })
    this.#broadcast({ type: "remove-entity", id: victim.uid, name: victim.name })
    this.#broadcast({
      type: "update-state",
      id: attacker.uid,
      stateId: "KillCount",
      value: intValue(attacker.kills),
    })
    logger.info("{killer} killed {victim}", {
      killer: attacker.name,
      victim: victim.name,
    })
  }

  #spawn(fields: Omit<Actor, "uid">): Actor {
    const actor: Actor = { uid: this.#nextUid++, ...fields }
    this.#actors.set(actor.uid, actor)
    return actor
  }

  #broadcast(message: GameMsg): void {
    this.#server.broadcast(message)
  }
}
