/**
 * Wire message types - the object shape protobufjs reads and writes.
 *
 * Field names are the camelCase forms of `proto/protocol.proto`; enums are
 * carried as their numeric codes. Schemas validate what `Type.toObject`
 * hands back before it is converted to an Envelope.
 */

import { z } from "zod"

const int32 = z.number().int()
const uint32 = z.number().int().nonnegative()

export const wireVector3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
})

/**
 * Array children are checked one level at a time by the decoder, which keeps
 * the nesting depth under its own control.
 */
export const wireStateValueSchema = z.object({
  type: int32,
  boolVal: z.boolean().optional(),
  intVal: int32.optional(),
  floatVal: z.number().optional(),
  stringVal: z.string().optional(),
  vector3Val: wireVector3Schema.optional(),
  arrayVal: z.array(z.unknown()).optional(),
})

export const wireConnectSchema = z.object({
  version: uint32,
  versionStr: z.string().optional(),
})

export const wireDisconnectSchema = z.object({
  reason: int32,
  reasonStr: z.string().optional(),
})

export const wireLoginSchema = z.object({
  name: z.string(),
  authtoken: z.string().optional(),
  permissions: uint32.optional(),
})

export const wireLoginResultSchema = z.object({
  succeeded: z.boolean(),
  reason: int32.optional(),
})

/** AddEntity and RemoveEntity share a layout */
export const wireEntityRefSchema = z.object({
  id: int32,
  name: z.string().optional(),
})

export const wireUpdateStateSchema = z.object({
  id: int32,
  stateId: z.string(),
  value: wireStateValueSchema,
})

export const wireMoveSchema = z.object({
  direction: wireVector3Schema,
})

export const wireAssignControlSchema = z.object({
  uid: int32,
  revoked: z.boolean().optional(),
})

export const wireEntityDeathSchema = z.object({
  uid: int32,
  name: z.string().optional(),
  killerUid: int32.optional(),
  killerName: z.string().optional(),
})

export const wireCombatHitSchema = z.object({
  attackerUid: int32,
  attackerName: z.string().optional(),
  victimUid: int32,
  victimName: z.string().optional(),
  damage: z.number(),
})

export const wireMessageSchema = z.object({
  type: int32,
  addEntity: wireEntityRefSchema.optional(),
  removeEntity: wireEntityRefSchema.optional(),
  updateState: wireUpdateStateSchema.optional(),
  move: wireMoveSchema.optional(),
  connect: wireConnectSchema.optional(),
  disconnect: wireDisconnectSchema.optional(),
  login: wireLoginSchema.optional(),
  loginResult: wireLoginResultSchema.optional(),
  assignControl: wireAssignControlSchema.optional(),
  entityDeath: wireEntityDeathSchema.optional(),
  combatHit: wireCombatHitSchema.optional(),
})

export type WireVector3 = z.infer<typeof wireVector3Schema>
export type WireStateValue = z.infer<typeof wireStateValueSchema>
export type WireConnect = z.infer<typeof wireConnectSchema>
export type WireDisconnect = z.infer<typeof wireDisconnectSchema>
export type WireLogin = z.infer<typeof wireLoginSchema>
export type WireLoginResult = z.infer<typeof wireLoginResultSchema>
export type WireEntityRef = z.infer<typeof wireEntityRefSchema>
export type WireUpdateState = z.infer<typeof wireUpdateStateSchema>
export type WireMove = z.infer<typeof wireMoveSchema>
export type WireAssignControl = z.infer<typeof wireAssignControlSchema>
export type WireEntityDeath = z.infer<typeof wireEntityDeathSchema>
export type WireCombatHit = z.infer<typeof wireCombatHitSchema>
export type WireMessage = z.infer<typeof wireMessageSchema>
