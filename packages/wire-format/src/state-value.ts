/**
 * StateValue - the recursive tagged union carried by UpdateState.
 *
 * A value is one of six variants. Arrays nest further values, so a value is a
 * tree owned top-down by its parent arrays. The union makes a discriminant
 * paired with the wrong field unrepresentable in typed code; the constructors
 * below enforce the same rule for values built from untyped input.
 */

import { INT32_MAX, INT32_MIN } from "./constants.js"
import { StateValueError } from "./errors.js"

/**
 * Three dimensional vector. Components are doubles on the wire.
 */
export type Vector3 = {
  readonly x: number
  readonly y: number
  readonly z: number
}

export type BoolValue = { readonly type: "bool"; readonly value: boolean }
export type IntValue = { readonly type: "int"; readonly value: number }
export type FloatValue = { readonly type: "float"; readonly value: number }
export type StringValue = { readonly type: "string"; readonly value: string }
export type Vector3Value = { readonly type: "vector3"; readonly value: Vector3 }
export type ArrayValue = {
  readonly type: "array"
  readonly value: readonly StateValue[]
}

export type StateValue =
  | BoolValue
  | IntValue
  | FloatValue
  | StringValue
  | Vector3Value
  | ArrayValue

export type StateValueKind = StateValue["type"]

/**
 * A StateValue with its tags removed, e.g. for rendering or game logic.
 */
export type PlainValue = boolean | number | string | Vector3 | PlainValue[]

/** Components are rounded to 32-bit floats, their precision on the wire */
export function vector3(x: number, y: number, z: number): Vector3 {
  return { x: Math.fround(x), y: Math.fround(y), z: Math.fround(z) }
}

export function isVector3(value: unknown): value is Vector3 {
  return (
    typeof value === "object" &&
    value !== null &&
    "x" in value &&
    "y" in value &&
    "z" in value &&
    typeof value.x === "number" &&
    typeof value.y === "number" &&
    typeof value.z === "number"
  )
}

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// CONSTRUCTORS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export function boolValue(value: boolean): BoolValue {
  if (typeof value !== "boolean") {
    throw new StateValueError(`bool value must be a boolean, got ${typeof value}`)
  }
  return { type: "bool", value }
}

/**
 * @throws StateValueError unless `value` is an integer in int32 range
 */
export function intValue(value: number): IntValue {
  if (typeof value !== "number" || !isInt32(value)) {
    throw new StateValueError(`int value must be a 32-bit integer, got ${value}`)
  }
  return { type: "int", value }
}

/**
 * Floats are 32-bit on the wire, so the value is rounded to float32 here and
 * decodes back to exactly what was stored.
 */
export function floatValue(value: number): FloatValue {
  if (typeof value !== "number") {
    throw new StateValueError(`float value must be a number, got ${typeof value}`)
  }
  return { type: "float", value: Math.fround(value) }
}

export function stringValue(value: string): StringValue {
  if (typeof value !== "string") {
    throw new StateValueError(
      `string value must be a string, got ${typeof value}`,
    )
  }
  return { type: "string", value }
}

export function vector3Value(value: Vector3): Vector3Value {
  if (!isVector3(value)) {
    throw new StateValueError("vector3 value must have numeric x, y and z")
  }
  return { type: "vector3", value: vector3(value.x, value.y, value.z) }
}

export function arrayValue(values: readonly StateValue[]): ArrayValue {
  if (!Array.isArray(values)) {
    throw new StateValueError("array value must be an array of state values")
  }
  values.forEach((element, index) => {
    if (!isStateValue(element)) {
      throw new StateValueError(`array element ${index} is not a state value`)
    }
  })
  return { type: "array", value: [...values] }
}

/**
 * Build a StateValue from an untyped discriminant and field, e.g. when values
 * come from configuration or a scripting layer.
 *
 * @throws StateValueError if `raw` does not fit `type`
 */
export function createStateValue(type: StateValueKind, raw: unknown): StateValue {
  switch (type) {
    case "bool":
      if (typeof raw !== "boolean") break
      return boolValue(raw)
    case "int":
      if (typeof raw !== "number") break
      return intValue(raw)
    case "float":
      if (typeof raw !== "number") break
      return floatValue(raw)
    case "string":
      if (typeof raw !== "string") break
      return stringValue(raw)
    case "vector3":
      if (!isVector3(raw)) break
      return vector3Value(raw)
    case "array":
      if (!Array.isArray(raw)) break
      return arrayValue(raw)
    default:
      throw new StateValueError(`unknown state value type: ${String(type)}`)
  }
  throw new StateValueError(`field does not match discriminant '${type}'`)
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// INSPECTION
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * Structural check for a well-formed StateValue tree.
 */
export function isStateValue(value: unknown): value is StateValue {
  if (typeof value !== "object" || value === null) return false
  if (!("type" in value) || !("value" in value)) return false

  const inner = value.value
  switch (value.type) {
    case "bool":
      return typeof inner === "boolean"
    case "int":
      return typeof inner === "number" && isInt32(inner)
    case "float":
      return typeof inner === "number"
    case "string":
      return typeof inner === "string"
    case "vector3":
      return isVector3(inner)
    case "array":
      return Array.isArray(inner) && inner.every(isStateValue)
    default:
      return false
  }
}

function numbersEqual(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b))
}

/**
 * Deep equality. Int and Float never compare equal, even for the same number.
 */
export function stateValuesEqual(a: StateValue, b: StateValue): boolean {
  switch (a.type) {
    case "bool":
      return b.type === "bool" && b.value === a.value
    case "string":
      return b.type === "string" && b.value === a.value
    case "int":
      return b.type === "int" && numbersEqual(a.value, b.value)
    case "float":
      return b.type === "float" && numbersEqual(a.value, b.value)
    case "vector3":
      return (
        b.type === "vector3" &&
        numbersEqual(a.value.x, b.value.x) &&
        numbersEqual(a.value.y, b.value.y) &&
        numbersEqual(a.value.z, b.value.z)
      )
    case "array":
      return (
        b.type === "array" &&
        a.value.length === b.value.length &&
        a.value.every((element, i) => {
          const other = b.value[i]
          return other !== undefined && stateValuesEqual(element, other)
        })
      )
  }
}

export function cloneStateValue(value: StateValue): StateValue {
  switch (value.type) {
    case "vector3":
      return {
        type: "vector3",
        value: vector3(value.value.x, value.value.y, value.value.z),
      }
    case "array":
      return { type: "array", value: value.value.map(cloneStateValue) }
    default:
      return { ...value }
  }
}

/**
 * Nesting depth: scalars are 1, an array is one more than its deepest element.
 */
export function stateValueDepth(value: StateValue): number {
  if (value.type !== "array") return 1
  let deepest = 0
  for (const element of value.value) {
    deepest = Math.max(deepest, stateValueDepth(element))
  }
  return deepest + 1
}

export function toPlainValue(value: StateValue): PlainValue {
  switch (value.type) {
    case "vector3":
      return vector3(value.value.x, value.value.y, value.value.z)
    case "array":
      return value.value.map(toPlainValue)
    default:
      return value.value
  }
}
