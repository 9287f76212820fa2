/**
 * Loads the protobuf schema from `proto/protocol.proto` at run time.
 */

import { fileURLToPath } from "node:url"
import protobuf from "protobufjs"
import type { IConversionOptions, Type } from "protobufjs"

export const PROTO_PATH = fileURLToPath(
  new URL("../proto/protocol.proto", import.meta.url),
)

/**
 * Options for `Type.toObject`: enums and 64-bit values as numbers, and only
 * the fields that were present on the wire.
 */
export const TO_OBJECT_OPTIONS: IConversionOptions = {
  enums: Number,
  longs: Number,
  defaults: false,
  arrays: false,
}

let messageType: Type | undefined

/**
 * The `protocol.Message` type, parsed once on first use.
 */
export function getMessageType(): Type {
  if (!messageType) {
    const root = protobuf.loadSync(PROTO_PATH)
    messageType = root.lookupType("protocol.Message")
  }
  return messageType
}
