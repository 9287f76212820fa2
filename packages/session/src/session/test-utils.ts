import type { Envelope } from "@arena-wire/wire-format"
import {
  type Command,
  init as programInit,
  type SessionModel,
} from "../session-program.js"
import type { Phase, Role } from "../types.js"

/**
 * A session model for `role` placed directly in `phase`.
 */
export function createModel(
  role: Role,
  phase?: Phase,
  overrides: Partial<SessionModel> = {},
): SessionModel {
  const [model] = programInit({
    role,
    protocolVersion: 1,
    versionStr: "0.1.0",
  })
  return { ...model, ...(phase ? { phase } : {}), ...overrides }
}

/**
 * Asserts that a command is of the expected type
 */
export function expectCommand<T extends Command["type"]>(
  command: Command | undefined,
  expectedType: T,
): asserts command is Extract<Command, { type: T }> {
  if (!command) {
    throw new Error("command is undefined")
  }
  if (command.type !== expectedType) {
    throw new Error(
      `Expected command type "${expectedType}" but got "${command.type}"`,
    )
  }
}

/**
 * Every command in execution order, with batches expanded.
 */
export function flattenCommands(command: Command | undefined): Command[] {
  if (!command) return []
  if (command.type === "cmd/batch") {
    return command.commands.flatMap(flattenCommands)
  }
  return [command]
}

/**
 * The envelopes a command would write to the transport, in order.
 */
export function sentEnvelopes(command: Command | undefined): Envelope[] {
  return flattenCommands(command).flatMap(c =>
    c.type === "cmd/send" ? [c.envelope] : [],
  )
}

export function commandTypes(command: Command | undefined): string[] {
  return flattenCommands(command).map(c => c.type)
}
