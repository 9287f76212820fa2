/**
 * LoginAuthority - the server's credential check.
 *
 * The session asks the authority once per Login. A verdict may be returned
 * directly or as a promise; a thrown error or rejected promise is treated as
 * `access-denied`.
 */

import type { LoginFailureReason } from "@arena-wire/wire-format"
import type { LoginIdentity } from "./types.js"

export type LoginVerdict =
  | { accepted: true }
  | { accepted: false; reason: LoginFailureReason }

export interface LoginAuthority {
  verify(identity: LoginIdentity): LoginVerdict | Promise<LoginVerdict>
}

export const ACCEPTED: LoginVerdict = { accepted: true }

export function rejected(reason: LoginFailureReason): LoginVerdict {
  return { accepted: false, reason }
}

/**
 * Accepts every login. The default when a server is given no authority.
 */
export const acceptAll: LoginAuthority = {
  verify: () => ACCEPTED,
}

export type StaticAuthorityConfig = {
  /** Required token per player name; players not listed need no token */
  tokens?: Record<string, string>
  /** Player names that are always rejected */
  banned?: readonly string[]
  /** Only these names may log in, when given */
  allowed?: readonly string[]
}

/**
 * An authority backed by fixed lists, for demos and tests.
 */
export function createStaticAuthority(
  config: StaticAuthorityConfig,
): LoginAuthority {
  const banned = new Set(config.banned)
  const allowed = config.allowed ? new Set(config.allowed) : undefined
  const tokens = new Map(Object.entries(config.tokens ?? {}))

  return {
    verify({ name, authtoken }) {
      if (banned.has(name)) return rejected("banned")
      if (allowed && !allowed.has(name)) return rejected("access-denied")

      const token = tokens.get(name)
      if (token !== undefined && token !== authtoken) {
        return rejected("access-denied")
      }
      return ACCEPTED
    },
  }
}

/**
 * Login slots of a server with limited capacity. `acquire` reserves one and
 * reports whether it could; `release` gives it back.
 */
export type CapacitySlots = {
  acquire(): boolean
  release(): void
}

/**
 * Wraps an authority so that a login holds a slot from the moment it is
 * verified. Without a free slot the login is refused with `server-full`
 * before credentials are checked; a refused or failed check releases it.
 */
export function withCapacity(
  authority: LoginAuthority,
  slots: CapacitySlots,
): LoginAuthority {
  return {
    async verify(identity) {
      if (!slots.acquire()) return rejected("server-full")
      try {
        const verdict = await authority.verify(identity)
        if (!verdict.accepted) slots.release()
        return verdict
      } catch (error) {
        slots.release()
        throw error
      }
    },
  }
}

/**
 * Ask `authority` for a verdict, folding failures into `access-denied`.
 */
export async function verifyLogin(
  authority: LoginAuthority,
  identity: LoginIdentity,
  onError?: (error: unknown) => void,
): Promise<LoginVerdict> {
  try {
    return await authority.verify(identity)
  } catch (error) {
    onError?.(error)
    return rejected("access-denied")
  }
}
