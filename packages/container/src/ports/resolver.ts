import type { Token } from "../core/token"

/**
 * Handed to every factory and invocation. Each call resolves (and caches) one
 * dependency and records it as an edge of the provider graph.
 */
export interface Resolver {
  /** The provider for `token` (and `name`). Throws `MissingProviderError` when absent. */
  get<T>(token: Token<T>, name?: string): T

  /** Like `get`, but `undefined` instead of failing when nothing provides `token`. */
  optional<T>(token: Token<T>, name?: string): T | undefined

  /** Every value provided into `group`, in registration order. Empty when none. */
  group<T>(token: Token<T>, group: string): T[]
}

export interface Graph {
  get<T>(token: Token<T>, name?: string): T
  getGroup<T>(token: Token<T>, group: string): T[]
}
