import type { Clock, Milliseconds } from "@liftoff/clock"
import type { Invocation, Provider } from "@liftoff/container"
import type { Logger } from "@liftoff/logger"

export interface AppDependencies {
  logger: Logger
  clock: Clock
}

/** Observes the construction error, and any start error, exactly once each. */
export type ErrorHook = (err: unknown) => void

export interface AppOptions {
  /** Registered in order; the first failure stops construction. */
  provides?: Provider<unknown>[]

  /** Run in order once every provider is registered. */
  invokes?: Invocation[]

  /**
   * Errors known before construction, e.g. from loading configuration.
   * Any present short-circuit construction.
   */
  errors?: unknown[]

  errorHooks?: ErrorHook[]

  /** @default 15_000 */
  startTimeoutMs?: Milliseconds

  /** @default 15_000 */
  stopTimeoutMs?: Milliseconds
}

export type ResolvedAppOptions = {
  provides: Provider<unknown>[]
  invokes: Invocation[]
  errors: unknown[]
  errorHooks: ErrorHook[]
  startTimeoutMs: Milliseconds
  stopTimeoutMs: Milliseconds
}

interface AppDefaults {
  startTimeoutMs: Milliseconds
  stopTimeoutMs: Milliseconds
}

export const DEFAULTS: AppDefaults = {
  startTimeoutMs: 15_000,
  stopTimeoutMs: 15_000,
}

export function resolveOptions(options: AppOptions = {}): ResolvedAppOptions {
  return {
    provides: options.provides ?? [],
    invokes: options.invokes ?? [],
    errors: options.errors ?? [],
    errorHooks: options.errorHooks ?? [],
    startTimeoutMs: options.startTimeoutMs ?? DEFAULTS.startTimeoutMs,
    stopTimeoutMs: options.stopTimeoutMs ?? DEFAULTS.stopTimeoutMs,
  }
}

/** Identity helper that checks a provider's value against its token. */
export function provide<T>(provider: Provider<T>): Provider<T> {
  return provider
}
