import type { Milliseconds } from "@liftoff/clock"
import { BaseError } from "@liftoff/errors"
import type { HookFailure, HookPhase } from "../hooks/hook"
import type { ShutdownSignal } from "../shutdown/listener-slot"

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** The sticky error of an application whose construction failed. */
export class ConstructionError extends BaseError<"construction_failed"> {
  /** DOT graph of the providers, with the failing ones coloured. */
  readonly graph?: string

  constructor(cause: unknown, graph?: string) {
    super(`construction failed: ${errorMessage(cause)}`, {
      code: "construction_failed",
      cause,
    })

    if (graph !== undefined) this.graph = graph
  }
}

export class StartError extends BaseError<"start_failed"> {
  constructor(
    readonly hook: string,
    cause: unknown,
  ) {
    super(`start hook added by ${hook} failed: ${errorMessage(cause)}`, {
      code: "start_failed",
      context: { hook },
      cause,
    })
  }
}

export class StopError extends BaseError<"stop_failed"> {
  readonly failures: readonly HookFailure[]
  readonly errors: readonly unknown[]

  constructor(failures: readonly HookFailure[]) {
    const message = failures
      .map((f) => `stop hook added by ${f.hook} failed: ${errorMessage(f.error)}`)
      .join("; ")

    super(message, {
      code: "stop_failed",
      context: { hooks: failures.map((f) => f.hook) },
    })

    this.failures = Object.freeze([...failures])
    this.errors = Object.freeze(failures.map((f) => f.error))
  }
}

export class RollbackError extends BaseError<"rollback_failed"> {
  constructor(
    readonly startError: unknown,
    readonly rollbackError: unknown,
  ) {
    super(`${errorMessage(startError)}; rollback failed: ${errorMessage(rollbackError)}`, {
      code: "rollback_failed",
      cause: startError,
    })
  }
}

export class DeadlineExceededError extends BaseError<"deadline_exceeded"> {
  constructor(
    readonly phase: HookPhase,
    readonly timeoutMs: Milliseconds,
  ) {
    super(`${phase} deadline exceeded after ${timeoutMs}ms`, {
      code: "deadline_exceeded",
      context: { phase, timeoutMs },
    })
  }
}

export class ContextCanceledError extends BaseError<"context_canceled"> {
  constructor(
    readonly phase: HookPhase,
    reason?: unknown,
  ) {
    super(`${phase} canceled`, {
      code: "context_canceled",
      context: { phase },
      cause: reason,
    })
  }
}

export type BroadcastFailure = {
  unsent: number
  total: number
  signal: ShutdownSignal
}

export class BroadcastError extends BaseError<"broadcast_partial_failure"> {
  readonly unsent: number
  readonly total: number
  readonly signal: ShutdownSignal

  constructor({ unsent, total, signal }: BroadcastFailure) {
    super(`failed to send ${signal} signal to ${unsent} out of ${total} listeners`, {
      code: "broadcast_partial_failure",
      context: { unsent, total, signal },
    })

    this.unsent = unsent
    this.total = total
    this.signal = signal
  }
}

export class ConfigError extends BaseError<"config_invalid"> {
  constructor(details: string) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      isOperational: false,
    })
  }
}
