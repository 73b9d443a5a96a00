import type { UnixMs } from "@liftoff/clock"

export type HookPhase = "start" | "stop"

export interface HookContext {
  /** Aborted when the phase deadline passes or the caller gives up. */
  readonly signal: AbortSignal

  /** Absolute deadline of the running phase, if it has one. */
  readonly deadlineMs?: UnixMs
}

/** Fails by throwing or rejecting. */
export type HookFn = (ctx: HookContext) => void | Promise<void>

export interface Hook {
  /** Shown in logs and errors. Defaults to the call site that appended the hook. */
  name?: string
  onStart?: HookFn
  onStop?: HookFn
}

export type RegisteredHook = Readonly<{
  origin: string
  onStart?: HookFn
  onStop?: HookFn
}>

export interface HookFailure {
  hook: string
  error: unknown
}
