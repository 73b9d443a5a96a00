import type { UnixMs } from "@liftoff/clock"
import type { HookContext } from "../hooks/hook"

const never = new AbortController()

/** A context that is never aborted and has no deadline. */
export function backgroundContext(): HookContext {
  return { signal: never.signal }
}

/** Wraps a caller's abort signal (and optional absolute deadline) as a context. */
export function contextFrom(signal: AbortSignal, deadlineMs?: UnixMs): HookContext {
  return deadlineMs === undefined ? { signal } : { signal, deadlineMs }
}
