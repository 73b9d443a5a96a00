import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}

export interface Sleeper {
  /** Delay execution for `ms` milliseconds. Resolves early if `signal` is aborted. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

/** Cancels a pending timer. Calling it after the timer fired is a no-op. */
export type CancelTimer = () => void

export interface Timers {
  /** Run `fn` once, `ms` milliseconds from now. */
  setTimer(ms: Milliseconds, fn: () => void): CancelTimer
}

export type Clock = TimeSource & Sleeper & Timers
