import type { CancelTimer, Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type ScheduledTimer = {
  id: number
  at: UnixMs
  fn: () => void
}

/**
 * Manually driven clock.
 *
 * Time only moves through `advance()` or `set()`. Timers and sleeps due at or
 * before the new time fire in due order (ties in scheduling order), with `nowMs()`
 * reporting each timer's due time while it runs.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private timers: ScheduledTimer[] = []
  private nextId = 0

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.runUntil(this.time + ms)
  }

  set(ms: UnixMs): void {
    this.runUntil(ms)
  }

  /** Number of timers (including sleeps) still waiting to fire. */
  pendingTimers(): number {
    return this.timers.length
  }

  setTimer(ms: Milliseconds, fn: () => void): CancelTimer {
    const timer: ScheduledTimer = {
      id: this.nextId++,
      at: this.time + Math.max(0, ms),
      fn,
    }

    this.timers.push(timer)

    return () => {
      this.timers = this.timers.filter((t) => t !== timer)
    }
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve()
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const onAbort = () => {
        cancel()
        resolve()
      }

      const cancel = this.setTimer(ms, () => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      })

      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  private runUntil(target: UnixMs): void {
    for (let next = this.nextDue(target); next; next = this.nextDue(target)) {
      this.timers = this.timers.filter((t) => t !== next)
      this.time = Math.max(this.time, next.at)
      next.fn()
    }

    this.time = target
  }

  private nextDue(target: UnixMs): ScheduledTimer | undefined {
    let earliest: ScheduledTimer | undefined

    for (const timer of this.timers) {
      if (timer.at > target) continue
      if (!earliest || timer.at < earliest.at || (timer.at === earliest.at && timer.id < earliest.id)) {
        earliest = timer
      }
    }

    return earliest
  }
}
