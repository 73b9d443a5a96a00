import type { CancelTimer, Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  setTimer(ms: Milliseconds, fn: () => void): CancelTimer {
    const timer = setTimeout(fn, Math.max(0, ms))

    return () => clearTimeout(timer)
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve()
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer)
        resolve()
      }

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      }, ms)

      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }
}
