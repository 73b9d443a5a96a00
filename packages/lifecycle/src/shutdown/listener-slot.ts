/** Signals a listener can receive. The shutdowner always sends `SIGTERM`. */
export type ShutdownSignal = NodeJS.Signals

/** Read-only view of a listener slot. */
export interface ShutdownListener {
  /**
   * Resolves with the pending signal (consuming it) or the next one delivered.
   * Rejects with `abort.reason` if `abort` fires first.
   */
  wait(abort?: AbortSignal): Promise<ShutdownSignal>

  /** True while a delivered signal has not been consumed. */
  readonly pending: boolean
}

type Waiter = (signal: ShutdownSignal) => void

/** Holds at most one undelivered signal. */
export class ListenerSlot {
  private stored: ShutdownSignal | undefined
  private waiters: Waiter[] = []

  get pending(): boolean {
    return this.stored !== undefined
  }

  /**
   * Hands `signal` to the oldest waiting reader, or stores it.
   * Returns false, dropping `signal`, when one is already stored.
   */
  deliver(signal: ShutdownSignal): boolean {
    const waiter = this.waiters.shift()

    if (waiter) {
      waiter(signal)
      return true
    }

    if (this.stored !== undefined) return false

    this.stored = signal

    return true
  }

  wait(abort?: AbortSignal): Promise<ShutdownSignal> {
    const stored = this.stored

    if (stored !== undefined) {
      this.stored = undefined
      return Promise.resolve(stored)
    }

    if (abort?.aborted) return Promise.reject(abort.reason)

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter)
        reject(abort?.reason)
      }

      const waiter: Waiter = (signal) => {
        abort?.removeEventListener("abort", onAbort)
        resolve(signal)
      }

      this.waiters.push(waiter)
      abort?.addEventListener("abort", onAbort, { once: true })
    })
  }

  /** The handle given out to listeners; it cannot deliver. */
  handle(): ShutdownListener {
    const wait = (abort?: AbortSignal) => this.wait(abort)
    const isPending = () => this.pending

    return {
      wait,
      get pending() {
        return isPending()
      },
    }
  }
}
