import { callerOrigin } from "./caller"
import type { Hook, RegisteredHook } from "./hook"

/**
 * Ordered list of hooks plus the number started from the front.
 *
 * Invariant: `0 <= startedCount <= hooks.length`. A hook whose start finishes
 * after its phase was rolled back is kept aside and stopped first.
 */
export class HookRegistry {
  private readonly entries: RegisteredHook[] = []
  private started = 0
  private stray: RegisteredHook[] = []

  append(hook: Hook): RegisteredHook {
    const registered: RegisteredHook = Object.freeze({
      origin: hook.name ?? callerOrigin(),
      ...(hook.onStart && { onStart: hook.onStart }),
      ...(hook.onStop && { onStop: hook.onStop }),
    })

    this.entries.push(registered)

    return registered
  }

  get hooks(): readonly RegisteredHook[] {
    return [...this.entries]
  }

  get startedCount(): number {
    return this.started
  }

  nextToStart(): RegisteredHook | undefined {
    return this.entries[this.started]
  }

  /**
   * Counts `hook` as started. Returns false when it is no longer the next hook
   * to start, in which case it is only remembered for the next stop.
   */
  markStarted(hook: RegisteredHook): boolean {
    if (this.entries[this.started] === hook) {
      this.started += 1
      return true
    }

    this.stray.push(hook)

    return false
  }

  /** Un-counts the most recently started hook and returns it. */
  popStarted(): RegisteredHook | undefined {
    const stray = this.stray.pop()

    if (stray) return stray
    if (this.started === 0) return undefined

    this.started -= 1

    return this.entries[this.started]
  }
}
