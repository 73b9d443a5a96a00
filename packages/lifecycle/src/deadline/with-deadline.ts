import type { Clock, Milliseconds } from "@liftoff/clock"
import type { Logger } from "@liftoff/logger"
import { ContextCanceledError, DeadlineExceededError } from "../errors/errors"
import type { HookContext, HookPhase } from "../hooks/hook"

export type DeadlineDependencies = {
  clock: Clock
  logger: Logger
}

export type DeadlineOptions = {
  phase: HookPhase
  timeoutMs: Milliseconds
}

type Settled<T> = { value: T }

/**
 * Runs `fn` under a child context whose deadline is the earlier of the
 * parent's and `now + timeoutMs`.
 *
 * Whichever comes first wins: `fn` settling, the deadline passing
 * (`DeadlineExceededError`) or the parent aborting (`ContextCanceledError`).
 * When `fn` loses it is not awaited; its signal is aborted with the error
 * and a late failure is logged at warn.
 */
export async function withDeadline<T>(
  deps: DeadlineDependencies,
  parent: HookContext,
  options: DeadlineOptions,
  fn: (ctx: HookContext) => T | Promise<T>,
): Promise<T> {
  const { clock, logger } = deps
  const { phase, timeoutMs } = options

  if (parent.signal.aborted) throw new ContextCanceledError(phase, parent.signal.reason)

  const now = clock.nowMs()
  const deadlineMs = Math.min(parent.deadlineMs ?? Number.POSITIVE_INFINITY, now + timeoutMs)
  const controller = new AbortController()
  const ctx: HookContext = { signal: controller.signal, deadlineMs }

  let interrupt: (err: Error) => void = () => {}

  const interrupted = new Promise<Error>((resolve) => {
    interrupt = resolve
  })

  const onParentAbort = () => interrupt(new ContextCanceledError(phase, parent.signal.reason))

  parent.signal.addEventListener("abort", onParentAbort, { once: true })

  const budgetMs = deadlineMs - now

  const cancelTimer = clock.setTimer(budgetMs, () =>
    interrupt(new DeadlineExceededError(phase, budgetMs)),
  )

  const task = Promise.resolve().then(() => fn(ctx))

  try {
    const outcome = await Promise.race([
      task.then((value): Settled<T> => ({ value })),
      interrupted,
    ])

    if (outcome instanceof Error) {
      controller.abort(outcome)

      void task.catch((err: unknown) => {
        logger.warn(`Abandoned ${phase} phase failed`, { phase, err })
      })

      throw outcome
    }

    return outcome.value
  } finally {
    cancelTimer()
    parent.signal.removeEventListener("abort", onParentAbort)
  }
}

export type WithDeadlineFn = typeof withDeadline
