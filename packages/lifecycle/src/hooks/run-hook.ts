import type { Clock } from "@liftoff/clock"
import type { Logger } from "@liftoff/logger"
import type { HookContext, HookFn, HookPhase, RegisteredHook } from "./hook"

export type PhaseDependencies = {
  logger: Logger
  clock: Clock
}

/** Runs one hook body, logging around it. Rethrows what the body throws. */
export async function runHook(
  deps: PhaseDependencies,
  phase: HookPhase,
  hook: RegisteredHook,
  fn: HookFn,
  ctx: HookContext,
): Promise<void> {
  const { logger, clock } = deps
  const startedAt = clock.nowMs()

  logger.debug(`Running ${phase} hook: ${hook.origin}`, { phase, hook: hook.origin })

  try {
    await fn(ctx)
  } catch (err) {
    logger.error(`${capitalize(phase)} hook failed: ${hook.origin}`, {
      phase,
      hook: hook.origin,
      err,
    })

    throw err
  }

  logger.info(`Executed ${phase} hook: ${hook.origin}`, {
    phase,
    hook: hook.origin,
    durationMs: clock.nowMs() - startedAt,
  })
}

function capitalize(s: string): string {
  return s.length ? `${s.charAt(0).toUpperCase()}${s.slice(1)}` : s
}
