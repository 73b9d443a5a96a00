import { StopError } from "../errors/errors"
import type { HookContext, HookFailure } from "./hook"
import type { HookRegistry } from "./hook-registry"
import { type PhaseDependencies, runHook } from "./run-hook"

/**
 * Stops started hooks in reverse order. Every started hook is un-counted and
 * its stop attempted, even after earlier failures; those are reported
 * together in a `StopError`.
 */
export async function runStop(
  deps: PhaseDependencies,
  ctx: HookContext,
  registry: HookRegistry,
): Promise<void> {
  const failures: HookFailure[] = []

  for (let hook = registry.popStarted(); hook; hook = registry.popStarted()) {
    if (!hook.onStop) continue

    try {
      await runHook(deps, "stop", hook, hook.onStop, ctx)
    } catch (error) {
      failures.push({ hook: hook.origin, error })
    }
  }

  if (failures.length > 0) throw new StopError(failures)
}

export type RunStopFn = typeof runStop
