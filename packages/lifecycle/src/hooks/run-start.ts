import { StartError } from "../errors/errors"
import type { HookContext } from "./hook"
import type { HookRegistry } from "./hook-registry"
import { type PhaseDependencies, runHook } from "./run-hook"

/**
 * Starts hooks in append order, resuming after the last one started.
 *
 * Stops at the first failure with a `StartError`; the failing hook is not
 * counted as started. Once `ctx.signal` is aborted no further hook is started
 * and the abort reason is thrown. A hook that finishes starting after the
 * registry was rolled back ends the walk.
 */
export async function runStart(
  deps: PhaseDependencies,
  ctx: HookContext,
  registry: HookRegistry,
): Promise<void> {
  for (let hook = registry.nextToStart(); hook; hook = registry.nextToStart()) {
    ctx.signal.throwIfAborted()

    if (hook.onStart) {
      try {
        await runHook(deps, "start", hook, hook.onStart, ctx)
      } catch (err) {
        throw new StartError(hook.origin, err)
      }
    }

    if (!registry.markStarted(hook)) return
  }
}

export type RunStartFn = typeof runStart
