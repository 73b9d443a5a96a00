import { Container, canVisualizeError } from "@liftoff/container"
import { BaseError, combineErrors, findInChain } from "@liftoff/errors"
import type { Logger } from "@liftoff/logger"
import { backgroundContext } from "../deadline/context"
import { type WithDeadlineFn, withDeadline } from "../deadline/with-deadline"
import { ConstructionError, RollbackError } from "../errors/errors"
import type { HookContext } from "../hooks/hook"
import { HookRegistry } from "../hooks/hook-registry"
import { type RunStartFn, runStart } from "../hooks/run-start"
import { type RunStopFn, runStop } from "../hooks/run-stop"
import { ShutdownBroadcaster } from "../shutdown/broadcaster"
import type { ShutdownListener, ShutdownSignal } from "../shutdown/listener-slot"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../shutdown/signals"
import {
  type AppDependencies,
  type AppOptions,
  type ResolvedAppOptions,
  resolveOptions,
} from "./app-options"
import {
  ClockToken,
  DotGraphToken,
  type Lifecycle,
  LifecycleToken,
  LoggerToken,
  type Shutdowner,
  ShutdownerToken,
} from "./tokens"

export interface AppCollaborators {
  runStart: RunStartFn
  runStop: RunStopFn
  withDeadline: WithDeadlineFn
  setupProcessHandlers: SetupProcessHandlersFn
}

const defaultCollaborators: AppCollaborators = {
  runStart,
  runStop,
  withDeadline,
  setupProcessHandlers,
}

/**
 * A process assembled from providers, started in the order its hooks were
 * appended and stopped in reverse.
 *
 * Construction happens in the constructor and never throws; a failure is kept
 * as the sticky error returned by `err()` and short-circuits `start()`.
 */
export class App {
  readonly shutdowner: Shutdowner

  private readonly logger: Logger
  private readonly registry = new HookRegistry()
  private readonly broadcaster = new ShutdownBroadcaster()
  private readonly container = new Container()
  private readonly lifecycle: Lifecycle

  private constructionError?: ConstructionError
  private signals?: SignalHandler | undefined

  constructor(
    private readonly deps: AppDependencies,
    private readonly options: ResolvedAppOptions,
    private readonly collabs: AppCollaborators = defaultCollaborators,
  ) {
    this.logger = deps.logger.child({ module: "lifecycle" })
    this.lifecycle = { append: (hook) => void this.registry.append(hook) }
    this.shutdowner = { shutdown: () => this.broadcaster.broadcast("SIGTERM") }

    this.construct()
  }

  get startTimeoutMs(): number {
    return this.options.startTimeoutMs
  }

  get stopTimeoutMs(): number {
    return this.options.stopTimeoutMs
  }

  /** The construction error, if construction failed. */
  err(): ConstructionError | undefined {
    return this.constructionError
  }

  /**
   * Runs start hooks within the start timeout. On failure the hooks already
   * started are stopped within the stop timeout before the error is thrown;
   * a failed rollback is reported as `RollbackError`.
   */
  async start(parent: HookContext = backgroundContext()): Promise<void> {
    if (this.constructionError) throw this.constructionError

    try {
      await this.collabs.withDeadline(
        this.deps,
        parent,
        { phase: "start", timeoutMs: this.options.startTimeoutMs },
        (ctx) => this.collabs.runStart(this.phaseDeps(), ctx, this.registry),
      )
    } catch (startError) {
      this.logger.error("Start failed, rolling back", { phase: "start", err: startError })
      this.notify(startError)

      try {
        await this.stopHooks(backgroundContext())
      } catch (rollbackError) {
        this.logger.error("Couldn't roll back cleanly", { phase: "stop", err: rollbackError })

        throw new RollbackError(startError, rollbackError)
      }

      throw startError
    }

    this.logger.info("Running")
  }

  /**
   * Runs stop hooks for every started hook within the stop timeout, then
   * removes process signal handlers. A no-op for hooks never started.
   */
  async stop(parent: HookContext = backgroundContext()): Promise<void> {
    try {
      await this.stopHooks(parent)
    } finally {
      this.releaseSignals()
    }
  }

  /**
   * A new shutdown listener. The first call installs SIGINT and SIGTERM
   * handlers that broadcast the received signal.
   */
  done(): ShutdownListener {
    this.signals ??= this.collabs.setupProcessHandlers({
      logger: this.logger,
      onSignal: (signal) => this.forward(signal),
    })

    return this.broadcaster.listen()
  }

  /**
   * Starts, waits for a shutdown signal, then stops. Failures are logged at
   * fatal and rethrown.
   */
  async run(): Promise<void> {
    const done = this.done()

    try {
      await this.start()
    } catch (err) {
      this.releaseSignals()
      this.logger.fatal("Failed to start", { err })

      throw err
    }

    const signal = await done.wait()

    this.logger.warn("Shutdown triggered", { signal })

    try {
      await this.stop()
    } catch (err) {
      this.logger.fatal("Failed to stop cleanly", { err })

      throw err
    }
  }

  private construct(): void {
    const steps: (() => void)[] = [
      () => this.provideBuiltIns(),
      ...this.options.provides.map((provider) => () => this.container.provide(provider)),
      ...this.options.invokes.map((fn) => () => this.container.invoke(fn)),
    ]

    let error = combineErrors(this.options.errors)

    for (const step of steps) {
      if (error !== undefined) break

      try {
        step()
      } catch (err) {
        error = err
      }
    }

    if (error !== undefined) this.fail(error)
  }

  private provideBuiltIns(): void {
    this.container.provide({ provide: LifecycleToken, useValue: this.lifecycle })
    this.container.provide({ provide: ShutdownerToken, useValue: this.shutdowner })
    this.container.provide({ provide: LoggerToken, useValue: this.deps.logger })
    this.container.provide({ provide: ClockToken, useValue: this.deps.clock })
    this.container.provide({ provide: DotGraphToken, useFactory: () => this.container.visualize() })
  }

  private fail(cause: unknown): void {
    const graph = canVisualizeError(cause) ? this.container.visualize(cause) : undefined

    this.constructionError = new ConstructionError(cause, graph)
    this.logger.error("Construction failed", { err: this.constructionError })
    this.notify(this.constructionError)
  }

  private notify(err: unknown): void {
    for (const hook of this.options.errorHooks) {
      try {
        hook(err)
      } catch (hookErr) {
        this.logger.error("Error hook failed", { err: hookErr })
      }
    }
  }

  private stopHooks(parent: HookContext): Promise<void> {
    return this.collabs.withDeadline(
      this.deps,
      parent,
      { phase: "stop", timeoutMs: this.options.stopTimeoutMs },
      (ctx) => this.collabs.runStop(this.phaseDeps(), ctx, this.registry),
    )
  }

  private forward(signal: ShutdownSignal): void {
    try {
      this.broadcaster.broadcast(signal)
    } catch (err) {
      this.logger.warn("Shutdown signal not delivered to every listener", { signal, err })
    }
  }

  private releaseSignals(): void {
    this.signals?.unregister()
    this.signals = undefined
  }

  private phaseDeps(): AppDependencies {
    return { logger: this.logger, clock: this.deps.clock }
  }
}

export function createApp(deps: AppDependencies, options: AppOptions = {}): App {
  return new App(deps, resolveOptions(options))
}

/** The DOT graph attached to a construction error anywhere in `err`'s cause chain. */
export function visualizeError(err: unknown): string {
  const graph = findInChain(err, isConstructionError)?.graph

  if (graph === undefined) {
    throw new BaseError("unable to visualize error", { code: "visualize_failed", cause: err })
  }

  return graph
}

function isConstructionError(value: unknown): value is ConstructionError {
  return value instanceof ConstructionError
}
