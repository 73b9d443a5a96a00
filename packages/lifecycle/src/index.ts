export { App, type AppCollaborators, createApp, visualizeError } from "./app/app"
export {
  type AppDependencies,
  type AppOptions,
  DEFAULTS,
  type ErrorHook,
  provide,
  type ResolvedAppOptions,
  resolveOptions,
} from "./app/app-options"
export { runMain } from "./app/run-main"
export {
  ClockToken,
  type DotGraph,
  DotGraphToken,
  type Lifecycle,
  LifecycleToken,
  LoggerToken,
  type Shutdowner,
  ShutdownerToken,
} from "./app/tokens"
export {
  type LifecycleConfig,
  type LifecycleEnv,
  lifecycleEnvSchema,
  loadLifecycleConfig,
  mapEnvToConfig,
} from "./config/config"
export { backgroundContext, contextFrom } from "./deadline/context"
export { type DeadlineOptions, withDeadline } from "./deadline/with-deadline"
export {
  type BroadcastFailure,
  BroadcastError,
  ConfigError,
  ConstructionError,
  ContextCanceledError,
  DeadlineExceededError,
  RollbackError,
  StartError,
  StopError,
} from "./errors/errors"
export type { Hook, HookContext, HookFailure, HookFn, HookPhase, RegisteredHook } from "./hooks/hook"
export { HookRegistry } from "./hooks/hook-registry"
export type { PhaseDependencies } from "./hooks/run-hook"
export { runStart } from "./hooks/run-start"
export { runStop } from "./hooks/run-stop"
export { ShutdownBroadcaster } from "./shutdown/broadcaster"
export { ListenerSlot, type ShutdownListener, type ShutdownSignal } from "./shutdown/listener-slot"
export { type SignalHandler, setupProcessHandlers } from "./shutdown/signals"
