import type { Clock } from "@liftoff/clock"
import { token } from "@liftoff/container"
import type { Logger } from "@liftoff/logger"
import type { Hook } from "../hooks/hook"

/** What providers see of the application's lifecycle. */
export interface Lifecycle {
  append(hook: Hook): void
}

export interface Shutdowner {
  /** Broadcasts SIGTERM to every `done()` listener. */
  shutdown(): void
}

/** DOT description of the provider graph. */
export type DotGraph = string

export const LifecycleToken = token<Lifecycle>("Lifecycle")
export const ShutdownerToken = token<Shutdowner>("Shutdowner")
export const DotGraphToken = token<DotGraph>("DotGraph")
export const LoggerToken = token<Logger>("Logger")
export const ClockToken = token<Clock>("Clock")
