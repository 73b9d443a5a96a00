import type { Logger } from "@liftoff/logger"
import type { ShutdownSignal } from "./listener-slot"

export interface SignalHandlerContext {
  logger: Logger
  onSignal: (signal: ShutdownSignal) => void
}

export interface SignalHandler {
  unregister: () => void
}

const SIGNALS = ["SIGINT", "SIGTERM"] as const satisfies readonly ShutdownSignal[]

/**
 * Forwards SIGINT and SIGTERM to `onSignal` until unregistered.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const handlers = SIGNALS.map((signal) => {
    const handler = () => {
      ctx.logger.info("Received signal", { signal })
      ctx.onSignal(signal)
    }

    process.on(signal, handler)

    return { signal, handler }
  })

  return {
    unregister: () => {
      for (const { signal, handler } of handlers) {
        process.off(signal, handler)
      }
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers
