import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Options define which entries are emitted and how they are rendered.
 * Adapters must honor them but choose how internally.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development.
   *
   * Ignored when an explicit destination stream is given.
   */
  prettify?: boolean
}
