import type { Milliseconds } from "@liftoff/clock"
import { type LogLevelName, logLevelNames } from "@liftoff/logger"
import { z } from "zod"
import { DEFAULTS } from "../app/app-options"
import { ConfigError } from "../errors/errors"

const MAX_TIMER_MS = 2_147_483_647

export const lifecycleEnvSchema = z.object({
  SERVICE_NAME: z.string().min(1).default("liftoff"),

  LIFECYCLE_START_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_TIMER_MS)
    .default(DEFAULTS.startTimeoutMs),
  LIFECYCLE_STOP_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_TIMER_MS)
    .default(DEFAULTS.stopTimeoutMs),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type LifecycleEnv = z.infer<typeof lifecycleEnvSchema>

export type LifecycleConfig = {
  startTimeoutMs: Milliseconds
  stopTimeoutMs: Milliseconds

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}

export function mapEnvToConfig(env: LifecycleEnv): LifecycleConfig {
  return {
    startTimeoutMs: env.LIFECYCLE_START_TIMEOUT_MS,
    stopTimeoutMs: env.LIFECYCLE_STOP_TIMEOUT_MS,
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * Reads lifecycle settings from environment variables.
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadLifecycleConfig(
  env: Record<string, string | undefined> = process.env,
): LifecycleConfig {
  const result = lifecycleEnvSchema.safeParse(env)

  if (!result.success) {
    throw new ConfigError(z.prettifyError(result.error))
  }

  return mapEnvToConfig(result.data)
}
