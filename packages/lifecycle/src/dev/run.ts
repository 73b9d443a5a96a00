import { SystemClock } from "@liftoff/clock"
import { type Resolver, token } from "@liftoff/container"
import { createPinoLogger } from "@liftoff/logger"
import { createApp } from "../app/app"
import { provide } from "../app/app-options"
import { runMain } from "../app/run-main"
import { LifecycleToken, LoggerToken } from "../app/tokens"
import { loadLifecycleConfig } from "../config/config"

type Ticker = { ticks: number }

const TickerToken = token<Ticker>("Ticker")

function createTicker(r: Resolver): Ticker {
  const lifecycle = r.get(LifecycleToken)
  const logger = r.get(LoggerToken)
  const ticker: Ticker = { ticks: 0 }
  let interval: NodeJS.Timeout | undefined

  lifecycle.append({
    name: "ticker",
    onStart: () => {
      interval = setInterval(() => {
        ticker.ticks += 1
        logger.info("tick", { ticks: ticker.ticks })
      }, 1_000)
    },
    onStop: () => {
      clearInterval(interval)
    },
  })

  return ticker
}

export async function run(): Promise<void> {
  const config = loadLifecycleConfig(process.env)
  const logger = createPinoLogger(
    { level: config.logging.level, prettify: config.logging.prettify },
    { service: config.logging.serviceName },
  )

  const app = createApp(
    { logger, clock: new SystemClock() },
    {
      startTimeoutMs: config.startTimeoutMs,
      stopTimeoutMs: config.stopTimeoutMs,
      provides: [provide({ provide: TickerToken, useFactory: createTicker })],
      invokes: [(r) => void r.get(TickerToken)],
    },
  )

  await runMain(app)
}

if (import.meta.url === `file://${process.argv[1]}`) {
  run().catch((err) => {
    console.error(err)
    process.exitCode = 1
  })
}
