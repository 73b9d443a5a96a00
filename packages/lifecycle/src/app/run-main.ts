import type { App } from "./app"

/**
 * Entry-point wrapper around `app.run()`. `run` already logs the failure, so
 * this only marks the process as failed.
 */
export async function runMain(app: App): Promise<void> {
  try {
    await app.run()
  } catch {
    process.exitCode = 1
  }
}
