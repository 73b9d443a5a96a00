import { fileURLToPath } from "node:url"

const packageRoot = fileURLToPath(new URL("..", import.meta.url))

const STACK_DEPTH = 50

/**
 * First stack frame outside this package, e.g. `createServer (/srv/app/server.ts:42:7)`.
 *
 * Frames from this package's tests count as outside.
 */
export function callerOrigin(): string {
  const limit = Error.stackTraceLimit

  Error.stackTraceLimit = STACK_DEPTH

  const stack = new Error().stack ?? ""

  Error.stackTraceLimit = limit

  const frame = stack
    .split("\n")
    .slice(1)
    .map((line) => line.trim().replace(/^at /, ""))
    .find((line) => line.length > 0 && !isInternal(line))

  return frame ?? "unknown"
}

function isInternal(frame: string): boolean {
  if (frame.includes("node:internal") || frame.startsWith("new Promise")) return true

  const location = frame.includes(packageRoot) || frame.includes(`file://${packageRoot}`)

  return location && !frame.includes("__tests__")
}
