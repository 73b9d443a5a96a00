export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { CancelTimer, Clock, Sleeper, Timers, TimeSource } from "./ports/clock"
export type { Milliseconds, Seconds, UnixMs } from "./ports/time"
