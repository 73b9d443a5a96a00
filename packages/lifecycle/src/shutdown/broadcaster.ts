import { BroadcastError } from "../errors/errors"
import { ListenerSlot, type ShutdownListener, type ShutdownSignal } from "./listener-slot"

/**
 * Fans a shutdown signal out to every listener.
 *
 * `listen` and `broadcast` are synchronous, so a broadcast always sees a
 * complete set of listeners and never interleaves with a registration.
 */
export class ShutdownBroadcaster {
  private readonly slots: ListenerSlot[] = []

  get listenerCount(): number {
    return this.slots.length
  }

  listen(): ShutdownListener {
    const slot = new ListenerSlot()

    this.slots.push(slot)

    return slot.handle()
  }

  /**
   * Delivers `signal` to every listener without waiting on any of them.
   * Throws `BroadcastError` with the number of listeners that still held an
   * unconsumed signal; all others received this one.
   */
  broadcast(signal: ShutdownSignal): void {
    let unsent = 0

    for (const slot of this.slots) {
      if (!slot.deliver(signal)) unsent += 1
    }

    if (unsent > 0) {
      throw new BroadcastError({ unsent, total: this.slots.length, signal })
    }
  }
}
