import type { Logger } from "@liftoff/logger"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import { setupProcessHandlers } from "../signals"

describe("setupProcessHandlers", () => {
  let logger: Mock<Logger>

  beforeEach(() => {
    logger = mock<Logger>()
  })

  function spyOnProcess() {
    const on = vi.spyOn(process, "on").mockImplementation(() => process)
    const off = vi.spyOn(process, "off").mockImplementation(() => process)

    function handlerFor(event: string) {
      return on.mock.calls.find(([e]) => e === event)?.[1]
    }

    return { on, off, handlerFor }
  }

  it("registers SIGINT and SIGTERM handlers only", () => {
    const { on } = spyOnProcess()

    setupProcessHandlers({ logger, onSignal: vi.fn() })

    expect(on).toHaveBeenCalledTimes(2)
    expect(on).toHaveBeenCalledWith("SIGINT", expect.any(Function))
    expect(on).toHaveBeenCalledWith("SIGTERM", expect.any(Function))
  })

  it("forwards received signals and logs them", () => {
    const { handlerFor } = spyOnProcess()
    const onSignal = vi.fn()

    setupProcessHandlers({ logger, onSignal })

    handlerFor("SIGTERM")?.()
    handlerFor("SIGINT")?.()

    expect(onSignal.mock.calls).toStrictEqual([["SIGTERM"], ["SIGINT"]])
    expect(logger.info).toHaveBeenCalledWith("Received signal", { signal: "SIGTERM" })
  })

  it("unregister removes the handlers it installed", () => {
    const { off, handlerFor } = spyOnProcess()

    const { unregister } = setupProcessHandlers({ logger, onSignal: vi.fn() })

    unregister()

    expect(off).toHaveBeenCalledWith("SIGINT", handlerFor("SIGINT"))
    expect(off).toHaveBeenCalledWith("SIGTERM", handlerFor("SIGTERM"))
  })
})
