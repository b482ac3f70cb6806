import type { Logger } from "@monogram/logger"
import { type Mock, mockLogger } from "../../tests/mock"
import type { LifecycleHook } from "../lifecycle-hook"
import { runHooks } from "../run-hooks"

function hook(name: string, fn: LifecycleHook["fn"] = async () => undefined): LifecycleHook {
  return { name, fn: vi.fn(fn) }
}

describe("runHooks", () => {
  let logger: Mock<Logger>
  let nowMs: number

  beforeEach(() => {
    logger = mockLogger()
    nowMs = 1_000
  })

  const ctx = () => ({
    phase: "shutdown" as const,
    now: () => nowMs,
    logger,
    deadlineMs: 2_000,
  })

  it("runs every hook in order and passes the time left", async () => {
    const order: string[] = []
    const first = hook("first", async ({ timeRemainingMs }) => {
      order.push(`first:${timeRemainingMs}`)
      nowMs += 400
    })
    const second = hook("second", async ({ timeRemainingMs }) => {
      order.push(`second:${timeRemainingMs}`)
    })

    const result = await runHooks(ctx(), [first, second])

    expect(result).toStrictEqual({ failures: [], timedOut: false })
    expect(order).toStrictEqual(["first:1000", "second:600"])
    expect(logger.info).toHaveBeenCalledWith("Executed shutdown hook", { hook: "second" })
  })

  it("collects failures and keeps going without failFast", async () => {
    const error = new Error("flush failed")
    const last = hook("last")

    const result = await runHooks(ctx(), [
      hook("bad", async () => {
        throw error
      }),
      last,
    ])

    expect(result).toStrictEqual({ failures: [{ hook: "bad", error }], timedOut: false })
    expect(last.fn).toHaveBeenCalledOnce()
    expect(logger.error).toHaveBeenCalledWith("Shutdown hook failed", { hook: "bad", err: error })
  })

  it("stops at the first failure with failFast", async () => {
    const last = hook("last")

    const result = await runHooks(
      ctx(),
      [
        hook("bad", async () => {
          throw new Error("no")
        }),
        last,
      ],
      { failFast: true },
    )

    expect(result.failures).toHaveLength(1)
    expect(last.fn).not.toHaveBeenCalled()
  })

  it("skips the rest once the deadline has passed", async () => {
    const late = hook("late")

    const result = await runHooks(ctx(), [
      hook("slow", async () => {
        nowMs = 2_500
      }),
      late,
    ])

    expect(result).toStrictEqual({ failures: [], timedOut: true })
    expect(late.fn).not.toHaveBeenCalled()
    expect(logger.warn).toHaveBeenCalledWith("Shutdown deadline exceeded during hook", {
      hook: "slow",
    })
  })

  it("does not start hooks when no time is left", async () => {
    nowMs = 2_000
    const never = hook("never")

    const result = await runHooks(ctx(), [never])

    expect(result).toStrictEqual({ failures: [], timedOut: true })
    expect(never.fn).not.toHaveBeenCalled()
  })
})
