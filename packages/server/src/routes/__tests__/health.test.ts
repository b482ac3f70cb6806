import { Hono } from "hono"
import type { ReadinessCheck } from "../../server/server-options"
import { registerHealthRoutes, runCheckWithTimeout } from "../health"

function healthApp(
  isReady: () => boolean,
  readinessChecks: ReadinessCheck[] = [],
): Hono {
  const app = new Hono()

  registerHealthRoutes(
    app,
    {
      enabled: true,
      livenessPath: "/health/live",
      readinessPath: "/health/ready",
      readinessChecks,
      checkTimeoutMs: 50,
    },
    isReady,
  )

  return app
}

describe("health routes", () => {
  it("answers liveness without caching", async () => {
    const res = await healthApp(() => false).request("/health/live")

    expect(res.status).toBe(200)
    expect(await res.json()).toStrictEqual({ ok: true })
    expect(res.headers.get("cache-control")).toBe("no-store, no-cache, must-revalidate")
  })

  it("reports starting until the server is ready", async () => {
    const res = await healthApp(() => false).request("/health/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toStrictEqual({ ok: false, reason: "starting" })
  })

  it("is ready when every check passes", async () => {
    const res = await healthApp(() => true, [
      { name: "store", fn: async () => true },
    ]).request("/health/ready")

    expect(res.status).toBe(200)
    expect(await res.json()).toStrictEqual({ ok: true })
  })

  it("names the first failing check", async () => {
    const later = vi.fn(async () => true)
    const res = await healthApp(() => true, [
      { name: "store", fn: async () => false },
      { name: "later", fn: later },
    ]).request("/health/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toStrictEqual({ ok: false, reason: "store" })
    expect(later).not.toHaveBeenCalled()
  })

  it("registers nothing when disabled", async () => {
    const app = new Hono()
    registerHealthRoutes(app, { enabled: false }, () => true)

    expect((await app.request("/health/live")).status).toBe(404)
  })
})

describe("runCheckWithTimeout", () => {
  it("reports a throwing check as an error", async () => {
    const outcome = await runCheckWithTimeout(
      {
        name: "store",
        fn: async () => {
          throw new Error("disk gone")
        },
      },
      50,
    )

    expect(outcome).toStrictEqual({ ok: false, reason: "store:error" })
  })

  it("reports a check that outlives its timeout", async () => {
    const outcome = await runCheckWithTimeout(
      { name: "slow", fn: () => new Promise<boolean>(() => undefined) },
      10,
    )

    expect(outcome).toStrictEqual({ ok: false, reason: "slow:timeout" })
  })
})
