import { Hono } from "hono"
import { requestIdMiddleware } from "../request-id"

function appWithRequestId(generate: () => string): Hono {
  const app = new Hono()

  app.use("*", requestIdMiddleware({ enabled: true, header: "X-Request-Id", generate }))
  app.get("/", (c) => c.text(c.get("requestId")))

  return app
}

describe("requestIdMiddleware", () => {
  it("takes the id from the configured header", async () => {
    const generate = vi.fn(() => "generated")

    const res = await appWithRequestId(generate).request("/", {
      headers: { "x-request-id": "hdr-123" },
    })

    expect(await res.text()).toBe("hdr-123")
    expect(res.headers.get("x-request-id")).toBe("hdr-123")
    expect(generate).not.toHaveBeenCalled()
  })

  it("generates an id when the header is missing or blank", async () => {
    const app = appWithRequestId(() => "generated")

    const missing = await app.request("/")
    const blank = await app.request("/", { headers: { "x-request-id": "  " } })

    expect(await missing.text()).toBe("generated")
    expect(missing.headers.get("x-request-id")).toBe("generated")
    expect(await blank.text()).toBe("generated")
  })

  it("keeps an id set earlier in the chain", async () => {
    const app = new Hono()

    app.use("*", async (c, next) => {
      c.set("requestId", "upstream")
      await next()
    })
    app.use("*", requestIdMiddleware({ enabled: true, header: "x-request-id", generate: () => "generated" }))
    app.get("/", (c) => c.text(c.get("requestId")))

    const res = await app.request("/", { headers: { "x-request-id": "hdr" } })

    expect(await res.text()).toBe("upstream")
    expect(res.headers.get("x-request-id")).toBe("upstream")
  })

  it("does not overwrite a response header the handler set", async () => {
    const app = new Hono()

    app.use("*", requestIdMiddleware({ enabled: true, header: "x-request-id", generate: () => "generated" }))
    app.get("/", (c) => {
      c.header("x-request-id", "handler")
      return c.text("ok")
    })

    const res = await app.request("/")

    expect(res.headers.get("x-request-id")).toBe("handler")
  })
})
