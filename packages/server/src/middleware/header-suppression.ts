import type { Middleware } from "../types/middleware"

const SUPPRESSED = ["X-Powered-By", "Server"] as const

/** Removes headers that leak server implementation details. */
export function headerSuppressionMiddleware(): Middleware {
  return async (c, next) => {
    await next()

    for (const h of SUPPRESSED) c.res.headers.delete(h)
  }
}
