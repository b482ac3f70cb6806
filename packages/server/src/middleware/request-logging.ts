import type { Logger } from "@monogram/logger"
import type { PathString, ResolvedRequestLoggingConfig } from "../server/server-options"
import type { Middleware } from "../types/middleware"
import { resolveRoute } from "./utils/resolve-route"

/**
 * Logs one line per completed request.
 *
 * Policy:
 * - 5xx => error
 * - else => config.level
 */
export function requestLoggingMiddleware(
  config: Extract<ResolvedRequestLoggingConfig, { enabled: true }>,
  baseLogger: Logger,
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (shouldIgnore(path, config.ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const durationMs = Math.round(performance.now() - start)

      const method = c.req.method
      const route = resolveRoute(c)
      const userAgent = c.req.header("user-agent")

      const meta = {
        requestId: c.get("requestId") ?? "unknown",
        method,
        path,
        route,
        op: `${method} ${route}`,
        status,
        durationMs,
        ...(userAgent !== undefined && { userAgent }),
      }

      const logger = c.get("logger") ?? baseLogger

      if (status >= 500) {
        logger.error("Request completed", meta)
      } else {
        logger[config.level]("Request completed", meta)
      }
    }
  }
}

function shouldIgnore(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
