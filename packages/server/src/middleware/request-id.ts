import type { Context } from "hono"
import type { RequestIdSettings, ResolvedRequestIdConfig } from "../server/server-options"
import type { Middleware } from "../types/middleware"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

function resolveRequestId(c: Context, config: Required<RequestIdSettings>): string {
  const existing = c.get("requestId")
  if (isNonEmptyString(existing)) return existing

  const fromHeader = c.req.header(config.header)
  if (isNonEmptyString(fromHeader)) return fromHeader

  return config.generate()
}

/**
 * Takes the request ID from the configured header (or generates one),
 * puts it on the context and echoes it on the response.
 */
export function requestIdMiddleware(
  config: Extract<ResolvedRequestIdConfig, { enabled: true }>,
): Middleware {
  const headerName = config.header.toLowerCase()

  return async (c, next) => {
    const requestId = resolveRequestId(c, config)

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, headerName, requestId)
  }
}
