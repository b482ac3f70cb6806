import type { Logger } from "@monogram/logger"
import type { Middleware } from "../types/middleware"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Binds a child logger carrying the request ID onto the context. */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    if (!c.get("logger")) {
      const requestId = c.get("requestId")
      const bindings = isNonEmptyString(requestId) ? { requestId } : {}

      c.set("logger", baseLogger.child(bindings))
    }

    await next()
  }
}
