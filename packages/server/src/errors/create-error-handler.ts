import type { ErrorCode } from "@monogram/errors"
import type { Logger } from "@monogram/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import type { StatusCode } from "../http/status-codes"
import { resolveRoute } from "../middleware/utils/resolve-route"
import type { ErrorHandling } from "../server/server-options"
import { createErrorFormatter, type ErrorMappingsConfig } from "./error-formatter"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(handling: ErrorHandling, logger: Logger): ErrorHandler {
  return handling.kind === "handler"
    ? handling.errorHandler
    : buildErrorHandler(handling.config, logger)
}

export type CreateErrorHandlerFn = typeof createErrorHandler

function buildErrorHandler(mappings: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const formatter = createErrorFormatter(mappings, (err, error) => {
    logger.warn("Dropped error context that could not be transformed", {
      code: error.code,
      err,
    })
  })

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = formatter(err, requestId)

    logError(c.get("logger") ?? logger, err, {
      requestId,
      method: c.req.method,
      route: resolveRoute(c),
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, { status: response.error.status })
  }
}

type ErrorLogMeta = {
  requestId: string
  method: string
  route: string
  status: StatusCode
  code: ErrorCode
}

/**
 * Error logging policy:
 * - 5xx => error with `err`
 * - 4xx => info without `err`, debug with `err`
 */
function logError(logger: Logger, err: unknown, meta: ErrorLogMeta): void {
  const base = { ...meta, op: `${meta.method} ${meta.route}` }

  if (meta.status >= 500) {
    logger.error("Request failed", { ...base, err })
    return
  }

  logger.info("Request failed", base)
  logger.debug("Request failed details", { ...base, err })
}
