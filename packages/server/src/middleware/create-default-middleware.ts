import type { Logger } from "@monogram/logger"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Middleware } from "../types/middleware"
import { headerSuppressionMiddleware } from "./header-suppression"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"
import { securityHeadersMiddleware } from "./security-headers"

export function createDefaultMiddleware(
  options: ResolvedServerOptions,
  logger: Logger,
): Middleware[] {
  const middleware: Middleware[] = [headerSuppressionMiddleware()]

  if (options.securityHeaders !== false) {
    middleware.push(securityHeadersMiddleware(options.securityHeaders))
  }

  if (options.requestId.enabled) {
    middleware.push(requestIdMiddleware(options.requestId))
  }

  middleware.push(requestLoggerMiddleware(logger))

  if (options.requestLogging.enabled) {
    middleware.push(requestLoggingMiddleware(options.requestLogging, logger))
  }

  return middleware
}

export type CreateDefaultMiddlewareFn = typeof createDefaultMiddleware
