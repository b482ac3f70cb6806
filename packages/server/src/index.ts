export type { ServerContextVariables } from "./types/context"
export type { Middleware } from "./types/middleware"
export type { StatusCode } from "./http/status-codes"
export {
  createErrorFormatter,
  DEFAULT_FALLBACK,
  type ErrorContextTransformer,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorResponseBody,
  type FallbackMapping,
} from "./errors/error-formatter"
export { ServerError, type ServerErrorCode } from "./errors/server-error"
export { createErrorHandler, type ErrorHandler } from "./errors/create-error-handler"
export {
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./errors/validation"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { HookFailure, LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export { securityHeadersMiddleware, type SecurityHeadersConfig } from "./middleware/security-headers"
export { createRouter, createServer, Server, type ServerState } from "./server/server"
export type {
  ErrorHandling,
  HealthConfig,
  HealthSettings,
  PathString,
  ReadinessCheck,
  RequestIdConfig,
  RequestIdSettings,
  RequestLoggingConfig,
  RequestLoggingSettings,
  ServerDependencies,
  ServerOptions,
  Toggle,
} from "./server/server-options"
