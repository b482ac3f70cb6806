import { randomUUID } from "node:crypto"
import type { Logger, LogLevelName } from "@monogram/logger"
import type { Hono } from "hono"
import type { ErrorHandler } from "../errors/create-error-handler"
import type { ErrorMappingsConfig } from "../errors/error-formatter"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { SecurityHeadersConfig } from "../middleware/security-headers"
import type { Middleware } from "../types/middleware"

export type PathString = `/${string}`

/** An optional server feature: switched off, or on with partial settings. */
export type Toggle<T> = { enabled: false } | ({ enabled: true } & T)

/** A toggle after defaults were applied. */
export type ResolvedToggle<T> = { enabled: false } | ({ enabled: true } & Required<T>)

export interface ServerDependencies {
  logger: Logger

  /** Wall clock in epoch milliseconds. Defaults to `Date.now`. */
  now?: () => number
}

export interface RequestIdSettings {
  /** @default "x-request-id" */
  header?: string

  /** @default crypto.randomUUID */
  generate?: () => string
}

export interface RequestLoggingSettings {
  /** 5xx responses log at `error` whatever this says. @default "info" */
  level?: LogLevelName

  /** Exact paths, or prefixes of nested paths. Defaults to the health routes. */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: number
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface HealthSettings {
  /** @default "/health/live" */
  livenessPath?: PathString

  /** @default "/health/ready" */
  readinessPath?: PathString

  /** Run in order on every readiness request; the first failure answers 503. */
  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: number
}

export type RequestIdConfig = Toggle<RequestIdSettings>
export type RequestLoggingConfig = Toggle<RequestLoggingSettings>
export type HealthConfig = Toggle<HealthSettings>

export type ResolvedRequestIdConfig = ResolvedToggle<RequestIdSettings>
export type ResolvedRequestLoggingConfig = ResolvedToggle<RequestLoggingSettings>
export type ResolvedHealthConfig = ResolvedToggle<HealthSettings>

export type ErrorHandling =
  | { kind: "handler"; errorHandler: ErrorHandler }
  | { kind: "mappings"; config: ErrorMappingsConfig }

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** Budget for all start hooks together. Unbounded by default. */
  startupTimeoutMs?: number

  /**
   * Budget for closing the listener and running stop hooks.
   * @default 10_000
   */
  shutdownTimeoutMs?: number

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  /** `false` sends none of them. */
  securityHeaders?: SecurityHeadersConfig | false

  errorHandling: ErrorHandling

  routes: (app: Hono) => void

  /** `pre` runs before the health routes, `post` after the app routes. */
  middleware?: {
    pre?: Middleware[]
    post?: Middleware[]
  }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: number
  shutdownTimeoutMs: number
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  securityHeaders: SecurityHeadersConfig | false
  errorHandling: ErrorHandling
  routes: (app: Hono) => void
  middleware: { pre: Middleware[]; post: Middleware[] }
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

// Largest delay setTimeout accepts.
const MAX_TIMER_MS = 2_147_483_647

const DEFAULTS = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    header: "x-request-id",
    generate: () => randomUUID(),
  },
  requestLogging: {
    level: "info",
  },
  health: {
    livenessPath: "/health/live",
    readinessPath: "/health/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
} satisfies {
  host: string
  startupTimeoutMs: number
  shutdownTimeoutMs: number
  requestId: Required<RequestIdSettings>
  requestLogging: Pick<Required<RequestLoggingSettings>, "level">
  health: Required<HealthSettings>
}

/** Features left unset are on, with their defaults. */
function resolveToggle<T extends object>(
  given: Toggle<T> | undefined,
  defaults: Required<T>,
): ResolvedToggle<T> {
  if (given?.enabled === false) return { enabled: false }

  return { ...defaults, ...given, enabled: true }
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveToggle<HealthSettings>(options.health, {
    ...DEFAULTS.health,
    readinessChecks: [],
  })

  const requestLogging = resolveToggle<RequestLoggingSettings>(options.requestLogging, {
    level: DEFAULTS.requestLogging.level,
    ignorePaths: health.enabled ? [health.livenessPath, health.readinessPath] : [],
  })

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveToggle<RequestIdSettings>(options.requestId, DEFAULTS.requestId),
    requestLogging,
    health,
    securityHeaders: options.securityHeaders ?? {},
    errorHandling: options.errorHandling,
    routes: options.routes,
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}
