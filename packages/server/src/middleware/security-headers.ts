import type { Middleware } from "../types/middleware"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

export type FrameOptions = "DENY" | "SAMEORIGIN"

export type CrossOriginResourcePolicy = "same-origin" | "same-site" | "cross-origin"

/**
 * Baseline security headers. Headers a handler already set are left alone.
 *
 * @see {@link https://owasp.org/www-project-secure-headers | OWASP Secure Headers Project}
 */
export interface SecurityHeadersConfig {
  /** @default true */
  contentTypeOptions?: boolean

  /** @default "DENY" */
  frameOptions?: false | FrameOptions

  /** @default "no-referrer" */
  referrerPolicy?: false | string

  /**
   * Images are usually embedded by other origins, hence the permissive default.
   * @default "cross-origin"
   */
  crossOriginResourcePolicy?: false | CrossOriginResourcePolicy
}

type HeaderPolicy = { key: string; value: string | null }

function orNull<T extends string>(value: false | T | undefined, fallback: T): T | null {
  if (value === false) return null
  return value ?? fallback
}

export function securityHeadersMiddleware(config: SecurityHeadersConfig = {}): Middleware {
  const policies: HeaderPolicy[] = [
    {
      key: "X-Content-Type-Options",
      value: config.contentTypeOptions === false ? null : "nosniff",
    },
    { key: "X-Frame-Options", value: orNull(config.frameOptions, "DENY") },
    { key: "Referrer-Policy", value: orNull(config.referrerPolicy, "no-referrer") },
    {
      key: "Cross-Origin-Resource-Policy",
      value: orNull(config.crossOriginResourcePolicy, "cross-origin"),
    },
  ]

  return async (c, next) => {
    await next()

    for (const { key, value } of policies) {
      setHeaderIfMissing(c.res.headers, key, value)
    }
  }
}
