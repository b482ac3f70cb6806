import type { AppError, ErrorCode } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for AppError. Structural, so errors from another copy of this
 * package are recognised too.
 *
 * @example
 * ```ts
 * if (isAppError(err)) logger.warn(err.message, { err })
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp)
  )
}

/**
 * Narrow an unknown error to an AppError carrying one of the given codes.
 */
export function hasErrorCode<C extends ErrorCode>(
  e: unknown,
  ...codes: readonly C[]
): e is AppError & { readonly code: C } {
  return isAppError(e) && codes.some((code) => code === e.code)
}
