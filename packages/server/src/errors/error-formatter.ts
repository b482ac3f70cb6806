import { type AppError, type ErrorCode, isAppError } from "@monogram/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /**
   * User-facing error message.
   *
   * @remarks
   * Should not expose sensitive information.
   */
  message: string
}

export type FallbackMapping = ErrorMapping & {
  code: ErrorCode
}

export type ErrorContextTransformer = (
  error: AppError,
) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /**
   * Map of error code to status/message.
   * Unmapped AppErrors use fallback status/message but keep their own code.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** Fallback for unmapped or unknown errors. */
  fallback?: FallbackMapping

  /**
   * Picks the parts of an error's context that go into the response body.
   * Returning undefined leaves the body without extra fields.
   */
  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

/** Called when `transformContext` throws; the response then carries no extra fields. */
export type TransformFailureListener = (err: unknown, error: AppError) => void

export const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

/**
 * Maps thrown values to the JSON error envelope.
 *
 * @remarks
 * - Mapped `AppError`s use their configured status/message
 * - Unmapped `AppError`s keep their code but use fallback status/message
 * - Anything else uses the fallback entirely
 */
export function createErrorFormatter(
  config: ErrorMappingsConfig,
  onTransformFailure?: TransformFailureListener,
): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error: unknown, requestId: string): ErrorResponse => {
    if (isAppError(error)) {
      const mapping = config.mappings[error.code]
      const extra = extractExtraContext(config, error, onTransformFailure)

      return {
        error: {
          ...extra,
          code: error.code,
          status: mapping?.status ?? fallback.status,
          message: mapping?.message ?? fallback.message,
          requestId,
        },
      }
    }

    return {
      error: {
        code: fallback.code,
        status: fallback.status,
        message: fallback.message,
        requestId,
      },
    }
  }
}

function extractExtraContext(
  config: ErrorMappingsConfig,
  error: AppError,
  onTransformFailure: TransformFailureListener | undefined,
): Record<string, unknown> | undefined {
  if (!config.transformContext) return undefined

  try {
    return config.transformContext(error)
  } catch (err) {
    onTransformFailure?.(err, error)
    return undefined
  }
}
