import { BaseError, type ErrorContext } from "@monogram/errors"
import { type $ZodError, type $ZodType, safeParse } from "zod/v4/core"

export type ValidationIssue = { path: string; message: string }
export type ValidationErrorContext = ErrorContext & {
  issues: ValidationIssue[]
}

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  static fromZodError(err: $ZodError): ValidationError {
    const issues = err.issues.map((i) => ({
      path: formatPath(i.path),
      message: i.message,
    }))

    const message = issues[0]?.message ?? "Invalid input"

    return new ValidationError(message, {
      code: "validation_error",
      context: { issues },
    })
  }
}

/** Parses with any zod schema (classic or mini), throwing `ValidationError` on failure. */
export function parseOrThrow<T>(schema: $ZodType<T>, data: unknown): T {
  const result = safeParse(schema, data)

  if (!result.success) {
    throw ValidationError.fromZodError(result.error)
  }

  return result.data
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError && Array.isArray(err.context["issues"])
}
