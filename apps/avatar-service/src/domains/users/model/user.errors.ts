import { BaseError } from "@monogram/errors"

export type UserErrorCode = "user_not_found" | "users_file_invalid"

export class UserError extends BaseError<UserErrorCode> {
  static notFound(userId: string): UserError {
    return new UserError(`User ${userId} does not exist`, {
      code: "user_not_found",
      context: { userId },
    })
  }

  static invalidUsersFile(file: string, details: string, cause?: unknown): UserError {
    return new UserError(`Invalid users file ${file}: ${details}`, {
      code: "users_file_invalid",
      context: { file },
      cause,
      isOperational: false,
    })
  }
}
