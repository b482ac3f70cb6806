import { BaseError } from "@monogram/errors"

export type AvatarErrorCode = "avatar_not_found" | "avatar_rendering_failed" | "user_not_found"

export class AvatarError extends BaseError<AvatarErrorCode> {
  static notFound(input: { userId: string; size: number; cause?: unknown }): AvatarError {
    return new AvatarError(`No avatar of size ${input.size} for user ${input.userId}`, {
      code: "avatar_not_found",
      context: { userId: input.userId, size: input.size },
      cause: input.cause,
    })
  }

  static renderingFailed(input: { size: number; cause: unknown }): AvatarError {
    return new AvatarError(`Could not render a ${input.size}px avatar`, {
      code: "avatar_rendering_failed",
      context: { size: input.size },
      cause: input.cause,
      isOperational: false,
    })
  }

  static userNotFound(userId: string): AvatarError {
    return new AvatarError(`User ${userId} does not exist`, {
      code: "user_not_found",
      context: { userId },
    })
  }
}
