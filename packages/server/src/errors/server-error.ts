import { BaseError } from "@monogram/errors"
import type { HookFailure } from "../lifecycle/lifecycle-hook"

export type ServerErrorCode = "server_already_started" | "server_startup_failed"

export class ServerError extends BaseError<ServerErrorCode> {
  static alreadyStarted(): ServerError {
    return new ServerError("Server already started", {
      code: "server_already_started",
      isOperational: false,
    })
  }

  /** The first failed hook becomes the cause. */
  static startupFailed(failures: readonly HookFailure[], timedOut: boolean): ServerError {
    return new ServerError(timedOut ? "Startup timed out" : "Startup hook failed", {
      code: "server_startup_failed",
      context: { hooks: failures.map((f) => f.hook), timedOut },
      cause: failures[0]?.error,
      isOperational: false,
    })
  }
}
