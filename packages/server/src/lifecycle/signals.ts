import type { Logger } from "@monogram/logger"
import type { StopResult } from "./shutdown"

/** The subset of `process` the handlers attach to. */
export interface SignalTarget {
  on(event: string, listener: (arg: unknown) => void): unknown
  off(event: string, listener: (arg: unknown) => void): unknown
}

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
  /** @default process */
  target?: SignalTarget
}

export interface SignalHandler {
  unregister: () => void
}

type State = { stopping: boolean }

type Resolved = Required<Pick<SignalHandlerContext, "exit" | "fatalTimeoutMs">> &
  SignalHandlerContext

function handleSignal(ctx: Resolved, state: State, signal: NodeJS.Signals): void {
  ctx.logger.info("Received signal", { signal })

  if (state.stopping) return
  state.stopping = true

  ctx.logger.warn("Shutdown triggered", { reason: signal })

  void runStop(ctx, signal)
}

function handleFatal(ctx: Resolved, state: State, reason: string, err: unknown): void {
  if (state.stopping) {
    ctx.logger.fatal("Fatal error during shutdown", { reason, err })
    ctx.exit(1)
    return
  }

  state.stopping = true

  void fatalShutdown(ctx, reason, err)
}

async function fatalShutdown(ctx: Resolved, reason: string, err: unknown): Promise<void> {
  ctx.logger.fatal("Fatal error", { reason, err })

  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs: ctx.fatalTimeoutMs })
    ctx.exit(1)
  }, ctx.fatalTimeoutMs)

  timer.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(timer)
  }

  ctx.exit(1)
}

/** Never rejects; outcomes are logged. */
async function runStop(ctx: Resolved, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}

/**
 * SIGINT/SIGTERM stop the server gracefully; uncaught exceptions and
 * unhandled rejections stop it and exit with code 1.
 */
export function setupProcessHandlers(context: SignalHandlerContext): SignalHandler {
  const ctx: Resolved = {
    ...context,
    fatalTimeoutMs: context.fatalTimeoutMs ?? 10_000,
    exit: context.exit ?? ((code) => process.exit(code)),
  }

  const target = context.target ?? process
  const state: State = { stopping: false }

  const sigintHandler = () => handleSignal(ctx, state, "SIGINT")
  const sigtermHandler = () => handleSignal(ctx, state, "SIGTERM")
  const uncaughtHandler = (err: unknown) => handleFatal(ctx, state, "uncaughtException", err)
  const rejectionHandler = (reason: unknown) =>
    handleFatal(ctx, state, "unhandledRejection", reason)

  target.on("SIGINT", sigintHandler)
  target.on("SIGTERM", sigtermHandler)
  target.on("uncaughtException", uncaughtHandler)
  target.on("unhandledRejection", rejectionHandler)

  return {
    unregister: () => {
      target.off("SIGINT", sigintHandler)
      target.off("SIGTERM", sigtermHandler)
      target.off("uncaughtException", uncaughtHandler)
      target.off("unhandledRejection", rejectionHandler)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers
