import type { Logger } from "@monogram/logger"
import type { ResolvedServerOptions } from "../server/server-options"
import type { LifecycleHook } from "./lifecycle-hook"
import type { Closeable, ShutdownFn, StopResult } from "./shutdown"

export interface ServerHandle {
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface RunningServerContext {
  server: Closeable
  logger: Logger
  now: () => number
  options: ResolvedServerOptions
  stopHooks: LifecycleHook[]

  setReady: (value: boolean) => void
  onStop: () => void
  shutdown: ShutdownFn
}

/** Repeated `stop()` calls share the first shutdown. */
export function createStopper(ctx: RunningServerContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    stop: () => {
      stopping ??= runShutdown(ctx)
      return stopping
    },
    address: {
      host: ctx.options.host,
      port: ctx.options.port,
    },
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: RunningServerContext): Promise<StopResult> {
  ctx.setReady(false)

  try {
    return await ctx.shutdown({
      server: ctx.server,
      now: ctx.now,
      logger: ctx.logger,
      deadlineMs: ctx.now() + ctx.options.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
