import type { Logger } from "@monogram/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error) => void) => unknown
}

export type ShutdownContext = {
  server: Closeable
  now: () => number
  logger: Logger
  deadlineMs: number
  stopHooks: LifecycleHook[]
}

export type StopResult = {
  /** No failures and no timeout. */
  ok: boolean

  /** Hooks that threw during shutdown. */
  failures: HookFailure[]

  /**
   * The deadline passed before every hook ran. Open sockets are not force-closed.
   */
  timedOut: boolean
}

/** Closes the listener first, then runs stop hooks; every hook gets its turn. */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const hooks: LifecycleHook[] = [createCloseServerHook(ctx.server), ...ctx.stopHooks]

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", now: ctx.now, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    hooks,
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete", { failureCount: failures.length, timedOut })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function createCloseServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: async ({ signal }) => {
      const res = await closeServerUntilAborted(server, signal)

      if (res.aborted) return
      if (res.error) throw res.error
    },
  }
}

function closeServerOnce(server: Closeable): Promise<{ error?: Error }> {
  return new Promise((resolve) => {
    server.close((err) => resolve(err ? { error: err } : {}))
  })
}

const ABORTED = Symbol("aborted")

type CloseUntilAbortedResult = { aborted: true } | { aborted: false; error?: Error }

async function closeServerUntilAborted(
  server: Closeable,
  signal: AbortSignal,
): Promise<CloseUntilAbortedResult> {
  if (signal.aborted) return { aborted: true }

  let onAbort: (() => void) | undefined

  const abortedPromise = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED)
    signal.addEventListener("abort", onAbort, { once: true })
  })

  try {
    const res = await Promise.race([closeServerOnce(server), abortedPromise])

    if (res === ABORTED) return { aborted: true }

    return res.error ? { aborted: false, error: res.error } : { aborted: false }
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort)
  }
}
