import type { Logger } from "@monogram/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  now: () => number
  logger: Logger
  deadlineMs: number
}

export type RunHooksPolicy = {
  /** Stop after the first failure (startup). */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

/** Runs hooks in order against a shared deadline. */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runOneHook(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)
      if (policy.failFast) return { failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runOneHook(
  ctx: RunHooksContext,
  hook: LifecycleHook,
): Promise<{ failure?: HookFailure; timedOut: boolean }> {
  const msLeft = timeLeftMs(ctx)

  if (msLeft <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`)
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), msLeft)

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: msLeft })

    if (didHitDeadline(ctx, controller)) {
      ctx.logger.warn(`${capitalize(ctx.phase)} deadline exceeded during hook`, {
        hook: hook.name,
      })
      return { timedOut: true }
    }

    ctx.logger.info(`Executed ${ctx.phase} hook`, { hook: hook.name })

    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${capitalize(ctx.phase)} hook failed`, { hook: hook.name, err })

    const failure: HookFailure = { hook: hook.name, error: err }

    return { failure, timedOut: didHitDeadline(ctx, controller) }
  } finally {
    clearTimeout(timeoutId)
  }
}

function didHitDeadline(ctx: RunHooksContext, controller: AbortController): boolean {
  return controller.signal.aborted || ctx.now() >= ctx.deadlineMs
}

function timeLeftMs(ctx: RunHooksContext): number {
  return Math.max(0, ctx.deadlineMs - ctx.now())
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1)
}
