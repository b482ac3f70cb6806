import type { Hono } from "hono"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

export type CheckOutcome = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Hono,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, { headers: NO_CACHE_HEADERS }))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) {
      return c.json(
        { ok: false, reason: "starting" },
        { status: 503, headers: NO_CACHE_HEADERS },
      )
    }

    for (const check of config.readinessChecks) {
      const res = await runCheckWithTimeout(check, check.timeoutMs ?? config.checkTimeoutMs)

      if (!res.ok) {
        return c.json(
          { ok: false, reason: res.reason },
          { status: 503, headers: NO_CACHE_HEADERS },
        )
      }
    }

    return c.json({ ok: true }, { headers: NO_CACHE_HEADERS })
  })
}

/**
 * A check that throws or outlives its timeout counts as failed;
 * the reason names the check and, for those two cases, why.
 */
export async function runCheckWithTimeout(
  check: ReadinessCheck,
  timeoutMs: number,
): Promise<CheckOutcome> {
  const controller = new AbortController()
  const timeout = new Promise<"timeout">((resolve) => {
    controller.signal.addEventListener("abort", () => resolve("timeout"), { once: true })
  })
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const result = await Promise.race([check.fn(controller.signal), timeout])

    if (result === "timeout") return { ok: false, reason: `${check.name}:timeout` }

    return result ? { ok: true } : { ok: false, reason: check.name }
  } catch {
    const suffix = controller.signal.aborted ? "timeout" : "error"
    return { ok: false, reason: `${check.name}:${suffix}` }
  } finally {
    clearTimeout(timer)
  }
}
