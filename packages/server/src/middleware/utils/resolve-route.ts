import type { Context } from "hono"
import { routePath } from "hono/route"
import { isNonEmptyString } from "./is-non-empty-string"

/** Matched route pattern (`/avatars/:userId`), or the raw path when nothing matched. */
export function resolveRoute(c: Context): string {
  const route = routePath(c)
  return isNonEmptyString(route) && route !== "/*" ? route : c.req.path
}
