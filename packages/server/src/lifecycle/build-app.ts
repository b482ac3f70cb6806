import { Hono } from "hono"
import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Middleware } from "../types/middleware"

export interface BuildAppContext {
  options: ResolvedServerOptions
  isReady: () => boolean
  errorHandler: ErrorHandler
  defaultMiddleware: Middleware[]
  app?: Hono
}

/**
 * Wires an application in a fixed order: default middleware, `pre`,
 * health routes, app routes, `post`, then the error handler.
 */
export function buildApp(ctx: BuildAppContext): Hono {
  const { options } = ctx
  const app = ctx.app ?? new Hono()

  applyMiddleware(app, ctx.defaultMiddleware)
  applyMiddleware(app, options.middleware.pre)

  registerHealthRoutes(app, options.health, ctx.isReady)
  options.routes(app)

  applyMiddleware(app, options.middleware.post)

  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp

function applyMiddleware(app: Hono, middleware: Middleware[]): void {
  for (const mw of middleware) app.use("*", mw)
}
