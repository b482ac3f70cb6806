import { createServer, type LifecycleHook, type Server } from "@monogram/server"
import type { Hono } from "hono"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  app: Hono
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)
  const { core, domains } = ctx.services

  const server = createServer(
    { logger: core.logger },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorHandling: {
        kind: "mappings",
        config: {
          mappings: {
            avatar_not_found: { status: 404, message: "Avatar not found" },
            user_not_found: { status: 404, message: "User not found" },
            validation_error: { status: 400, message: "Invalid request" },
            store_invalid_name: { status: 400, message: "Invalid user id" },
            store_not_permitted: { status: 403, message: "Avatar storage refused the operation" },
            avatar_rendering_failed: { status: 500, message: "Avatar could not be rendered" },
          },
          transformContext: (error) =>
            error.code === "validation_error" ? { issues: error.context["issues"] } : undefined,
        },
      },

      requestId: {
        enabled: true,
        header: ctx.config.requestId.header,
      },

      requestLogging: ctx.config.requestLogging.enabled
        ? { enabled: true, level: ctx.config.requestLogging.level }
        : { enabled: false },

      health: {
        enabled: true,
        readinessChecks: [
          {
            name: "store",
            fn: async () => {
              await ctx.infra.store.listFolders()
              return true
            },
          },
        ],
      },

      routes: (app: Hono): void => {
        ctx.registerRoutes(app, ctx.config, domains)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}
