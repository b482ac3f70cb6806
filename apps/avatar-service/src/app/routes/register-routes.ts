import { createRouter } from "@monogram/server"
import type { Hono } from "hono"
import { createAvatarsModule } from "../../domains/avatars/api"
import { createUsersModule } from "../../domains/users/api"
import type { AppConfig } from "../config"
import type { DomainServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Hono) => void
}

export function registerRoutes(app: Hono, config: AppConfig, services: DomainServices): void {
  const apiV1Router = createRouter()

  const modules: ApiModule[] = [
    createAvatarsModule({ avatars: services.avatars }),
    createUsersModule({ users: services.users }),
  ]

  for (const m of modules) {
    m.register(apiV1Router)
  }

  app.route("/api/v1", apiV1Router)
  app.get("/", (c) => c.text(`Welcome to ${config.logging.serviceName} API`))
}

export type RegisterRoutesFn = typeof registerRoutes
