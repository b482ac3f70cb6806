import { fileURLToPath } from "node:url"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes/register-routes"
import { type AppServices, createDefaultDomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createInfraServices, type InfraServices } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  /** Directory relative config paths resolve against. Defaults to the service root. */
  cwd?: string
  coreOverrides?: Partial<CoreServices>
  infraOverrides?: Partial<InfraServices>
}

export type AppContext = {
  config: AppConfig
  infra: InfraServices
  services: AppServices
  /** Unsubscribe functions registered by start hooks, drained by stop hooks. */
  subscriptions: Array<() => void>
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

const projectRoot = fileURLToPath(new URL("../../", import.meta.url))

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.cwd ?? projectRoot)

  const core: CoreServices = { ...createCoreServices(config), ...options.coreOverrides }
  const infra: InfraServices = { ...createInfraServices(config), ...options.infraOverrides }

  const domains = await createDefaultDomainServices(config, infra, core)

  return {
    config,
    infra,
    services: { core, domains },
    subscriptions: [],
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}

