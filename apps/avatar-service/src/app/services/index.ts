import { type AvatarServices, createAvatarServices } from "../../domains/avatars/composition"
import { createUserServices, type UserServices } from "../../domains/users/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraServices } from "./infra"

export type DomainServices = {
  users: UserServices
  avatars: AvatarServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export async function createDefaultDomainServices(
  config: AppConfig,
  infra: InfraServices,
  core: CoreServices,
): Promise<DomainServices> {
  const users = await createUserServices(config, core)
  const avatars = createAvatarServices(config, core, infra, users.directory)

  return { users, avatars }
}
