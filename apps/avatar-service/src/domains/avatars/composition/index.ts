import { AvatarManager, SharpRasterRenderer, SharpVectorRenderer } from "@monogram/avatar"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraServices } from "../../../app/services/infra"
import type { UserDirectory } from "../../users/services/user-directory"

export type AvatarServices = {
  manager: AvatarManager
  maxSize: number
  cacheMaxAgeSeconds: number
}

export function createAvatarServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
  users: UserDirectory,
): AvatarServices {
  const manager = new AvatarManager({
    store: infra.store,
    identities: users,
    vectorRenderer: new SharpVectorRenderer({ logger: core.logger }),
    rasterRenderer: new SharpRasterRenderer(),
    logger: core.logger,
  })

  return {
    manager,
    maxSize: config.avatars.maxSize,
    cacheMaxAgeSeconds: config.avatars.cacheMaxAgeSeconds,
  }
}
