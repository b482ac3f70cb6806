import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import { UserDirectory } from "../services/user-directory"
import { readUsersFile } from "../services/users-file"

export type UserServices = {
  directory: UserDirectory
}

export async function createUserServices(
  config: AppConfig,
  core: CoreServices,
): Promise<UserServices> {
  const seed = await readUsersFile(config.users.file)
  const directory = new UserDirectory({ logger: core.logger }, seed)

  core.logger.info("Loaded user directory", { count: directory.size, module: "users" })

  return { directory }
}
