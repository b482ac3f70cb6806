import type { AvatarManager } from "@monogram/avatar"
import type { Logger } from "@monogram/logger"
import type { DisplayNameChange } from "../../users/model/user.model"
import type { UserDirectory } from "../../users/services/user-directory"

export type AvatarInvalidationDeps = {
  manager: AvatarManager
  users: UserDirectory
  logger: Logger
}

/**
 * Drops a user's cached placeholders whenever the directory reports a new
 * display name. Returns the unsubscribe function.
 */
export function subscribeAvatarInvalidation(deps: AvatarInvalidationDeps): () => void {
  const logger = deps.logger.child({ module: "avatar-invalidation" })

  return deps.users.onDisplayNameChanged(async (change: DisplayNameChange) => {
    const avatar = await deps.manager.getAvatar(change.userId)
    await avatar.userChanged("displayName", change.oldValue, change.newValue)

    logger.debug("Invalidated avatar after display name change", { userId: change.userId })
  })
}
