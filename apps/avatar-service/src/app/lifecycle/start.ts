import type { LifecycleHook } from "@monogram/server"
import { subscribeAvatarInvalidation } from "../../domains/avatars/services/avatar-invalidation"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { core, domains } = context.services

  return [
    {
      name: "start:store",
      fn: async () => {
        const folders = await context.infra.store.listFolders()
        core.logger.info("Avatar store ready", { count: folders.length, module: "store" })
      },
    },
    {
      name: "start:avatar-invalidation",
      fn: async () => {
        context.subscriptions.push(
          subscribeAvatarInvalidation({
            manager: domains.avatars.manager,
            users: domains.users.directory,
            logger: core.logger,
          }),
        )
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
