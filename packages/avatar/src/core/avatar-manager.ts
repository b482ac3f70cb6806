import type { Logger } from "@monogram/logger"
import type { FolderStore } from "@monogram/storage"
import type { IdentityResolver } from "../ports/avatar-identity"
import type { RasterRenderer, VectorRenderer } from "../ports/renderer"
import { AvatarError } from "./avatar-error"
import { PLACEHOLDER_BASENAME } from "./avatar-path"
import { PlaceholderAvatar } from "./placeholder-avatar"

export type AvatarManagerDeps = {
  store: FolderStore
  identities: IdentityResolver
  vectorRenderer: VectorRenderer
  rasterRenderer: RasterRenderer
  logger: Logger
}

export class AvatarManager {
  constructor(private readonly deps: AvatarManagerDeps) {}

  /**
   * Placeholder avatar bound to the user's folder. The folder is created
   * on first use.
   */
  async getAvatar(userId: string): Promise<PlaceholderAvatar> {
    const identity = await this.deps.identities.findIdentity(userId)
    if (!identity) throw AvatarError.userNotFound(userId)

    const { folder } = await this.deps.store.newFolder(userId)

    return new PlaceholderAvatar({
      folder,
      identity,
      vectorRenderer: this.deps.vectorRenderer,
      rasterRenderer: this.deps.rasterRenderer,
      logger: this.deps.logger,
    })
  }

  /**
   * Delete the cached placeholders of every user. Returns how many files
   * were removed.
   */
  async clearCachedAvatars(): Promise<number> {
    let removed = 0

    for (const folder of await this.deps.store.listFolders()) {
      for (const file of await folder.list()) {
        if (!file.name.startsWith(PLACEHOLDER_BASENAME)) continue

        await file.delete()
        removed++
      }
    }

    this.deps.logger.info("Cleared cached avatar placeholders", {
      module: "avatar-manager",
      count: removed,
    })

    return removed
  }
}
