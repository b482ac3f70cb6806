import { hasErrorCode } from "@monogram/errors"
import type { Logger } from "@monogram/logger"
import type { StoreData, StoreFile, StoreFolder } from "@monogram/storage"
import type { Avatar, AvatarTheme } from "../ports/avatar"
import type { AvatarIdentity } from "../ports/avatar-identity"
import type { RasterRenderer, RenderRequest, VectorRenderer } from "../ports/renderer"
import { AvatarError } from "./avatar-error"
import { resolveAvatarPath } from "./avatar-path"

export type PlaceholderAvatarDeps = {
  /** The user's own folder; never shared between users. */
  folder: StoreFolder
  identity: AvatarIdentity
  vectorRenderer: VectorRenderer
  rasterRenderer: RasterRenderer
  logger: Logger
}

/**
 * Initials avatar generated on the first request for a size and theme,
 * then served from the user's folder until invalidated.
 */
export class PlaceholderAvatar implements Avatar {
  readonly kind = "placeholder"

  private readonly logger: Logger
  private readonly userId: string

  constructor(private readonly deps: PlaceholderAvatarDeps) {
    this.userId = deps.identity.getUniqueId()
    this.logger = deps.logger.child({ module: "placeholder-avatar", userId: this.userId })
  }

  async exists(): Promise<boolean> {
    return true
  }

  async getFile(size: number, darkTheme = false): Promise<StoreFile> {
    const theme: AvatarTheme = darkTheme ? "dark" : "light"
    const cacheKey = resolveAvatarPath(size, theme)

    const cached = await this.deps.folder.getFile(cacheKey)
    if (cached.kind === "found") return cached.file

    // The native size is never generated, only served when present.
    if (size <= 0) {
      throw AvatarError.notFound({ userId: this.userId, size })
    }

    const displayName = await this.deps.identity.getDisplayName()
    const data = await this.render({ displayName, size, theme })

    return this.save(cacheKey, size, data)
  }

  /** Delete every cached placeholder of this user. */
  async remove(): Promise<void> {
    const files = await this.deps.folder.list()

    for (const file of files) {
      await file.delete()
    }

    if (files.length > 0) {
      this.logger.debug("Removed avatar placeholders", { count: files.length })
    }
  }

  async set(_data: StoreData): Promise<void> {}

  isCustomAvatar(): boolean {
    return false
  }

  async userChanged(feature: string, _oldValue: unknown, _newValue: unknown): Promise<void> {
    this.logger.debug(`User ${feature} changed, invalidating avatar placeholders`)
    await this.remove()
  }

  async getDisplayName(): Promise<string> {
    return this.deps.identity.getDisplayName()
  }

  private async render(request: RenderRequest): Promise<Buffer> {
    const vector = await this.deps.vectorRenderer.renderVector(request)
    if (vector && vector.length > 0) return vector

    this.logger.debug("Vector rendering unavailable, using raster fallback", {
      size: request.size,
      theme: request.theme,
    })

    return this.deps.rasterRenderer.renderRaster(request)
  }

  private async save(cacheKey: string, size: number, data: Buffer): Promise<StoreFile> {
    try {
      const result = await this.deps.folder.newFile(cacheKey, data)

      // Refresh what a concurrent request stored.
      if (result.kind === "exists") await result.file.write(data)

      return result.file
    } catch (err) {
      if (!hasErrorCode(err, "store_not_permitted")) throw err

      this.logger.error(`Failed to save avatar placeholder for ${this.userId}`, { cacheKey, err })

      throw AvatarError.notFound({ userId: this.userId, size, cause: err })
    }
  }
}
