import type { AvatarTheme } from "./avatar"

export type RenderRequest = {
  displayName: string
  /** Edge length in pixels, always positive. */
  size: number
  theme: AvatarTheme
}

/**
 * Draws the avatar from a vector description. Yields `null` when the
 * platform cannot render vectors, so the raster renderer can take over.
 */
export interface VectorRenderer {
  renderVector(request: RenderRequest): Promise<Buffer | null>
}

/**
 * Last-resort renderer. Always produces PNG bytes or throws
 * `avatar_rendering_failed`.
 */
export interface RasterRenderer {
  renderRaster(request: RenderRequest): Promise<Buffer>
}
