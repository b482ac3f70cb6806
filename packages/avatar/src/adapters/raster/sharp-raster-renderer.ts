import sharp from "sharp"
import { AvatarError } from "../../core/avatar-error"
import { avatarColors } from "../../core/avatar-palette"
import { avatarText } from "../../core/avatar-text"
import type { RasterRenderer, RenderRequest } from "../../ports/renderer"
import { BitmapFont } from "./bitmap-font"
import { CHANNELS, paintInitials } from "./paint-initials"

export type SharpRasterRendererDeps = {
  font?: BitmapFont
}

/**
 * Paints the initials with a bitmap font into raw pixels and encodes them
 * as PNG. Needs no SVG support from libvips.
 */
export class SharpRasterRenderer implements RasterRenderer {
  private readonly font: BitmapFont

  constructor(deps: SharpRasterRendererDeps = {}) {
    this.font = deps.font ?? BitmapFont.load()
  }

  async renderRaster(request: RenderRequest): Promise<Buffer> {
    try {
      const { background, foreground } = avatarColors(request.displayName, request.theme)
      const pixels = paintInitials(this.font, {
        text: avatarText(request.displayName),
        size: request.size,
        background,
        foreground,
      })

      return await sharp(pixels, {
        raw: { width: request.size, height: request.size, channels: CHANNELS },
      })
        .png()
        .toBuffer()
    } catch (err) {
      throw AvatarError.renderingFailed({ size: request.size, cause: err })
    }
  }
}
