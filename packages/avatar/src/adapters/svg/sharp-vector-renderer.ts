import type { Logger } from "@monogram/logger"
import sharp from "sharp"
import type { RenderRequest, VectorRenderer } from "../../ports/renderer"
import { buildAvatarSvg } from "./avatar-svg"

export type SharpVectorRendererDeps = {
  logger: Logger
  /** Whether libvips can read SVG. Detected from sharp when omitted. */
  svgSupported?: boolean
}

export class SharpVectorRenderer implements VectorRenderer {
  private readonly svgSupported: boolean

  constructor(private readonly deps: SharpVectorRendererDeps) {
    this.svgSupported = deps.svgSupported ?? sharp.format.svg.input.buffer
  }

  async renderVector(request: RenderRequest): Promise<Buffer | null> {
    if (!this.svgSupported) return null

    try {
      return await sharp(Buffer.from(buildAvatarSvg(request))).png().toBuffer()
    } catch (err) {
      this.deps.logger.warn("SVG avatar rendering failed", { size: request.size, err })
      return null
    }
  }
}
