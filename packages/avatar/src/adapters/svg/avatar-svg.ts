import { avatarColors } from "../../core/avatar-palette"
import { avatarText } from "../../core/avatar-text"
import type { RenderRequest } from "../../ports/renderer"

const XML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
}

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch)
}

/**
 * SVG document for a placeholder. Drawn on a 500x500 canvas and scaled
 * to `size` by the width and height attributes.
 */
export function buildAvatarSvg(request: RenderRequest): string {
  const { background, foreground } = avatarColors(request.displayName, request.theme)
  const text = escapeXml(avatarText(request.displayName))

  return [
    '<?xml version="1.0" encoding="UTF-8" standalone="no"?>',
    `<svg width="${request.size}" height="${request.size}" version="1.1" viewBox="0 0 500 500" xmlns="http://www.w3.org/2000/svg">`,
    `<rect width="100%" height="100%" fill="#${background.toHex()}"></rect>`,
    `<text x="50%" y="350" style="font-weight:normal;font-size:280px;font-family:'Noto Sans';text-anchor:middle;fill:#${foreground.toHex()}">${text}</text>`,
    "</svg>",
  ].join("\n")
}
