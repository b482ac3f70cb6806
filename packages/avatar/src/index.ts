export type { Avatar, AvatarKind, AvatarTheme } from "./ports/avatar"
export type { AvatarIdentity, IdentityResolver } from "./ports/avatar-identity"
export type { RasterRenderer, RenderRequest, VectorRenderer } from "./ports/renderer"
export { AvatarError, type AvatarErrorCode } from "./core/avatar-error"
export { NATIVE_SIZE, PLACEHOLDER_BASENAME, resolveAvatarPath } from "./core/avatar-path"
export { avatarText } from "./core/avatar-text"
export { Color } from "./core/color"
export { avatarColor, avatarColors, avatarPalette, type AvatarColors } from "./core/avatar-palette"
export { PlaceholderAvatar, type PlaceholderAvatarDeps } from "./core/placeholder-avatar"
export { AvatarManager, type AvatarManagerDeps } from "./core/avatar-manager"
export { buildAvatarSvg, escapeXml } from "./adapters/svg/avatar-svg"
export {
  SharpVectorRenderer,
  type SharpVectorRendererDeps,
} from "./adapters/svg/sharp-vector-renderer"
export { BitmapFont, type Glyph } from "./adapters/raster/bitmap-font"
export {
  SharpRasterRenderer,
  type SharpRasterRendererDeps,
} from "./adapters/raster/sharp-raster-renderer"
