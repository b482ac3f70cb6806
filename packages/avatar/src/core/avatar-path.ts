import type { AvatarTheme } from "../ports/avatar"

export const PLACEHOLDER_BASENAME = "avatar-placeholder"

export const NATIVE_SIZE = -1

/**
 * File name a placeholder of the given size and theme is cached under.
 *
 * @example
 * resolveAvatarPath(64, "dark") // "avatar-placeholder-dark.64.png"
 * resolveAvatarPath(-1, "light") // "avatar-placeholder.png"
 */
export function resolveAvatarPath(size: number, theme: AvatarTheme): string {
  const base = theme === "dark" ? `${PLACEHOLDER_BASENAME}-dark` : PLACEHOLDER_BASENAME

  return size === NATIVE_SIZE ? `${base}.png` : `${base}.${size}.png`
}
