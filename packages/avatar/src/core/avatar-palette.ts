import { createHash } from "node:crypto"
import type { AvatarTheme } from "../ports/avatar"
import { Color } from "./color"

const STEPS = 6

const RED = new Color(182, 70, 157)
const YELLOW = new Color(221, 203, 85)
const BLUE = new Color(0, 130, 201)

const PALETTE: readonly Color[] = [
  ...Color.mixPalette(STEPS, RED, YELLOW),
  ...Color.mixPalette(STEPS, YELLOW, BLUE),
  ...Color.mixPalette(STEPS, BLUE, RED),
]

const UUID_LIKE = /^([0-9a-f]{4}-?){8}$/

const WHITE = new Color(255, 255, 255)
const BLACK = new Color(0, 0, 0)

export type AvatarColors = {
  background: Color
  foreground: Color
}

function hashToInt(hash: string, maximum: number): number {
  let sum = 0
  for (const ch of hash) sum += Number.parseInt(ch, 16)

  return sum % maximum
}

/**
 * Palette colour for a display name. Names that already look like an md5
 * or uuid are used as the hash directly.
 */
export function avatarColor(displayName: string): Color {
  let hash = displayName.toLowerCase()

  if (!UUID_LIKE.test(hash)) {
    hash = createHash("md5").update(hash).digest("hex")
  }

  const index = hashToInt(hash.replace(/[^0-9a-f]+/g, ""), PALETTE.length)

  return PALETTE[index] ?? RED
}

export function avatarColors(displayName: string, theme: AvatarTheme): AvatarColors {
  const foreground = avatarColor(displayName)
  const background = foreground.alphaBlending(0.1, theme === "dark" ? BLACK : WHITE)

  return { background, foreground }
}

export function avatarPalette(): readonly Color[] {
  return PALETTE
}
