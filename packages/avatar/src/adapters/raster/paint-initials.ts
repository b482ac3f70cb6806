import type { Color } from "../../core/color"
import type { BitmapFont } from "./bitmap-font"

export const CHANNELS = 4

export type PaintRequest = {
  text: string
  size: number
  background: Color
  foreground: Color
}

/**
 * RGBA pixels of a square avatar with `text` centred on it.
 * Glyph cells scale up by a whole factor; one cell separates characters.
 */
export function paintInitials(font: BitmapFont, request: PaintRequest): Buffer {
  const { size, background, foreground } = request
  const chars = Array.from(request.text)
  const pixels = Buffer.alloc(size * size * CHANNELS)

  for (let i = 0; i < size * size; i++) {
    setPixel(pixels, i, background)
  }

  if (chars.length === 0) return pixels

  const textWidth = chars.length * font.width + (chars.length - 1)
  const scale = Math.max(
    1,
    Math.min(Math.floor((size * 0.5) / font.height), Math.floor((size * 0.8) / textWidth)),
  )
  const left = Math.floor((size - textWidth * scale) / 2)
  const top = Math.floor((size - font.height * scale) / 2)

  chars.forEach((ch, index) => {
    const glyph = font.glyph(ch)
    const originX = left + index * (font.width + 1) * scale

    glyph.forEach((row, r) => {
      row.forEach((on, c) => {
        if (!on) return
        fillBlock(pixels, size, originX + c * scale, top + r * scale, scale, foreground)
      })
    })
  })

  return pixels
}

function fillBlock(
  pixels: Buffer,
  size: number,
  x: number,
  y: number,
  scale: number,
  color: Color,
): void {
  for (let py = Math.max(0, y); py < Math.min(size, y + scale); py++) {
    for (let px = Math.max(0, x); px < Math.min(size, x + scale); px++) {
      setPixel(pixels, py * size + px, color)
    }
  }
}

function setPixel(pixels: Buffer, index: number, color: Color): void {
  const offset = index * CHANNELS
  pixels[offset] = color.red
  pixels[offset + 1] = color.green
  pixels[offset + 2] = color.blue
  pixels[offset + 3] = 255
}
