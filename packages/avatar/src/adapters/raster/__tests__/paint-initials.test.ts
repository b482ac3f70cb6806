import { Color } from "../../../core/color"
import { BitmapFont } from "../bitmap-font"
import { CHANNELS, paintInitials } from "../paint-initials"

const background = new Color(238, 239, 247)
const foreground = new Color(91, 100, 179)

function pixelAt(pixels: Buffer, size: number, x: number, y: number): number[] {
  const offset = (y * size + x) * CHANNELS
  return [...pixels.subarray(offset, offset + CHANNELS)]
}

describe("paintInitials", () => {
  const font = BitmapFont.load()

  it("fills the square with the background", () => {
    const pixels = paintInitials(font, { text: "", size: 4, background, foreground })

    expect(pixels).toHaveLength(4 * 4 * CHANNELS)
    expect(pixelAt(pixels, 4, 0, 0)).toEqual([238, 239, 247, 255])
    expect(pixelAt(pixels, 4, 3, 3)).toEqual([238, 239, 247, 255])
  })

  it("centres the glyph at scale 1", () => {
    // "A" is 5x7; on 14px it starts at (4, 3).
    const pixels = paintInitials(font, { text: "A", size: 14, background, foreground })

    expect(pixelAt(pixels, 14, 4, 3)).toEqual([238, 239, 247, 255])
    expect(pixelAt(pixels, 14, 5, 3)).toEqual([91, 100, 179, 255])
    expect(pixelAt(pixels, 14, 4, 4)).toEqual([91, 100, 179, 255])
    expect(pixelAt(pixels, 14, 0, 0)).toEqual([238, 239, 247, 255])
  })

  it("scales glyph cells up on larger canvases", () => {
    // 28px: scale 2, "A" spans (9..18, 7..20).
    const pixels = paintInitials(font, { text: "A", size: 28, background, foreground })

    expect(pixelAt(pixels, 28, 11, 7)).toEqual([91, 100, 179, 255])
    expect(pixelAt(pixels, 28, 12, 8)).toEqual([91, 100, 179, 255])
    expect(pixelAt(pixels, 28, 9, 7)).toEqual([238, 239, 247, 255])
  })

  it("clips text larger than the canvas", () => {
    const pixels = paintInitials(font, { text: "AL", size: 2, background, foreground })

    expect(pixels).toHaveLength(2 * 2 * CHANNELS)
  })
})
