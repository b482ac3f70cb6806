import { readFileSync } from "node:fs"
import { z } from "zod/mini"

const DEFAULT_FONT_URL = new URL("./bitmap-font.json", import.meta.url)

const fontSchema = z.object({
  width: z.int().check(z.positive()),
  height: z.int().check(z.positive()),
  fallback: z.string(),
  glyphs: z.record(z.string(), z.array(z.string().check(z.regex(/^[01]+$/)))),
})

export type Glyph = readonly (readonly boolean[])[]

/**
 * Fixed-size monochrome font: each glyph is a grid of on/off cells.
 */
export class BitmapFont {
  private constructor(
    readonly width: number,
    readonly height: number,
    private readonly glyphs: ReadonlyMap<string, Glyph>,
    private readonly fallback: Glyph,
  ) {}

  static load(url: URL = DEFAULT_FONT_URL): BitmapFont {
    return BitmapFont.parse(JSON.parse(readFileSync(url, "utf8")))
  }

  static parse(raw: unknown): BitmapFont {
    const font = fontSchema.parse(raw)
    const glyphs = new Map<string, Glyph>()

    for (const [ch, rows] of Object.entries(font.glyphs)) {
      if (rows.length !== font.height || rows.some((row) => row.length !== font.width)) {
        throw new Error(`Glyph "${ch}" is not ${font.width}x${font.height}`)
      }
      glyphs.set(
        ch,
        rows.map((row) => [...row].map((cell) => cell === "1")),
      )
    }

    const fallback = glyphs.get(font.fallback)
    if (!fallback) throw new Error(`Fallback glyph "${font.fallback}" is not defined`)

    return new BitmapFont(font.width, font.height, glyphs, fallback)
  }

  /** Glyph for a character; the fallback glyph when the font lacks it. */
  glyph(ch: string): Glyph {
    return this.glyphs.get(ch) ?? this.fallback
  }
}
