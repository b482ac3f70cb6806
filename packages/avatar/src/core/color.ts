export class Color {
  constructor(
    readonly red: number,
    readonly green: number,
    readonly blue: number,
  ) {}

  /**
   * `steps` colours from `from` towards `to`, starting at `from` and
   * stopping one step short of `to`. Channels are truncated.
   */
  static mixPalette(steps: number, from: Color, to: Color): Color[] {
    const dr = (to.red - from.red) / steps
    const dg = (to.green - from.green) / steps
    const db = (to.blue - from.blue) / steps

    const palette = [from]
    for (let i = 1; i < steps; i++) {
      palette.push(
        new Color(
          Math.trunc(from.red + dr * i),
          Math.trunc(from.green + dg * i),
          Math.trunc(from.blue + db * i),
        ),
      )
    }

    return palette
  }

  /** This colour laid over `source` at the given opacity. */
  alphaBlending(opacity: number, source: Color): Color {
    return new Color(
      Math.trunc((1 - opacity) * source.red + opacity * this.red),
      Math.trunc((1 - opacity) * source.green + opacity * this.green),
      Math.trunc((1 - opacity) * source.blue + opacity * this.blue),
    )
  }

  toHex(): string {
    return [this.red, this.green, this.blue].map((c) => c.toString(16).padStart(2, "0")).join("")
  }
}
