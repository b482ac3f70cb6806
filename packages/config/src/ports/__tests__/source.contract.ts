import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  /** Writes whatever files the source reads into `cwd`. */
  setup?: (cwd: string) => Promise<void>
  make: (cwd: string) => ConfigSource
  expected: Record<string, string>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string
    let source: ConfigSource

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "monogram-config-"))
      await h.setup?.(cwd)
      source = h.make(cwd)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a non-empty name", () => {
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() resolves to a plain object of strings", async () => {
      const result = await source.load()

      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
      for (const value of Object.values(result)) {
        expect(value === undefined || typeof value === "string").toBe(true)
      }
    })

    it("load() returns a fresh object each time", async () => {
      const first = await source.load()
      first.AVATAR_MUTATED = "x"

      const second = await source.load()

      expect(second).not.toHaveProperty("AVATAR_MUTATED")
      expect(second).toEqual(await source.load())
    })

    it("load() returns the expected values", async () => {
      expect(await source.load()).toMatchObject(h.expected)
    })
  })
}
