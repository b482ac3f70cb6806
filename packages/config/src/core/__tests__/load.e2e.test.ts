import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod"
import { z as zm } from "zod/mini"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ConfigError } from "../config-error"
import { loadConfig } from "../load"

describe("loadConfig e2e", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "monogram-load-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("lets later sources override earlier ones", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "SERVER_PORT=8080\nSERVER_HOST=0.0.0.0")

    const config = await loadConfig({
      schema: z.object({ SERVER_PORT: z.coerce.number(), SERVER_HOST: z.string() }),
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { SERVER_PORT: "3000" } }),
      ],
    })

    expect(config.value).toEqual({ SERVER_PORT: 3000, SERVER_HOST: "0.0.0.0" })
    expect(config.explain("SERVER_PORT")).toBe("env")
    expect(config.explain("SERVER_HOST")).toBe("dotenv:.env")
    expect(config.sourcesUsed()).toEqual(["env", "dotenv:.env"])
  })

  it("accepts zod/mini schemas and records defaults", async () => {
    const config = await loadConfig({
      schema: zm.object({
        AVATAR_MAX_SIZE: zm._default(zm.coerce.number(), 2048),
        AVATAR_STORE_DRIVER: zm._default(zm.enum(["fs", "memory"]), "fs"),
      }),
      sources: [new EnvSource({ env: { AVATAR_STORE_DRIVER: "memory", EXTRA: "1" } })],
    })

    expect(config.value).toEqual({ AVATAR_MAX_SIZE: 2048, AVATAR_STORE_DRIVER: "memory" })
    expect(config.explain("AVATAR_MAX_SIZE")).toBe("default")
    expect(config.unknownKeys()).toEqual(["EXTRA"])
  })

  it("skips missing optional dotenv files", async () => {
    const config = await loadConfig({
      schema: z.object({ SERVER_PORT: z.coerce.number() }),
      sources: [
        new DotenvSource({ file: ".env.missing", required: false, cwd }),
        new EnvSource({ env: { SERVER_PORT: "4664" } }),
      ],
    })

    expect(config.get("SERVER_PORT")).toBe(4664)
  })

  it("throws a ConfigError listing the invalid keys", async () => {
    const promise = loadConfig({
      schema: z.object({ SERVER_PORT: z.coerce.number() }),
      sources: [new EnvSource({ env: { SERVER_PORT: "not-a-number" } })],
    })

    await expect(promise).rejects.toBeInstanceOf(ConfigError)
    await expect(promise).rejects.toMatchObject({
      code: "config_invalid",
      context: { sources: ["env"] },
    })
    await expect(promise).rejects.toThrow(/SERVER_PORT/)
  })
})
