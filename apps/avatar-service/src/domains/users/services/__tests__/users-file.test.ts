import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { readUsersFile } from "../users-file"

describe("readUsersFile", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "users-file-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  const write = async (content: string) => {
    const file = path.join(dir, "users.json")
    await fs.writeFile(file, content)
    return file
  }

  it("reads users and defaults a missing display name to empty", async () => {
    const file = await write(JSON.stringify([{ id: "alice", displayName: "Alice" }, { id: "bob" }]))

    expect(await readUsersFile(file)).toStrictEqual([
      { id: "alice", displayName: "Alice" },
      { id: "bob", displayName: "" },
    ])
  })

  it("treats a missing file as no users", async () => {
    expect(await readUsersFile(path.join(dir, "absent.json"))).toStrictEqual([])
  })

  it("rejects malformed JSON", async () => {
    const file = await write("[{")

    await expect(readUsersFile(file)).rejects.toMatchObject({
      code: "users_file_invalid",
      context: { file },
    })
  })

  it("rejects entries without an id", async () => {
    const file = await write(JSON.stringify([{ displayName: "Nobody" }]))

    await expect(readUsersFile(file)).rejects.toMatchObject({ code: "users_file_invalid" })
  })
})
