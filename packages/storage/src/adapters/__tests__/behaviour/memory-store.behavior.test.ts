import { StoreError } from "../../../core/store-error"
import { createMemoryFolderStore } from "../../create"
import { MemoryFolderStore } from "../../memory-store"

describe("MemoryFolderStore behaviour", () => {
  it("stamps files with the injected clock", async () => {
    const now = new Date("2025-03-01T12:00:00.000Z")
    const store = new MemoryFolderStore({ now: () => now })
    const { folder } = await store.newFolder("alice")
    const { file } = await folder.newFile("a.png")

    await file.write(Buffer.from("x"))

    expect(await file.stat()).toEqual({ sizeInBytes: 1, lastModified: now })
  })

  it("returns copies of stored bytes", async () => {
    const store = new MemoryFolderStore()
    const { folder } = await store.newFolder("alice")
    const { file } = await folder.newFile("a.png")
    await file.write(Buffer.from("abc"))

    const read = await file.read()
    read[0] = 0

    expect((await file.read()).toString()).toBe("abc")
  })

  describe("quota", () => {
    it("rejects a write that would exceed the quota", async () => {
      const store = new MemoryFolderStore({}, { quotaBytes: 4 })
      const { folder } = await store.newFolder("alice")
      const { file } = await folder.newFile("a.png")

      await expect(file.write(Buffer.from("12345"))).rejects.toMatchObject({
        code: "store_not_permitted",
        context: { path: "alice/a.png", operation: "write" },
      })
    })

    it("rejects a create whose content would exceed the quota and keeps no entry", async () => {
      const store = new MemoryFolderStore({}, { quotaBytes: 4 })
      const { folder } = await store.newFolder("alice")

      await expect(folder.newFile("a.png", Buffer.from("12345"))).rejects.toMatchObject({
        code: "store_not_permitted",
        context: { path: "alice/a.png", operation: "create" },
      })
      expect(await folder.getFile("a.png")).toEqual({ kind: "not_found" })
    })

    it("counts every folder and discounts the file being replaced", async () => {
      const store = createMemoryFolderStore({ quotaBytes: 6 })
      const alice = (await store.newFolder("alice")).folder
      const bob = (await store.newFolder("bob")).folder
      const a = (await alice.newFile("a.png")).file
      const b = (await bob.newFile("b.png")).file

      await a.write(Buffer.from("123"))
      await b.write(Buffer.from("123"))
      await a.write(Buffer.from("abc"))

      await expect(b.write(Buffer.from("1234"))).rejects.toBeInstanceOf(StoreError)
      expect((await b.read()).toString()).toBe("123")
    })
  })

  describe("read-only", () => {
    it("rejects creating folders and files", async () => {
      const store = new MemoryFolderStore({}, { readOnly: true })

      await expect(store.newFolder("alice")).rejects.toMatchObject({
        code: "store_not_permitted",
        context: { path: "alice", operation: "create" },
      })
    })

    it("still answers lookups and listings", async () => {
      const store = createMemoryFolderStore({ readOnly: true })

      expect(await store.getFolder("alice")).toEqual({ kind: "not_found" })
      expect(await store.listFolders()).toEqual([])
    })
  })
})
