import { NullLogger } from "@monogram/logger"
import { UserDirectory } from "../user-directory"
import type { DisplayNameListener } from "../../model/user.model"

describe("UserDirectory", () => {
  let directory: UserDirectory

  beforeEach(() => {
    directory = new UserDirectory({ logger: new NullLogger() }, [
      { id: "alice", displayName: "Alice Liddell" },
    ])
  })

  it("resolves identities of known users only", async () => {
    const identity = await directory.findIdentity("alice")

    expect(identity?.getUniqueId()).toBe("alice")
    expect(await identity?.getDisplayName()).toBe("Alice Liddell")
    expect(await directory.findIdentity("nobody")).toBeNull()
  })

  it("lets identities see later renames", async () => {
    const identity = await directory.findIdentity("alice")

    await directory.setDisplayName("alice", "Alice Pleasance")

    expect(await identity?.getDisplayName()).toBe("Alice Pleasance")
  })

  it("notifies subscribers with old and new values", async () => {
    const listener = vi.fn<DisplayNameListener>(async () => undefined)
    directory.onDisplayNameChanged(listener)

    await directory.setDisplayName("alice", "Al")

    expect(listener).toHaveBeenCalledExactlyOnceWith({
      userId: "alice",
      oldValue: "Alice Liddell",
      newValue: "Al",
    })
  })

  it("does not notify when the name is unchanged", async () => {
    const listener = vi.fn<DisplayNameListener>(async () => undefined)
    directory.onDisplayNameChanged(listener)

    await directory.setDisplayName("alice", "Alice Liddell")

    expect(listener).not.toHaveBeenCalled()
  })

  it("stops notifying after unsubscribe", async () => {
    const listener = vi.fn<DisplayNameListener>(async () => undefined)
    const unsubscribe = directory.onDisplayNameChanged(listener)

    unsubscribe()
    await directory.setDisplayName("alice", "Al")

    expect(listener).not.toHaveBeenCalled()
  })

  it("propagates listener failures to the caller", async () => {
    const failure = new Error("store refused")
    directory.onDisplayNameChanged(async () => {
      throw failure
    })

    await expect(directory.setDisplayName("alice", "Al")).rejects.toBe(failure)
  })

  it("keeps the previous name when a listener fails, so a retry notifies again", async () => {
    const listener = vi
      .fn<DisplayNameListener>()
      .mockRejectedValueOnce(new Error("store refused"))
      .mockResolvedValue(undefined)
    directory.onDisplayNameChanged(listener)

    await expect(directory.setDisplayName("alice", "Al")).rejects.toThrow("store refused")
    expect(directory.getUser("alice")).toEqual({ id: "alice", displayName: "Alice Liddell" })

    await expect(directory.setDisplayName("alice", "Al")).resolves.toEqual({
      id: "alice",
      displayName: "Al",
    })
    expect(listener).toHaveBeenCalledTimes(2)
    expect(listener).toHaveBeenLastCalledWith({
      userId: "alice",
      oldValue: "Alice Liddell",
      newValue: "Al",
    })
    expect(directory.getUser("alice")?.displayName).toBe("Al")
  })

  it("does not roll back over a rename that landed while listeners ran", async () => {
    let renameMeanwhile = true
    directory.onDisplayNameChanged(async ({ newValue }) => {
      if (newValue !== "Al") return
      if (renameMeanwhile) {
        renameMeanwhile = false
        await directory.setDisplayName("alice", "Alice P.")
      }
      throw new Error("store refused")
    })

    await expect(directory.setDisplayName("alice", "Al")).rejects.toThrow("store refused")
    expect(directory.getUser("alice")?.displayName).toBe("Alice P.")
  })

  it("throws user_not_found for unknown users", async () => {
    await expect(directory.setDisplayName("nobody", "X")).rejects.toMatchObject({
      code: "user_not_found",
      context: { userId: "nobody" },
    })
  })
})
