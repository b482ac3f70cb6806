import { StoreError } from "../store-error"
import { assertValidName, byName, joinStorePath } from "../store-name"

describe("assertValidName", () => {
  it.each(["alice", "avatar-placeholder.64.png", "user@example.com", "ünïcødé", "with space"])(
    "accepts %s",
    (name) => {
      expect(() => assertValidName(name)).not.toThrow()
    },
  )

  it.each([
    ["", "must not be empty"],
    ["a/b", "must not contain path separators"],
    ["a\\b", "must not contain path separators"],
    [".", "must not be a dot segment"],
    ["..", "must not be a dot segment"],
    ["a\0b", "must not contain NUL"],
  ])("rejects %j", (name, reason) => {
    let thrown: unknown

    try {
      assertValidName(name)
    } catch (err) {
      thrown = err
    }

    expect(thrown).toBeInstanceOf(StoreError)
    expect(thrown).toMatchObject({ code: "store_invalid_name", context: { name, reason } })
  })
})

describe("joinStorePath", () => {
  it("joins folder and file with a slash", () => {
    expect(joinStorePath("alice", "avatar-placeholder.png")).toBe("alice/avatar-placeholder.png")
  })
})

describe("byName", () => {
  it("orders by name", () => {
    const sorted = [{ name: "b" }, { name: "a" }, { name: "c" }].sort(byName)

    expect(sorted.map((x) => x.name)).toEqual(["a", "b", "c"])
  })
})
