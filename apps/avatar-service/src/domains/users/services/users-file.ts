import fs from "node:fs/promises"
import { z } from "zod/mini"
import { UserError } from "../model/user.errors"
import type { User } from "../model/user.model"

export const usersFileSchema = z.array(
  z.object({
    id: z.string().check(z.minLength(1)),
    displayName: z._default(z.string(), ""),
  }),
)

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/** Seed users from a JSON array of `{ id, displayName }`. A missing file means no users. */
export async function readUsersFile(file: string): Promise<User[]> {
  let content: string

  try {
    content = await fs.readFile(file, "utf-8")
  } catch (err) {
    if (isMissingFile(err)) return []
    throw err
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (err) {
    throw UserError.invalidUsersFile(file, "not valid JSON", err)
  }

  const result = usersFileSchema.safeParse(raw)
  if (!result.success) {
    throw UserError.invalidUsersFile(file, z.prettifyError(result.error))
  }

  return result.data
}
