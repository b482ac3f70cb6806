import { parseOrThrow, ValidationError } from "@monogram/server"
import type { Context, Handler } from "hono"
import type { UserServices } from "../composition"
import type { User } from "../model/user.model"
import { updateDisplayNameRequestSchema, userParamsSchema } from "./user.api.schema"

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch (err) {
    throw new ValidationError("Request body must be valid JSON", {
      code: "validation_error",
      context: { issues: [{ path: "", message: "Request body must be valid JSON" }] },
      cause: err,
    })
  }
}

export function updateDisplayNameHandler(deps: UserServices): Handler {
  return async (c: Context) => {
    const { userId } = parseOrThrow(userParamsSchema, c.req.param())
    const body = parseOrThrow(updateDisplayNameRequestSchema, await readJson(c))

    const user = await deps.directory.setDisplayName(userId, body.displayName)

    return c.json<User>(user)
  }
}
