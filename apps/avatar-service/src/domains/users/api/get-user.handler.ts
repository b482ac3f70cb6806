import { parseOrThrow } from "@monogram/server"
import type { Context, Handler } from "hono"
import type { UserServices } from "../composition"
import { UserError } from "../model/user.errors"
import type { User } from "../model/user.model"
import { userParamsSchema } from "./user.api.schema"

export function getUserHandler(deps: UserServices): Handler {
  return async (c: Context) => {
    const { userId } = parseOrThrow(userParamsSchema, c.req.param())
    const user = deps.directory.getUser(userId)

    if (!user) throw UserError.notFound(userId)

    return c.json<User>(user)
  }
}
