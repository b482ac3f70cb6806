import { parseOrThrow } from "@monogram/server"
import type { Context, Handler } from "hono"
import type { AvatarServices } from "../composition"
import { userParamsSchema } from "./avatar.api.schema"

export function deleteAvatarHandler(deps: AvatarServices): Handler {
  return async (c: Context) => {
    const { userId } = parseOrThrow(userParamsSchema, c.req.param())

    const avatar = await deps.manager.getAvatar(userId)
    await avatar.remove()

    return c.body(null, 204)
  }
}

export function clearAvatarsHandler(deps: AvatarServices): Handler {
  return async (c: Context) => {
    await deps.manager.clearCachedAvatars()

    return c.body(null, 204)
  }
}
