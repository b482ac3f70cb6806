import type { AvatarTheme } from "@monogram/avatar"
import { parseOrThrow } from "@monogram/server"
import type { Context, Handler } from "hono"
import type { AvatarServices } from "../composition"
import { avatarParamsSchema } from "./avatar.api.schema"

export function getAvatarHandler(deps: AvatarServices, theme: AvatarTheme): Handler {
  const schema = avatarParamsSchema(deps.maxSize)
  const cacheControl = `public, max-age=${deps.cacheMaxAgeSeconds}`

  return async (c: Context) => {
    const { userId, size } = parseOrThrow(schema, c.req.param())

    const avatar = await deps.manager.getAvatar(userId)
    const file = await avatar.getFile(size, theme === "dark")
    const bytes = await file.read()

    return c.body(new Uint8Array(bytes), 200, {
      "Content-Type": "image/png",
      "Cache-Control": cacheControl,
    })
  }
}
