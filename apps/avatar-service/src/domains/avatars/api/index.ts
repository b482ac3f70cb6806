import { createRouter } from "@monogram/server"
import type { Hono } from "hono"
import type { ApiModule } from "../../../app/routes/register-routes"
import type { AvatarServices } from "../composition"
import { clearAvatarsHandler, deleteAvatarHandler } from "./delete-avatar.handler"
import { getAvatarHandler } from "./get-avatar.handler"

type AvatarsModuleDeps = {
  avatars: AvatarServices
}

export function createAvatarsModule(deps: AvatarsModuleDeps): ApiModule {
  return {
    name: "avatars",
    register: (api: Hono) => {
      const avatars = createRouter()

      avatars.get("/:userId/:size", getAvatarHandler(deps.avatars, "light"))
      avatars.get("/:userId/:size/dark", getAvatarHandler(deps.avatars, "dark"))
      avatars.delete("/:userId", deleteAvatarHandler(deps.avatars))
      avatars.delete("/", clearAvatarsHandler(deps.avatars))

      api.route("/avatars", avatars)
    },
  }
}
