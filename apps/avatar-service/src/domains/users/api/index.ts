import { createRouter } from "@monogram/server"
import type { Hono } from "hono"
import type { ApiModule } from "../../../app/routes/register-routes"
import type { UserServices } from "../composition"
import { getUserHandler } from "./get-user.handler"
import { updateDisplayNameHandler } from "./update-display-name.handler"

type UsersModuleDeps = {
  users: UserServices
}

export function createUsersModule(deps: UsersModuleDeps): ApiModule {
  return {
    name: "users",
    register: (api: Hono) => {
      const users = createRouter()

      users.get("/:userId", getUserHandler(deps.users))
      users.put("/:userId/display-name", updateDisplayNameHandler(deps.users))

      api.route("/users", users)
    },
  }
}
