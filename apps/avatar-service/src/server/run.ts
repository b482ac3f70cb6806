import type { ServerHandle } from "@monogram/server"
import { type AppContextOptions, createAppContext } from "../app/create-context"
import { buildServer } from "./build-server"

/** Loads configuration, opens the port and stops on SIGINT/SIGTERM. */
export async function run(options: AppContextOptions = {}): Promise<ServerHandle> {
  const ctx = await createAppContext(options)
  const { server } = buildServer(ctx)

  const handle = await server.setupProcessHandlers().start()

  ctx.services.core.logger.info("Avatar service ready", {
    ...handle.address,
    env: ctx.config.app.env,
    count: ctx.services.domains.users.directory.size,
  })

  return handle
}

// No logger exists yet when configuration fails to load.
run().catch((err: unknown) => {
  console.error(err)
  process.exitCode = 1
})
