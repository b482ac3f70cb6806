import { type Logger, PinoLogger } from "@monogram/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
}

export function createCoreServices(config: AppConfig): CoreServices {
  const logger = new PinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
    { service: config.logging.serviceName, env: config.app.env },
  )

  return { logger }
}
