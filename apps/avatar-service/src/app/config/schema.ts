import { type LogLevelName, logLevelNames } from "@monogram/logger"
import { z } from "zod/mini"

export const storeDrivers = ["fs", "memory"] as const
export type StoreDriver = (typeof storeDrivers)[number]

const positiveNumber = () => z.coerce.number().check(z.gt(0))

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Avatar Service"),

  SERVER_HOST: z._default(z.string(), "0.0.0.0"),
  SERVER_PORT: z._default(positiveNumber(), 4664),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(positiveNumber(), 10_000),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  AVATAR_STORE_DRIVER: z._default(z.enum(storeDrivers), "fs"),
  AVATAR_STORE_ROOT: z._default(z.string(), "data/avatars"),
  AVATAR_STORE_QUOTA_BYTES: z.optional(z.coerce.number().check(z.gte(0))),
  AVATAR_MAX_SIZE: z._default(positiveNumber(), 2048),
  AVATAR_CACHE_MAX_AGE_SECONDS: z._default(z.coerce.number().check(z.gte(0)), 86_400),

  USERS_FILE: z._default(z.string(), "users.json"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: number
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    header: string
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  store: {
    driver: StoreDriver
    /** Absolute directory of the fs driver. */
    rootDir: string
    quotaBytes?: number
  }

  avatars: {
    maxSize: number
    cacheMaxAgeSeconds: number
  }

  users: {
    /** Absolute path of the JSON seed file. */
    file: string
  }
}
