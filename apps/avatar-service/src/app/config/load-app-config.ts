import path from "node:path"
import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@monogram/config"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig, cwd: string): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      header: env.REQUEST_ID_HEADER,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    store: {
      driver: env.AVATAR_STORE_DRIVER,
      rootDir: path.resolve(cwd, env.AVATAR_STORE_ROOT),
      ...(env.AVATAR_STORE_QUOTA_BYTES !== undefined && {
        quotaBytes: env.AVATAR_STORE_QUOTA_BYTES,
      }),
    },
    avatars: {
      maxSize: env.AVATAR_MAX_SIZE,
      cacheMaxAgeSeconds: env.AVATAR_CACHE_MAX_AGE_SECONDS,
    },
    users: {
      file: path.resolve(cwd, env.USERS_FILE),
    },
  }
}

/**
 * Reads `.env.<NODE_ENV>` (optional) under `cwd`, then the given environment,
 * which wins on conflicts.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${env["NODE_ENV"] ?? "development"}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value, cwd)
}
