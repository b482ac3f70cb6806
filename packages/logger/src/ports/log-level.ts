export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === "string" && logLevelNames.some((name) => name === value)
}

export function logLevelName(level: number): LogLevelName | undefined {
  return logLevelNames.find((name) => levelOf(name) === level)
}

function levelOf(name: LogLevelName): LogLevel {
  switch (name) {
    case "trace":
      return LogLevels.Trace
    case "debug":
      return LogLevels.Debug
    case "info":
      return LogLevels.Info
    case "warn":
      return LogLevels.Warn
    case "error":
      return LogLevels.Error
    case "fatal":
      return LogLevels.Fatal
  }
}
