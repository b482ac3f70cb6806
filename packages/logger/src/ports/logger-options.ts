import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*: which levels are emitted and whether output
 * is rendered for humans or machines. Adapters decide how to honor them.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development.
   * Production keeps structured JSON for log processors.
   */
  prettify?: boolean
}
