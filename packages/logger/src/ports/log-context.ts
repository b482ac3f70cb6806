export type LogContext = {
  requestId: string

  method: string
  path: string
  route: string
  op: string
  userAgent: string

  status: number
  code: string
  durationMs: number

  userId: string
  cacheKey: string
  size: number
  theme: string
  count: number

  host: string
  port: number
  signal: string
  reason: string
  hook: string
  failureCount: number
  timedOut: boolean
  timeoutMs: number

  service: string
  module: string
  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext>
