import { Hono } from "hono"
import { type CreateErrorHandlerFn, createErrorHandler } from "../errors/create-error-handler"
import { ServerError } from "../errors/server-error"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import { type CreateStopperFn, createStopper, type ServerHandle } from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, shutdown, type StopResult } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type ServerState = "idle" | "starting" | "started"

type Phase =
  | { state: "idle" }
  | { state: "starting" }
  | { state: "started"; handle: ServerHandle }

/** Every step of the server's life, replaceable in tests. */
export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export function createRouter(): Hono {
  return new Hono()
}

/**
 * Hono application plus its lifecycle. The app is built in the constructor,
 * so `app.request()` answers before `start()` is called; readiness reports
 * 503 until the listener is up and again once shutdown begins.
 */
export class Server {
  readonly app: Hono

  private phase: Phase = { state: "idle" }
  private ready = false
  private signalHandler: SignalHandler | undefined
  private readonly now: () => number

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {
    this.now = deps.now ?? Date.now

    this.app = collabs.buildApp({
      options,
      isReady: () => this.ready,
      errorHandler: collabs.createErrorHandler(options.errorHandling, deps.logger),
      defaultMiddleware: collabs.createDefaultMiddleware(options, deps.logger),
    })
  }

  /** SIGINT/SIGTERM stop the server; calling twice registers once. */
  setupProcessHandlers(): this {
    this.signalHandler ??= this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.stopIfRunning(),
    })

    return this
  }

  async start(): Promise<ServerHandle> {
    if (this.phase.state !== "idle") throw ServerError.alreadyStarted()

    this.phase = { state: "starting" }

    try {
      const handle = await this.boot()
      this.phase = { state: "started", handle }
      this.ready = true
      return handle
    } catch (err) {
      this.phase = { state: "idle" }
      throw err
    }
  }

  getState(): ServerState {
    return this.phase.state
  }

  isReady(): boolean {
    return this.ready
  }

  private async boot(): Promise<ServerHandle> {
    const { logger } = this.deps

    const started = await this.collabs.onStartup({
      now: this.now,
      logger,
      deadlineMs: this.now() + this.options.startupTimeoutMs,
      startHooks: this.options.startHooks,
    })

    if (!started.ok) throw ServerError.startupFailed(started.failures, started.timedOut)

    return this.collabs.createStopper({
      server: this.collabs.listen(this.app, this.options, logger),
      logger,
      now: this.now,
      options: this.options,
      stopHooks: this.options.stopHooks,
      setReady: (value) => {
        this.ready = value
      },
      shutdown: this.collabs.onShutdown,
      onStop: () => this.signalHandler?.unregister(),
    })
  }

  private stopIfRunning(): Promise<StopResult> {
    if (this.phase.state === "started") return this.phase.handle.stop()

    this.deps.logger.warn("Stop called but server not running")
    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
