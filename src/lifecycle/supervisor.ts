import consola from "consola"

import type {
  LifecycleState,
  ServerHandle,
  ShutdownMode,
  ShutdownReason,
  SupervisorOptions,
} from "./types"

type Hook = () => Promise<void> | void

type SignalReason = Extract<ShutdownReason, NodeJS.Signals>

const SIGNALS: ReadonlyArray<SignalReason> =
  process.platform === "win32" ?
    ["SIGINT", "SIGTERM", "SIGBREAK"]
  : ["SIGINT", "SIGTERM", "SIGHUP"]

const SIGNAL_REASONS: ReadonlySet<ShutdownReason> = new Set([
  "SIGINT",
  "SIGTERM",
  "SIGHUP",
  "SIGBREAK",
])

const DRAIN_POLL_MS = 200

const EXIT_OK = 0
const EXIT_FATAL = 1
const EXIT_FORCED = 2

// Owns the server lifecycle and is the single consumer of shutdown requests.
// Signals, the heartbeat monitor, the idle timer and fatal process errors all
// go through requestShutdown(); the first request wins and the rest join it.
export class ServerSupervisor {
  private state: LifecycleState = "init"
  private shutdownTimeoutMs: number
  private exitOnShutdown: boolean
  private handleProcessEvents: boolean
  private exit: (code: number) => void
  private hooks: Array<Hook> = []
  private hooksRan = false
  private server: ServerHandle | null = null
  private shutdown: Promise<number> | null = null
  private shutdownReason: ShutdownReason | null = null
  private forced = false
  private removeListeners: Array<() => void> = []
  private readonly stopped: Promise<number>
  private markStopped: (code: number) => void

  constructor(
    private startFn: () => Promise<ServerHandle>,
    opts: SupervisorOptions = {},
  ) {
    this.shutdownTimeoutMs = opts.shutdownTimeoutMs ?? 10000
    this.exitOnShutdown = opts.exitOnShutdown ?? true
    this.handleProcessEvents = opts.handleProcessEvents ?? true
    this.exit = opts.exit ?? ((code) => process.exit(code))

    let markStopped: (code: number) => void = () => {}
    this.stopped = new Promise((resolve) => {
      markStopped = resolve
    })
    this.markStopped = markStopped
  }

  // Register a cleanup hook to be called once during shutdown.
  // Hooks should be idempotent and fast; they can return a Promise.
  registerHook(hook: Hook) {
    if (this.shutdown) {
      consola.debug("Shutdown already started; hook not registered")
      return
    }
    this.hooks.push(hook)
  }

  getState(): LifecycleState {
    return this.state
  }

  // The request that started the shutdown, or null while serving
  getShutdownReason(): ShutdownReason | null {
    return this.shutdownReason
  }

  // Resolves with the exit code once the supervisor has stopped
  done(): Promise<number> {
    return this.stopped
  }

  async start(): Promise<void> {
    if (this.state !== "init") {
      throw new Error(`Cannot start from state ${this.state}`)
    }

    this.state = "starting"
    consola.debug("Server starting...")

    try {
      this.server = await this.startFn()
    } catch (error) {
      this.state = "failed"
      consola.error("Failed to start server:", error)
      throw error
    }

    // Listeners go in only once the listener is bound; a signal during
    // startup keeps Node's default behaviour
    if (this.handleProcessEvents) {
      this.installProcessListeners()
    }

    this.state = "serving"
    this.server.setReadiness(true)
  }

  // Idempotent: every caller gets the promise of the first request
  requestShutdown(
    reason: ShutdownReason,
    mode: ShutdownMode = "graceful",
  ): Promise<number> {
    if (this.shutdown) {
      consola.debug("Shutdown already in progress, ignoring:", reason)
      return this.shutdown
    }

    this.shutdownReason = reason
    this.shutdown = this.runShutdown(reason, mode).catch((err: unknown) => {
      consola.error("Shutdown failed:", err)
      return this.finish(EXIT_FATAL)
    })
    return this.shutdown
  }

  private handleSignal(signal: SignalReason) {
    consola.info("Signal received:", signal)

    if (this.shutdown) {
      // Second Ctrl+C while draining means "stop waiting"
      if (this.shutdownReason && SIGNAL_REASONS.has(this.shutdownReason)) {
        consola.warn(
          "Second signal received during shutdown: forcing immediate termination",
        )
        this.forced = true
      }
      return
    }

    void this.requestShutdown(signal)
  }

  private async runShutdown(
    reason: ShutdownReason,
    mode: ShutdownMode,
  ): Promise<number> {
    this.state = "shutting-down"
    consola.info(`Begin ${mode} shutdown:`, reason)

    // New requests get a 503 from here on
    this.server?.setReadiness(false)

    await this.runHooks()

    if (mode === "immediate") {
      await this.closeServer()
      return this.finish(EXIT_OK)
    }

    const deadline = Date.now() + this.shutdownTimeoutMs
    while (!this.forced && Date.now() < deadline) {
      const active = this.activeRequests()
      if (active === 0) break

      consola.info("Waiting for active requests to finish...", { active })
      await new Promise((r) => setTimeout(r, DRAIN_POLL_MS))
    }

    if (this.forced || this.activeRequests() > 0) {
      consola.warn("Shutdown deadline reached or forced; forcing termination")
      await this.closeServer()
      return this.finish(EXIT_FORCED)
    }

    await this.closeServer()
    consola.info("Shutdown complete")
    return this.finish(reason === "fatal" ? EXIT_FATAL : EXIT_OK)
  }

  private activeRequests(): number {
    return this.server?.activeRequests() ?? 0
  }

  private async runHooks() {
    if (this.hooksRan) return
    this.hooksRan = true

    await Promise.allSettled(
      this.hooks.map(async (h) => {
        try {
          await h()
        } catch (err) {
          consola.warn("Shutdown hook failed:", err)
        }
      }),
    )
  }

  private async closeServer() {
    const server = this.server
    if (!server) return
    this.server = null

    try {
      // Idle keep-alive sockets from the browser would otherwise hold the
      // listener open
      await server.close(true)
    } catch (err) {
      consola.warn("Failed to close server:", err)
    }
  }

  private finish(code: number): number {
    if (this.state === "stopped") return code

    for (const remove of this.removeListeners) remove()
    this.removeListeners = []

    this.state = "stopped"
    this.markStopped(code)

    if (this.exitOnShutdown) {
      this.exit(code)
    } else {
      consola.debug(`Stopped with exit code ${code} (no exit requested)`)
    }
    return code
  }

  private installProcessListeners() {
    for (const signal of SIGNALS) {
      const onSignal = () => this.handleSignal(signal)
      process.on(signal, onSignal)
      this.removeListeners.push(() => process.off(signal, onSignal))
    }

    const onFatal = (err: unknown) => {
      consola.error("Fatal error, initiating shutdown:", err)
      void this.requestShutdown("fatal")
    }
    process.on("uncaughtException", onFatal)
    process.on("unhandledRejection", onFatal)
    this.removeListeners.push(
      () => process.off("uncaughtException", onFatal),
      () => process.off("unhandledRejection", onFatal),
    )
  }
}
