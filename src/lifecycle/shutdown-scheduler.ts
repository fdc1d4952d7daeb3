import consola from "consola"

import type { LivenessTracker } from "./liveness-tracker"

export interface ShutdownSchedulerOptions {
  graceMs: number
  // Called when the grace window elapses with no connection open
  onIdle: () => void
}

// Debounces connection churn into a single delayed shutdown request. A page
// reload drops and re-opens sockets within milliseconds; only a gap longer
// than graceMs counts as the browser being gone.
export class ShutdownScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null
  private disposed = false

  constructor(
    private tracker: LivenessTracker,
    private opts: ShutdownSchedulerOptions,
  ) {}

  // Must run after every mutation of the connection set. It never awaits, so
  // the event loop serializes concurrent evaluations.
  onConnectionCountChanged(): void {
    if (this.disposed) return

    this.cancel()
    if (this.tracker.connectionCount() > 0) return

    consola.debug(
      `No open connections, shutting down in ${this.opts.graceMs}ms unless one opens`,
    )
    this.timer = setTimeout(() => this.fire(), this.opts.graceMs)
  }

  isPending(): boolean {
    return this.timer !== null
  }

  // Cancel the pending timer and ignore further notifications. Used during
  // shutdown, when the server closing its own sockets would re-arm the timer.
  dispose(): void {
    this.disposed = true
    this.cancel()
  }

  private cancel() {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }

  private fire() {
    this.timer = null
    if (this.disposed) return

    // A connection may have opened between scheduling and firing
    const open = this.tracker.connectionCount()
    if (open > 0) {
      consola.debug("Idle timer fired with open connections; ignoring", { open })
      return
    }

    consola.info("No active connections detected. Shutting down server...")
    this.opts.onIdle()
  }
}
