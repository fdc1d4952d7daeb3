import consola from "consola"

import type { LivenessTracker } from "./liveness-tracker"

import { startPeriodicCheck, type PeriodicCheck } from "./periodic-check"

export interface HeartbeatMonitorOptions {
  intervalMs: number
  warnAfterMs: number
  confirmMs: number
  staleAfterMs: number
  // Called at most once, after a confirmed stale session
  onStale: () => void
}

/**
 * Watches the heartbeat timestamp the browser page keeps fresh.
 *
 * Staleness is confirmed in two phases: crossing `warnAfterMs` opens a
 * `confirmMs` window, and the server is only shut down if the elapsed time
 * still exceeds `staleAfterMs` once the window closes. A single late beat
 * from a throttled background tab lands inside the window and cancels it.
 *
 * This catches a closed tab even while the browser keeps a keep-alive socket
 * open, which the connection count alone cannot see.
 */
export class HeartbeatMonitor {
  private handle: PeriodicCheck | null = null
  private stopped = false
  private cancelConfirm: (() => void) | null = null

  constructor(
    private tracker: LivenessTracker,
    private opts: HeartbeatMonitorOptions,
  ) {}

  start(): void {
    if (this.handle || this.stopped) return

    this.tracker.recordHeartbeat()
    this.handle = startPeriodicCheck(
      () => this.tick(),
      this.opts.intervalMs,
      "Heartbeat monitor",
    )
  }

  isRunning(): boolean {
    return this.handle !== null && !this.stopped
  }

  async stop(): Promise<void> {
    this.stopped = true
    this.cancelConfirm?.()
    this.cancelConfirm = null
    this.handle?.stop()
  }

  private async tick(): Promise<void> {
    const elapsed = this.tracker.timeSinceLastHeartbeat()
    if (elapsed <= this.opts.warnAfterMs) return

    consola.warn(
      `No heartbeat detected for ${Math.floor(elapsed / 1000)} seconds. Browser may have been closed.`,
    )

    await this.confirmWindow()
    if (this.stopped) return

    const recheck = this.tracker.timeSinceLastHeartbeat()
    if (recheck <= this.opts.staleAfterMs) {
      consola.info("Heartbeat resumed")
      return
    }

    consola.info("Browser appears to be closed. Shutting down server...")
    await this.stop()
    this.opts.onStale()
  }

  // A timer, not a blocking wait: heartbeats recorded meanwhile are visible
  // to the re-check
  private confirmWindow(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.cancelConfirm = null
        resolve()
      }, this.opts.confirmMs)

      this.cancelConfirm = () => {
        clearTimeout(timer)
        resolve()
      }
    })
  }
}
