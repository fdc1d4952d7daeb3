export type LifecycleState =
  | "init"
  | "starting"
  | "serving"
  | "shutting-down"
  | "stopped"
  | "failed"

// graceful drains in-flight requests first; immediate skips the drain because
// nobody is left to observe it
export type ShutdownMode = "graceful" | "immediate"

export type ShutdownReason =
  | "SIGINT"
  | "SIGTERM"
  | "SIGHUP"
  | "SIGBREAK"
  | "heartbeat-timeout"
  | "no-connections"
  | "fatal"

export interface LifecycleTimings {
  // Delay between the last connection closing and shutdown
  idleGraceMs: number
  heartbeatCheckIntervalMs: number
  // Staleness that starts the confirmation window
  heartbeatWarnAfterMs: number
  heartbeatConfirmMs: number
  // Staleness that, after confirmation, shuts the server down
  heartbeatStaleAfterMs: number
  // Upper bound on waiting for in-flight requests during a graceful shutdown
  shutdownTimeoutMs: number
  browserLaunchDelayMs: number
}

export const DEFAULT_TIMINGS: LifecycleTimings = {
  idleGraceMs: 5000,
  heartbeatCheckIntervalMs: 1000,
  heartbeatWarnAfterMs: 5000,
  heartbeatConfirmMs: 1000,
  heartbeatStaleAfterMs: 6000,
  shutdownTimeoutMs: 10000,
  browserLaunchDelayMs: 500,
}

// What the supervisor needs from a started listener
export interface ServerHandle {
  setReadiness: (ready: boolean) => void
  activeRequests: () => number
  // closeActiveConnections also drops idle keep-alive sockets
  close: (closeActiveConnections: boolean) => Promise<void>
}

export interface SupervisorOptions {
  shutdownTimeoutMs?: number
  // When false, do not call process.exit() after shutdown (tests, embedding)
  exitOnShutdown?: boolean
  // When false, signal and fatal-error listeners are not installed
  handleProcessEvents?: boolean
  exit?: (code: number) => void
}
