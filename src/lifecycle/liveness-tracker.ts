// Opaque per-connection identity; the web server uses the socket itself
export type ConnectionId = object

export interface LivenessTrackerOptions {
  now?: () => number
}

/**
 * Bookkeeping for the two liveness signals of a browser session: open
 * transport connections and the time of the last heartbeat request.
 */
export class LivenessTracker {
  private connections = new Set<ConnectionId>()
  private lastHeartbeatAt: number
  private now: () => number

  constructor(opts: LivenessTrackerOptions = {}) {
    this.now = opts.now ?? Date.now
    // Start fresh so the first monitor tick never sees a stale session
    this.lastHeartbeatAt = this.now()
  }

  onConnectionOpened(id: ConnectionId): void {
    this.connections.add(id)
  }

  onConnectionClosed(id: ConnectionId): void {
    this.connections.delete(id)
  }

  connectionCount(): number {
    return this.connections.size
  }

  recordHeartbeat(): void {
    this.lastHeartbeatAt = this.now()
  }

  // Milliseconds since the last heartbeat
  timeSinceLastHeartbeat(): number {
    return this.now() - this.lastHeartbeatAt
  }
}
