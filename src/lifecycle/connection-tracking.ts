import type { Server, Socket } from "node:net"

import type { LivenessTracker } from "./liveness-tracker"
import type { ShutdownScheduler } from "./shutdown-scheduler"

// Feed transport-level connection state into the tracker. Each transition
// mutates the set once and re-evaluates the idle timer once.
export function trackConnections(
  server: Server,
  tracker: LivenessTracker,
  scheduler: ShutdownScheduler,
): () => void {
  const onConnection = (socket: Socket) => {
    tracker.onConnectionOpened(socket)
    scheduler.onConnectionCountChanged()

    socket.once("close", () => {
      tracker.onConnectionClosed(socket)
      scheduler.onConnectionCountChanged()
    })
  }

  server.on("connection", onConnection)

  return () => {
    server.off("connection", onConnection)
  }
}
