import { defineCommand } from "citty"
import consola from "consola"
import type { Server } from "node:net"
import { serve } from "srvx"
import invariant from "tiny-invariant"

import { trackConnections } from "./lifecycle/connection-tracking"
import { HeartbeatMonitor } from "./lifecycle/heartbeat-monitor"
import { LivenessTracker } from "./lifecycle/liveness-tracker"
import { ShutdownScheduler } from "./lifecycle/shutdown-scheduler"
import { ServerSupervisor } from "./lifecycle/supervisor"
import {
  DEFAULT_TIMINGS,
  type LifecycleTimings,
  type ServerHandle,
  type SupervisorOptions,
} from "./lifecycle/types"
import { openBrowser } from "./lib/browser"
import { errorMessage } from "./lib/error"
import { isPortInUse } from "./lib/port-check"
import { createServer } from "./server"

interface RunWebServerOptions {
  port: number
  host: string
  open: boolean
  verbose: boolean
  webDir?: string
  timings?: Partial<LifecycleTimings>
  // Passed to the supervisor; tests run the server without ending the process
  exit?: SupervisorOptions["exit"]
  exitOnShutdown?: boolean
  handleProcessEvents?: boolean
}

export interface WebServer {
  supervisor: ServerSupervisor
  url: string
}

const WILDCARD_HOSTS = new Set(["0.0.0.0", "::", ""])

export function browserUrl(host: string, port: number): string {
  const name = WILDCARD_HOSTS.has(host) ? "localhost" : host
  return `http://${name.includes(":") ? `[${name}]` : name}:${port}`
}

// Bind the listener, surfacing bind errors (EADDRINUSE) as a rejection
// instead of an unhandled 'error' event
async function listen(
  listener: ReturnType<typeof serve>,
  nodeServer: Server,
): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    nodeServer.once("error", reject)
    void listener.ready().then(
      () => {
        nodeServer.off("error", reject)
        resolve()
      },
      reject,
    )
  })
}

// Digits only: "8080abc" and "" are rejected rather than read as 8080 and 0
export function parsePort(value: string): number {
  return /^\d+$/.test(value.trim()) ? Number(value) : Number.NaN
}

export async function runWebServer(
  options: RunWebServerOptions,
): Promise<WebServer> {
  if (options.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  const timings: LifecycleTimings = { ...DEFAULT_TIMINGS, ...options.timings }

  if (
    !Number.isInteger(options.port)
    || options.port < 0
    || options.port > 65535
  ) {
    throw new Error(`Invalid port: ${options.port}`)
  }

  if (options.port !== 0 && (await isPortInUse(options.port, options.host))) {
    throw new Error(`Port ${options.port} is already in use`)
  }

  const tracker = new LivenessTracker()
  const appServer = createServer({ tracker, webDir: options.webDir })
  let boundPort = options.port

  // Both shutdown producers call back into the supervisor, which is the one
  // place that stops the process
  const supervisor: ServerSupervisor = new ServerSupervisor(
    async (): Promise<ServerHandle> => {
      const listener = serve({
        fetch: (request) => appServer.app.fetch(request),
        port: options.port,
        hostname: options.host,
        silent: true,
      })

      const nodeServer: Server | undefined = listener.node?.server
      invariant(nodeServer, "srvx did not expose a Node.js server")

      await listen(listener, nodeServer)

      const address = nodeServer.address()
      if (address && typeof address === "object") {
        boundPort = address.port
      }

      const untrack = trackConnections(nodeServer, tracker, scheduler)

      return {
        setReadiness: appServer.setReadiness,
        activeRequests: appServer.activeRequests,
        close: async (closeActiveConnections) => {
          untrack()
          await listener.close(closeActiveConnections)
        },
      }
    },
    {
      shutdownTimeoutMs: timings.shutdownTimeoutMs,
      exit: options.exit,
      exitOnShutdown: options.exitOnShutdown,
      handleProcessEvents: options.handleProcessEvents,
    },
  )

  const scheduler = new ShutdownScheduler(tracker, {
    graceMs: timings.idleGraceMs,
    onIdle: () => {
      void supervisor.requestShutdown("no-connections", "immediate")
    },
  })

  const monitor = new HeartbeatMonitor(tracker, {
    intervalMs: timings.heartbeatCheckIntervalMs,
    warnAfterMs: timings.heartbeatWarnAfterMs,
    confirmMs: timings.heartbeatConfirmMs,
    staleAfterMs: timings.heartbeatStaleAfterMs,
    onStale: () => {
      void supervisor.requestShutdown("heartbeat-timeout")
    },
  })

  supervisor.registerHook(() => monitor.stop())
  supervisor.registerHook(() => scheduler.dispose())

  await supervisor.start()
  monitor.start()

  const url = browserUrl(options.host, boundPort)
  consola.info(`Web server listening on ${url}`)
  consola.info("Server will automatically shutdown when browser is closed")

  if (options.open) {
    const launch = setTimeout(() => openBrowser(url), timings.browserLaunchDelayMs)
    supervisor.registerHook(() => clearTimeout(launch))
  } else {
    consola.info(`Open ${url} in your browser to continue`)
  }

  return { supervisor, url }
}

export const web = defineCommand({
  meta: {
    name: "web",
    description: "Start the web interface",
  },
  args: {
    port: {
      alias: "p",
      type: "string",
      default: "8080",
      description: "Port to run web server on",
    },
    host: {
      type: "string",
      default: "localhost",
      description: "Interface to bind the web server to",
    },
    open: {
      type: "boolean",
      default: true,
      description: "Open the default browser once listening (--no-open to skip)",
    },
    verbose: {
      alias: "v",
      type: "boolean",
      default: false,
      description: "Enable verbose logging",
    },
  },
  async run({ args }) {
    consola.info("json2yaml - Web Mode")

    try {
      await runWebServer({
        port: parsePort(args.port),
        host: args.host,
        open: args.open,
        verbose: args.verbose,
      })
    } catch (error) {
      consola.error("Failed to start web interface:", errorMessage(error))
      process.exit(1)
    }
  },
})
