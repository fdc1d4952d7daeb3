import consola from "consola"
import { Hono } from "hono"
import { bodyLimit } from "hono/body-limit"
import { logger } from "hono/logger"
import fs from "node:fs/promises"
import path from "node:path"
import { fileURLToPath } from "node:url"

import type { LivenessTracker } from "~/lifecycle/liveness-tracker"

import { ConversionError, errorMessage } from "~/lib/error"
import { convertJsonToYaml } from "~/lib/yaml"

// The UI assets ship beside src/ and dist/, one level up from this module
// both before and after bundling
export const WEB_DIR = fileURLToPath(new URL("../web/", import.meta.url))

const MAX_BODY_BYTES = 10 * 1024 * 1024

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".css": "text/css",
  ".js": "application/javascript",
  ".json": "application/json",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".ico": "image/x-icon",
}

export function contentTypeFor(filePath: string): string {
  return (
    CONTENT_TYPES[path.extname(filePath).toLowerCase()]
    ?? "application/octet-stream"
  )
}

export interface ServerDeps {
  tracker: LivenessTracker
  webDir?: string
  convert?: (jsonContent: string) => string
}

export interface AppServer {
  app: Hono
  setReadiness: (ready: boolean) => void
  activeRequests: () => number
}

export function createServer(deps: ServerDeps): AppServer {
  const webDir = path.resolve(deps.webDir ?? WEB_DIR)
  const convert = deps.convert ?? convertJsonToYaml

  const app = new Hono()

  // Flipped off by the supervisor when shutdown begins
  let ready = true
  // In-flight requests, drained before a graceful exit
  let activeRequests = 0

  // The page polls /heartbeat every two seconds; keep access lines for --verbose
  app.use(logger((message, ...rest) => consola.debug(message, ...rest)))

  app.use(async (c, next) => {
    // If not ready, reject early to avoid starting new work when draining
    if (!ready) {
      return c.text("Server is shutting down", 503)
    }

    activeRequests += 1
    try {
      await next()
    } finally {
      activeRequests -= 1
    }
  })

  app.onError((err, c) => {
    consola.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, err)
    return c.json({ error: "Internal Server Error" }, 500)
  })

  app.get("/", async (c) => {
    let html: string
    try {
      html = await fs.readFile(path.join(webDir, "index.html"), "utf8")
    } catch (err) {
      consola.error("Failed to read index document:", err)
      return c.text("Internal Server Error", 500)
    }
    return c.html(html)
  })

  app.get("/static/*", async (c) => {
    const filePath = path.resolve(webDir, c.req.path.slice("/static/".length))
    if (!filePath.startsWith(webDir + path.sep)) {
      return c.notFound()
    }

    let data: Buffer
    try {
      data = await fs.readFile(filePath)
    } catch {
      return c.notFound()
    }

    c.header("Content-Type", contentTypeFor(filePath))
    return c.body(new Uint8Array(data))
  })

  app.post(
    "/convert",
    bodyLimit({
      maxSize: MAX_BODY_BYTES,
      onError: (c) => c.json({ error: "Request body too large" }, 413),
    }),
    async (c) => {
      let jsonContent: unknown
      try {
        const body = await c.req.parseBody()
        jsonContent = body.json_content
      } catch (err) {
        consola.debug("Failed to parse form data:", err)
        return c.json({ error: "Failed to parse form data" }, 400)
      }

      if (typeof jsonContent !== "string" || jsonContent === "") {
        return c.json({ error: "JSON content is required" }, 400)
      }

      try {
        return c.json({ yaml: convert(jsonContent) })
      } catch (err) {
        if (!(err instanceof ConversionError)) throw err
        return c.json({ error: `Conversion failed: ${errorMessage(err)}` }, 400)
      }
    },
  )

  app.all("/convert", (c) => c.text("Method not allowed", 405))

  app.post("/heartbeat", (c) => {
    deps.tracker.recordHeartbeat()
    c.header("Cache-Control", "no-store")
    return c.text("ok")
  })

  return {
    app,
    setReadiness: (value) => {
      ready = value
    },
    activeRequests: () => activeRequests,
  }
}
