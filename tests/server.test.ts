import { test, expect } from "vitest"

import { LivenessTracker } from "../src/lifecycle/liveness-tracker"
import { contentTypeFor, createServer } from "../src/server"

function setup(convert?: (jsonContent: string) => string) {
  let now = 1_000
  const tracker = new LivenessTracker({ now: () => now })
  const server = createServer({ tracker, convert })
  const advance = (ms: number) => {
    now += ms
  }
  return { tracker, server, app: server.app, advance }
}

function form(fields: Record<string, string>): FormData {
  const body = new FormData()
  for (const [key, value] of Object.entries(fields)) body.append(key, value)
  return body
}

test("heartbeat refreshes the tracker and is never cached", async () => {
  const { tracker, app, advance } = setup()
  advance(4000)
  expect(tracker.timeSinceLastHeartbeat()).toBe(4000)

  const res = await app.request("/heartbeat", { method: "POST" })

  expect(res.status).toBe(200)
  expect(await res.text()).toBe("ok")
  expect(res.headers.get("cache-control")).toBe("no-store")
  expect(tracker.timeSinceLastHeartbeat()).toBe(0)
})

test("convert returns YAML for a multipart body", async () => {
  const { app } = setup()

  const res = await app.request("/convert", {
    method: "POST",
    body: form({ json_content: '{"name": "demo", "tags": ["a", "b"]}' }),
  })

  expect(res.status).toBe(200)
  expect(await res.json()).toEqual({ yaml: "name: demo\ntags:\n  - a\n  - b\n" })
})

test("convert accepts a urlencoded body", async () => {
  const { app } = setup()

  const res = await app.request("/convert", {
    method: "POST",
    body: new URLSearchParams({ json_content: "[1, 2]" }),
  })

  expect(res.status).toBe(200)
  expect(await res.json()).toEqual({ yaml: "- 1\n- 2\n" })
})

test("malformed JSON is a 400 with the parser message", async () => {
  const { app } = setup()

  const res = await app.request("/convert", {
    method: "POST",
    body: form({ json_content: '{"a":' }),
  })

  expect(res.status).toBe(400)
  expect(await res.json()).toEqual({
    error: expect.stringMatching(/^Conversion failed: failed to parse JSON: /),
  })
})

test("missing or empty json_content is a request error", async () => {
  const { app } = setup()

  const empty = await app.request("/convert", {
    method: "POST",
    body: form({ json_content: "" }),
  })
  expect(empty.status).toBe(400)
  expect(await empty.json()).toEqual({ error: "JSON content is required" })

  const missing = await app.request("/convert", {
    method: "POST",
    body: form({ other: "{}" }),
  })
  expect(missing.status).toBe(400)
  expect(await missing.json()).toEqual({ error: "JSON content is required" })
})

test("convert rejects bodies over 10 MiB", async () => {
  const { app } = setup()

  const res = await app.request("/convert", {
    method: "POST",
    body: new URLSearchParams({
      json_content: "x".repeat(10 * 1024 * 1024 + 1),
    }),
  })

  expect(res.status).toBe(413)
  expect(await res.json()).toEqual({ error: "Request body too large" })
})

test("convert only answers POST", async () => {
  const { app } = setup()

  const res = await app.request("/convert")

  expect(res.status).toBe(405)
  expect(await res.text()).toBe("Method not allowed")
})

test("unexpected converter failures are a 500", async () => {
  const { app } = setup(() => {
    throw new TypeError("converter bug")
  })

  const res = await app.request("/convert", {
    method: "POST",
    body: form({ json_content: "{}" }),
  })

  expect(res.status).toBe(500)
  expect(await res.json()).toEqual({ error: "Internal Server Error" })
})

test("index serves the UI document", async () => {
  const { app } = setup()

  const res = await app.request("/")

  expect(res.status).toBe(200)
  expect(res.headers.get("content-type")).toMatch(/^text\/html/)
  expect(await res.text()).toContain('<script src="/static/script.js"></script>')
})

test("index is missing when the asset directory is", async () => {
  const server = createServer({
    tracker: new LivenessTracker(),
    webDir: "/nonexistent/json2yaml-web",
  })

  const res = await server.app.request("/")

  expect(res.status).toBe(500)
  expect(await res.text()).toBe("Internal Server Error")
})

test("static assets carry a content type from their extension", async () => {
  const { app } = setup()

  const css = await app.request("/static/style.css")
  expect(css.status).toBe(200)
  expect(css.headers.get("content-type")).toBe("text/css")

  const js = await app.request("/static/script.js")
  expect(js.status).toBe(200)
  expect(js.headers.get("content-type")).toBe("application/javascript")
})

test("unknown paths and missing assets are 404", async () => {
  const { app } = setup()

  expect((await app.request("/static/missing.css")).status).toBe(404)
  expect((await app.request("/static/%2e%2e/package.json")).status).toBe(404)
  expect((await app.request("/favicon.ico")).status).toBe(404)
})

test("content types fall back to octet-stream", () => {
  expect(contentTypeFor("web/STYLE.CSS")).toBe("text/css")
  expect(contentTypeFor("web/index.html")).toBe("text/html; charset=utf-8")
  expect(contentTypeFor("web/archive.tar")).toBe("application/octet-stream")
  expect(contentTypeFor("web/README")).toBe("application/octet-stream")
})

test("requests are refused once the server stops being ready", async () => {
  const { server, tracker, advance } = setup()
  server.setReadiness(false)
  advance(2000)

  const res = await server.app.request("/heartbeat", { method: "POST" })

  expect(res.status).toBe(503)
  expect(await res.text()).toBe("Server is shutting down")
  expect(tracker.timeSinceLastHeartbeat()).toBe(2000)
})

test("in-flight requests are counted until they finish", async () => {
  let seen = -1
  let activeRequests = () => -1
  const { server } = setup(() => {
    seen = activeRequests()
    return "ok: true\n"
  })
  activeRequests = server.activeRequests

  const res = await server.app.request("/convert", {
    method: "POST",
    body: form({ json_content: "{}" }),
  })

  expect(res.status).toBe(200)
  expect(seen).toBe(1)
  expect(server.activeRequests()).toBe(0)
})
