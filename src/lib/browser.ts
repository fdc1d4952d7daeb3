import consola from "consola"
import { spawn } from "node:child_process"

export interface BrowserCommand {
  command: string
  args: Array<string>
}

export function browserCommand(
  platform: NodeJS.Platform,
  url: string,
): BrowserCommand {
  switch (platform) {
    case "win32": {
      return { command: "cmd", args: ["/c", "start", url] }
    }
    case "darwin": {
      return { command: "open", args: [url] }
    }
    default: {
      return { command: "xdg-open", args: [url] }
    }
  }
}

// Launch the platform default browser without waiting for it. Failure is not
// fatal: the user can still open the URL by hand.
export function openBrowser(url: string): void {
  const { command, args } = browserCommand(process.platform, url)

  const onFailure = (err: unknown) => {
    consola.warn("Failed to open browser:", err)
    consola.info(`Please open your browser and navigate to: ${url}`)
  }

  try {
    const child = spawn(command, args, {
      detached: true,
      stdio: "ignore",
      windowsHide: true,
    })
    child.once("error", onFailure)
    child.unref()
  } catch (err) {
    onFailure(err)
  }
}
