import consola from "consola"

export interface PeriodicCheck {
  stop: () => void
}

// Runs `check` every `intervalMs`, counted from when the previous run
// settles, so two runs never overlap. A run that throws is logged and the
// next one keeps the same cadence.
export function startPeriodicCheck(
  check: () => Promise<void>,
  intervalMs: number,
  name: string,
): PeriodicCheck {
  let stopped = false
  let timer: ReturnType<typeof setTimeout> | null = null

  const schedule = () => {
    if (stopped) return
    timer = setTimeout(() => {
      timer = null
      void run()
    }, intervalMs)
  }

  const run = async () => {
    try {
      await check()
    } catch (err) {
      consola.error(`${name} check failed:`, err)
    }
    schedule()
  }

  schedule()

  return {
    stop: () => {
      stopped = true
      if (timer) clearTimeout(timer)
      timer = null
    },
  }
}
