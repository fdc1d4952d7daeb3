export type CommandName = "web" | "convert" | "help"

export interface Invocation {
  command: CommandName
  rawArgs: Array<string>
}

const HELP_ARGS = new Set(["help", "--help", "-h", "--version"])

// No arguments or `web` start the web interface; anything else is a
// conversion, with positionals read as [input] [output].
export function resolveInvocation(argv: Array<string>): Invocation {
  const [first, ...rest] = argv

  if (first === undefined) return { command: "web", rawArgs: [] }
  if (first === "web") return { command: "web", rawArgs: rest }
  if (first === "convert") return { command: "convert", rawArgs: rest }
  if (HELP_ARGS.has(first)) {
    return { command: "help", rawArgs: first === "help" ? ["--help"] : [first] }
  }
  return { command: "convert", rawArgs: argv }
}
