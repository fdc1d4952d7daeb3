import { defineCommand } from "citty"
import clipboard from "clipboardy"
import consola from "consola"
import fs from "node:fs/promises"

import { errorMessage } from "./lib/error"
import { convertJsonToYaml } from "./lib/yaml"

export interface ConvertOptions {
  input?: string
  // Written to stdout when absent
  output?: string
  copy?: boolean
}

export async function runConvert(options: ConvertOptions): Promise<string> {
  const { input, output } = options
  if (!input) {
    throw new Error("input file is required")
  }

  let jsonContent: string
  try {
    jsonContent = await fs.readFile(input, "utf8")
  } catch (err) {
    throw new Error(`error reading file: ${errorMessage(err)}`, { cause: err })
  }

  const yaml = convertJsonToYaml(jsonContent)

  if (output) {
    try {
      await fs.writeFile(output, yaml, { mode: 0o644 })
    } catch (err) {
      throw new Error(`error writing output file: ${errorMessage(err)}`, {
        cause: err,
      })
    }
    consola.success(`Successfully converted ${input} to ${output}`)
  } else {
    process.stdout.write(yaml)
  }

  if (options.copy) {
    try {
      clipboard.writeSync(yaml)
      consola.success("Copied YAML to clipboard!")
    } catch {
      consola.warn("Failed to copy to clipboard")
    }
  }

  return yaml
}

export const convert = defineCommand({
  meta: {
    name: "convert",
    description: "Convert a JSON file to YAML (positionals: [input.json] [output.yaml])",
  },
  args: {
    input: {
      alias: "i",
      type: "string",
      description: "Input JSON file path",
    },
    output: {
      alias: "o",
      type: "string",
      description: "Output YAML file path (optional, defaults to stdout)",
    },
    copy: {
      alias: "c",
      type: "boolean",
      default: false,
      description: "Also copy the YAML to the clipboard",
    },
  },
  async run({ args }) {
    // Flags win over positionals
    const [first, second] = args._

    try {
      await runConvert({
        input: args.input || first,
        output: args.output || second,
        copy: args.copy,
      })
    } catch (err) {
      consola.error(`Error: ${errorMessage(err)}`)
      process.exit(1)
    }
  },
})
