#!/usr/bin/env node

import { defineCommand, runMain } from "citty"

import { resolveInvocation } from "./cli"
import { convert } from "./convert"
import { web } from "./web"

const main = defineCommand({
  meta: {
    name: "json2yaml",
    version: "1.0.0",
    description: `Convert JSON files to YAML format.

  json2yaml                          Start the web interface
  json2yaml web [--port 8080]        Start the web interface
  json2yaml input.json               Convert and print to stdout
  json2yaml input.json output.yaml   Convert and save to a file

The web interface exits on its own once the browser tab is closed.`,
  },
  subCommands: { web, convert },
})

const { command, rawArgs } = resolveInvocation(process.argv.slice(2))

switch (command) {
  case "web": {
    void runMain(web, { rawArgs })
    break
  }
  case "convert": {
    void runMain(convert, { rawArgs })
    break
  }
  case "help": {
    void runMain(main, { rawArgs })
    break
  }
}
