#!/usr/bin/env node
import { runCli } from "./cli"
import { EXIT_CODES } from "./services/report"

const controller = new AbortController()

process.on("SIGINT", () => {
  if (controller.signal.aborted) {
    process.exit(EXIT_CODES.interrupted)
  }

  controller.abort()
})

runCli(process.argv.slice(2), { signal: controller.signal }).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    process.stderr.write(`Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exitCode = EXIT_CODES.unexpectedError
  },
)
