import { applyOverrides, loadConfig, parseTimeoutSeconds, type AppConfig } from "./config"
import { ConfigError, InterruptedError, InvalidUrlError } from "./errors"
import { FetchTransport, type HttpTransport } from "./lib/http"
import { createLoggers, type Loggers } from "./logger"
import { AccessProber } from "./services/access-prober"
import { DatabaseChecker } from "./services/checker"
import { renderJsonReport, renderTextReport } from "./services/render"
import { EXIT_CODES, exitCodeFor } from "./services/report"

export interface CliOptions {
  url: string
  skipWriteTest: boolean
  timeoutSeconds?: number
  json: boolean
  help: boolean
}

export interface CliIo {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export interface CliDependencies {
  env?: Record<string, string | undefined>
  io?: CliIo
  transport?: HttpTransport
  loggers?: Loggers
  signal?: AbortSignal
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

export const USAGE = `Usage: rtdb-audit <database-url> [options]

Check whether a Firebase Realtime Database allows reads or writes without
authentication.

Arguments:
  database-url            Database URL or bare host (https:// is assumed)

Options:
  --skip-write-test       Skip the write probe (faster, leaves nothing behind)
  --timeout <seconds>     Per-request timeout (default: 10)
  --json                  Print the report as JSON
  -h, --help              Show this message

Examples:
  rtdb-audit https://my-project-default-rtdb.firebaseio.com/
  rtdb-audit my-project-default-rtdb.firebaseio.com --skip-write-test
  rtdb-audit https://my-project-default-rtdb.europe-west1.firebasedatabase.app/ --timeout 5

Exit codes:
  0    no public access found
  1    database is publicly readable or writable
  2    invalid URL or configuration
  130  interrupted
`

const defaultIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text)
  },
  stderr: (text) => {
    process.stderr.write(text)
  },
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    url: "",
    skipWriteTest: false,
    json: false,
    help: false,
  }

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? ""

    if (arg === "--help" || arg === "-h") {
      options.help = true
      continue
    }

    if (arg === "--skip-write-test") {
      options.skipWriteTest = true
      continue
    }

    if (arg === "--json") {
      options.json = true
      continue
    }

    if (arg.startsWith("--timeout=")) {
      options.timeoutSeconds = parseTimeoutSeconds(arg.slice("--timeout=".length), "--timeout")
      continue
    }

    if (arg === "--timeout") {
      const next = argv[index + 1]
      if (next === undefined) {
        throw new ConfigError("--timeout requires a value")
      }
      options.timeoutSeconds = parseTimeoutSeconds(next, "--timeout")
      index += 1
      continue
    }

    if (arg.startsWith("-")) {
      throw new ConfigError(`Unknown option: ${arg}`)
    }

    if (options.url) {
      throw new ConfigError(`Unexpected argument: ${arg}`)
    }

    options.url = arg
  }

  if (!options.help && !options.url) {
    throw new ConfigError("A database URL is required")
  }

  return options
}

function resolveConfig(options: CliOptions, env: Record<string, string | undefined>): AppConfig {
  return applyOverrides(loadConfig(env), {
    timeoutSeconds: options.timeoutSeconds,
    skipWriteTest: options.skipWriteTest,
    output: options.json ? "json" : undefined,
  })
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? defaultIo

  let options: CliOptions
  let config: AppConfig
  try {
    options = parseCliArgs(argv)
    if (options.help) {
      io.stdout(USAGE)
      return EXIT_CODES.secure
    }

    config = resolveConfig(options, deps.env ?? process.env)
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(`Error: ${error.message}\n\n${USAGE}`)
      return EXIT_CODES.configError
    }
    throw error
  }

  const loggers = deps.loggers ?? createLoggers(config)
  const transport = deps.transport ?? new FetchTransport(config.maxBodyBytes)
  const prober = new AccessProber(config, transport, loggers.security, {
    now: deps.now,
    sleep: deps.sleep,
  })
  const checker = new DatabaseChecker(prober, loggers.app)

  try {
    const report = await checker.check(options.url, {
      skipWriteTest: config.skipWriteTest,
      signal: deps.signal,
    })

    io.stdout(config.output === "json" ? renderJsonReport(report) : renderTextReport(report))
    return exitCodeFor(report)
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      loggers.app.error({ input: error.input }, "invalid database URL")
      io.stderr(`Invalid URL: ${error.message}\n`)
      return EXIT_CODES.configError
    }

    if (error instanceof InterruptedError) {
      loggers.app.warn("check interrupted")
      io.stderr(`\n${error.message}\n`)
      return EXIT_CODES.interrupted
    }

    loggers.app.error({ error }, "check failed")
    io.stderr(`Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`)
    return EXIT_CODES.unexpectedError
  } finally {
    await loggers.close()
  }
}
