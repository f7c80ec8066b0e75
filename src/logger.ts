import { mkdirSync } from "node:fs"
import { resolve } from "node:path"
import type { Writable } from "node:stream"
import pino from "pino"
import { createStream } from "rotating-file-stream"
import type { AppConfig } from "./config"

export interface Loggers {
  app: pino.Logger
  security: pino.Logger
  close(): Promise<void>
}

function endStream(stream: Writable): Promise<void> {
  return new Promise((resolveEnd) => {
    stream.end(() => resolveEnd())
  })
}

export function createLoggers(config: Pick<AppConfig, "logDir" | "logLevel">): Loggers {
  if (!config.logDir) {
    // stdout carries the report, so console logging goes to stderr
    const destination = pino.destination({ dest: 2, sync: true })
    const app = pino(
      {
        level: config.logLevel,
        base: { service: "rtdb-audit" },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      destination,
    )

    return {
      app,
      security: app.child({ channel: "security" }),
      close: async () => {},
    }
  }

  const resolvedLogDir = resolve(config.logDir)
  mkdirSync(resolvedLogDir, { recursive: true })

  const appStream = createStream("app.log", {
    size: "10M",
    rotate: 10,
    path: resolvedLogDir,
    compress: "gzip",
  })

  const securityStream = createStream("security.log", {
    size: "10M",
    rotate: 30,
    path: resolvedLogDir,
    compress: "gzip",
  })

  const app = pino(
    {
      level: config.logLevel,
      base: {
        service: "rtdb-audit",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    appStream,
  )

  const security = pino(
    {
      level: config.logLevel,
      base: {
        service: "rtdb-audit-security",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    securityStream,
  )

  return {
    app,
    security,
    close: async () => {
      await Promise.all([endStream(appStream), endStream(securityStream)])
    },
  }
}

export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" })
}
