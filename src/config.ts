import { z } from "zod"
import { ConfigError } from "./errors"

export type OutputFormat = "text" | "json"
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"

export interface AppConfig {
  timeoutMs: number
  cleanupTimeoutMs: number
  requestDelayMs: number
  maxBodyBytes: number
  skipWriteTest: boolean
  output: OutputFormat
  logLevel: LogLevel
  logDir: string
}

export interface CliOverrides {
  timeoutSeconds?: number
  skipWriteTest?: boolean
  output?: OutputFormat
}

const EnvSchema = z.object({
  RTDB_AUDIT_TIMEOUT_SECONDS: z.string().optional(),
  RTDB_AUDIT_CLEANUP_TIMEOUT_SECONDS: z.string().optional(),
  RTDB_AUDIT_REQUEST_DELAY_MS: z.string().optional(),
  RTDB_AUDIT_MAX_BODY_BYTES: z.string().optional(),
  RTDB_AUDIT_SKIP_WRITE_TEST: z.string().optional(),
  RTDB_AUDIT_OUTPUT: z.enum(["text", "json"]).default("text"),
  RTDB_AUDIT_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  RTDB_AUDIT_LOG_DIR: z.string().default(""),
})

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

export function parseTimeoutSeconds(value: string, name: string): number {
  const parsed = Number(value.trim())
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive number of seconds, got "${value}"`)
  }

  return parsed
}

export function secondsToMs(seconds: number): number {
  return Math.max(1, Math.round(seconds * 1000))
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue?.path.join(".") ?? "environment"
    throw new ConfigError(`Invalid ${where}: ${issue?.message ?? "unrecognized value"}`)
  }

  const parsed = result.data
  const timeoutSeconds = parsed.RTDB_AUDIT_TIMEOUT_SECONDS
    ? parseTimeoutSeconds(parsed.RTDB_AUDIT_TIMEOUT_SECONDS, "RTDB_AUDIT_TIMEOUT_SECONDS")
    : 10
  const cleanupSeconds = parsed.RTDB_AUDIT_CLEANUP_TIMEOUT_SECONDS
    ? parseTimeoutSeconds(
        parsed.RTDB_AUDIT_CLEANUP_TIMEOUT_SECONDS,
        "RTDB_AUDIT_CLEANUP_TIMEOUT_SECONDS",
      )
    : 5

  return {
    timeoutMs: secondsToMs(timeoutSeconds),
    cleanupTimeoutMs: secondsToMs(cleanupSeconds),
    requestDelayMs: toMinInteger(parsed.RTDB_AUDIT_REQUEST_DELAY_MS, 500, 0),
    maxBodyBytes: toMinInteger(parsed.RTDB_AUDIT_MAX_BODY_BYTES, 1_000_000, 1024),
    skipWriteTest: toBoolean(parsed.RTDB_AUDIT_SKIP_WRITE_TEST, false),
    output: parsed.RTDB_AUDIT_OUTPUT,
    logLevel: parsed.RTDB_AUDIT_LOG_LEVEL,
    logDir: parsed.RTDB_AUDIT_LOG_DIR.trim(),
  }
}

export function applyOverrides(config: AppConfig, overrides: CliOverrides): AppConfig {
  return {
    ...config,
    timeoutMs:
      overrides.timeoutSeconds === undefined
        ? config.timeoutMs
        : secondsToMs(overrides.timeoutSeconds),
    skipWriteTest: overrides.skipWriteTest || config.skipWriteTest,
    output: overrides.output ?? config.output,
  }
}
