import { InvalidUrlError } from "../errors"
import type { DatabaseTarget } from "../types"

const RTDB_HOST_SUFFIXES = ["firebaseio.com", "firebasedatabase.app"]

export function isRecognizedDatabaseHost(host: string): boolean {
  const normalized = host.toLowerCase().replace(/\.+$/, "")
  return RTDB_HOST_SUFFIXES.some(
    (suffix) => normalized === suffix || normalized.endsWith(`.${suffix}`),
  )
}

/**
 * Turns user input such as `my-project-default-rtdb.firebaseio.com` into a
 * scheme-qualified database root ending in exactly one `/`.
 */
export function normalizeDatabaseUrl(raw: string): DatabaseTarget {
  const trimmed = raw.trim()
  if (!trimmed) {
    throw new InvalidUrlError(raw, "URL is empty")
  }

  const withScheme = trimmed.includes("://") ? trimmed : `https://${trimmed}`

  let parsed: URL
  try {
    parsed = new URL(withScheme)
  } catch {
    throw new InvalidUrlError(raw, "not a valid URL")
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new InvalidUrlError(raw, `unsupported scheme "${parsed.protocol.replace(/:$/, "")}"`)
  }

  if (!parsed.hostname) {
    throw new InvalidUrlError(raw, "missing host")
  }

  const path = `${parsed.pathname.replace(/\/+$/, "")}/`

  return {
    baseUrl: `${parsed.protocol}//${parsed.host}${path}`,
    host: parsed.hostname,
    recognizedHost: isRecognizedDatabaseHost(parsed.hostname),
  }
}
