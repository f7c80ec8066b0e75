import type { ClassifiedResponse, ProbeMethod } from "../types"

const DENIED_STATUSES = new Set([401, 403])
const WRITE_ACCEPTED_STATUSES = new Set([200, 201])
const JSON_VALUE_START = /^\s*[{["\d\-tfn]/

/**
 * Maps one probe response onto restricted / accessible / error.
 *
 * RTDB only answers 200 when the security rules grant the request, so a 200
 * read is accessible even when the body is `null` (permitted but empty).
 * A body cut off at the read limit still proves data came back, as long as
 * it starts like a JSON value.
 */
export function classify(
  method: ProbeMethod,
  statusCode: number | null,
  body: string | null,
  transportError: string | null,
  truncated = false,
): ClassifiedResponse {
  if (transportError !== null) {
    return { classification: "error", reason: transportError }
  }

  if (statusCode === null) {
    return { classification: "error", reason: "No response received" }
  }

  if (DENIED_STATUSES.has(statusCode)) {
    return { classification: "restricted" }
  }

  if (method === "PUT") {
    return WRITE_ACCEPTED_STATUSES.has(statusCode)
      ? { classification: "accessible", hasData: true }
      : { classification: "error", reason: `Unexpected HTTP status ${statusCode}` }
  }

  if (statusCode !== 200) {
    return { classification: "error", reason: `Unexpected HTTP status ${statusCode}` }
  }

  if (truncated) {
    return JSON_VALUE_START.test(body ?? "")
      ? { classification: "accessible", hasData: true }
      : { classification: "error", reason: "Response body is not valid JSON" }
  }

  const parsed = parseJson(body ?? "")
  if (!parsed.ok) {
    return { classification: "error", reason: "Response body is not valid JSON" }
  }

  return { classification: "accessible", hasData: hasData(parsed.value) }
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown }
  } catch {
    return { ok: false }
  }
}

function hasData(value: unknown): boolean {
  if (value === null) {
    return false
  }

  if (typeof value === "object" && !Array.isArray(value)) {
    return Object.keys(value).length > 0
  }

  return true
}
