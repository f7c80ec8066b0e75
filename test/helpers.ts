import type { HttpMethod, HttpOutcome, HttpTransport } from "../src/lib/http"
import { createSilentLogger, type Loggers } from "../src/logger"
import type { ProbeResult, WriteProbeResult } from "../src/types"

export interface RecordedRequest {
  method: HttpMethod
  url: string
  body: string | null
  timeoutMs: number
  signal?: AbortSignal
}

export type Responder = (request: RecordedRequest) => HttpOutcome

export class FakeTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = []

  constructor(private readonly responder: Responder) {}

  get(url: string, timeoutMs: number, signal?: AbortSignal): Promise<HttpOutcome> {
    return this.request("GET", url, null, timeoutMs, signal)
  }

  async request(
    method: HttpMethod,
    url: string,
    body: string | null,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<HttpOutcome> {
    const recorded = { method, url, body, timeoutMs, signal }
    this.requests.push(recorded)
    return this.responder(recorded)
  }
}

export function respond(statusCode: number, body: string | null = null): HttpOutcome {
  return { statusCode, body, error: null, truncated: false }
}

export function transportFailure(error: string): HttpOutcome {
  return { statusCode: null, body: null, error, truncated: false }
}

/**
 * Answers the three read probes in order (root, shallow, arbitrary-path),
 * the write probe with `write` and cleanup deletes with `remove`.
 */
export function byEndpoint(routes: {
  root: HttpOutcome
  shallow: HttpOutcome
  arbitrary: HttpOutcome
  write?: HttpOutcome
  remove?: HttpOutcome
}): Responder {
  return (request) => {
    if (request.method === "PUT") {
      return routes.write ?? respond(401, '{"error":"Permission denied"}')
    }

    if (request.method === "DELETE") {
      return routes.remove ?? respond(200, "null")
    }

    if (request.url.endsWith(".json?shallow=true")) {
      return routes.shallow
    }

    if (request.url.endsWith("test.json")) {
      return routes.arbitrary
    }

    return routes.root
  }
}

export function silentLoggers(): Loggers {
  const app = createSilentLogger()
  return {
    app,
    security: app,
    close: async () => {},
  }
}

export function makeProbeResult(overrides: Partial<ProbeResult> = {}): ProbeResult {
  return {
    endpointLabel: "root",
    url: "https://demo-default-rtdb.firebaseio.com/.json",
    method: "GET",
    statusCode: 401,
    bodySnippet: '{"error":"Permission denied"}',
    classification: "restricted",
    hasData: null,
    detail: null,
    ...overrides,
  }
}

export function makeWriteResult(overrides: Partial<WriteProbeResult> = {}): WriteProbeResult {
  return {
    endpointLabel: "write",
    url: "https://demo-default-rtdb.firebaseio.com/security_test_1700000000.json",
    method: "PUT",
    statusCode: 401,
    bodySnippet: '{"error":"Permission denied"}',
    classification: "restricted",
    hasData: null,
    detail: null,
    cleanup: "not-needed",
    ...overrides,
  }
}
