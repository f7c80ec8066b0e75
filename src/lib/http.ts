import { ProbeTransportError } from "../errors"

export type HttpMethod = "GET" | "PUT" | "DELETE"

export interface HttpOutcome {
  statusCode: number | null
  body: string | null
  error: string | null
  truncated: boolean
}

/**
 * Unauthenticated HTTP capability used by the prober. Implementations never
 * throw: every failure is reported through `error`.
 */
export interface HttpTransport {
  get(url: string, timeoutMs: number, signal?: AbortSignal): Promise<HttpOutcome>
  request(
    method: HttpMethod,
    url: string,
    body: string | null,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<HttpOutcome>
}

type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

interface FetchTransportDependencies {
  fetchImpl?: FetchLike
  setTimeoutImpl?: typeof setTimeout
  clearTimeoutImpl?: typeof clearTimeout
}

export class FetchTransport implements HttpTransport {
  private readonly fetchImpl: FetchLike
  private readonly setTimeoutImpl: typeof setTimeout
  private readonly clearTimeoutImpl: typeof clearTimeout

  constructor(
    private readonly maxBodyBytes: number,
    dependencies: FetchTransportDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.setTimeoutImpl = dependencies.setTimeoutImpl ?? setTimeout
    this.clearTimeoutImpl = dependencies.clearTimeoutImpl ?? clearTimeout
  }

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
    const controller = new AbortController()
    let timedOut = false
    const timeoutHandle = this.setTimeoutImpl(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)

    const onAbort = () => controller.abort()
    if (signal?.aborted) {
      controller.abort()
    } else {
      signal?.addEventListener("abort", onAbort, { once: true })
    }

    let statusCode: number | null = null
    try {
      const response = await this.fetchImpl(url, {
        method,
        body: body ?? undefined,
        redirect: "manual",
        signal: controller.signal,
      })
      statusCode = response.status

      const read = await readBodyWithLimit(response, this.maxBodyBytes)
      return { statusCode, body: read.text, error: null, truncated: read.truncated }
    } catch (error) {
      const transportError = toTransportError(error, timedOut, timeoutMs, signal?.aborted === true)
      return { statusCode, body: null, error: transportError.message, truncated: false }
    } finally {
      this.clearTimeoutImpl(timeoutHandle)
      signal?.removeEventListener("abort", onAbort)
    }
  }
}

function toTransportError(
  error: unknown,
  timedOut: boolean,
  timeoutMs: number,
  interrupted: boolean,
): ProbeTransportError {
  if (timedOut) {
    return new ProbeTransportError(`Request timed out after ${timeoutMs}ms`)
  }

  if (interrupted) {
    return new ProbeTransportError("Request aborted")
  }

  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : ""
    return new ProbeTransportError(`Connection error: ${error.message}${cause}`)
  }

  return new ProbeTransportError(`Connection error: ${String(error)}`)
}

async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
): Promise<{ text: string; truncated: boolean }> {
  const reader = response.body?.getReader()
  if (!reader) {
    return { text: "", truncated: false }
  }

  let total = 0
  let truncated = false
  const chunks: Uint8Array[] = []

  while (true) {
    const result = await reader.read()
    if (result.done) {
      break
    }

    const remaining = maxBytes - total
    if (result.value.byteLength > remaining) {
      chunks.push(result.value.subarray(0, remaining))
      total += remaining
      truncated = true
      await reader.cancel()
      break
    }

    total += result.value.byteLength
    chunks.push(result.value)
  }

  const merged = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    merged.set(chunk, offset)
    offset += chunk.byteLength
  }

  return { text: new TextDecoder().decode(merged), truncated }
}
