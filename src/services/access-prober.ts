import { setTimeout as delay } from "node:timers/promises"
import type pino from "pino"
import type { AppConfig } from "../config"
import { InterruptedError } from "../errors"
import type { HttpOutcome, HttpTransport } from "../lib/http"
import type {
  CleanupOutcome,
  DatabaseTarget,
  ProbeMethod,
  ProbeResult,
  WriteProbeResult,
} from "../types"
import { classify } from "./classifier"

const SNIPPET_LENGTH = 200

export interface ReadProbe {
  label: string
  path: string
}

export const READ_PROBES: readonly ReadProbe[] = [
  { label: "root", path: ".json" },
  { label: "shallow", path: ".json?shallow=true" },
  { label: "arbitrary-path", path: "test.json" },
]

export const WRITE_PROBE_LABEL = "write"

export type ProberSettings = Pick<AppConfig, "timeoutMs" | "cleanupTimeoutMs" | "requestDelayMs">

interface AccessProberDependencies {
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

export function writeProbePath(epochSeconds: number): string {
  return `security_test_${epochSeconds}.json`
}

export class AccessProber {
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(
    private readonly settings: ProberSettings,
    private readonly transport: HttpTransport,
    private readonly logger: pino.Logger,
    dependencies: AccessProberDependencies = {},
  ) {
    this.now = dependencies.now ?? Date.now
    this.sleep = dependencies.sleep ?? ((ms) => delay(ms))
  }

  async probeReadAccess(target: DatabaseTarget, signal?: AbortSignal): Promise<ProbeResult[]> {
    const results: ProbeResult[] = []

    for (const [index, probe] of READ_PROBES.entries()) {
      if (index > 0 && this.settings.requestDelayMs > 0) {
        await this.sleep(this.settings.requestDelayMs)
      }

      assertNotInterrupted(signal)

      const url = `${target.baseUrl}${probe.path}`
      const outcome = await this.transport.get(url, this.settings.timeoutMs, signal)

      assertNotInterrupted(signal)

      const result = buildResult(probe.label, url, "GET", outcome)
      this.logResult(result)
      results.push(result)
    }

    return results
  }

  async probeWriteAccess(target: DatabaseTarget, signal?: AbortSignal): Promise<WriteProbeResult> {
    assertNotInterrupted(signal)

    const epochSeconds = Math.floor(this.now() / 1000)
    const url = `${target.baseUrl}${writeProbePath(epochSeconds)}`
    const payload = JSON.stringify({ test: "security_check", timestamp: epochSeconds })

    // Neither the write nor its release takes the run's signal: an aborted
    // PUT may already be stored, and only its answer says whether to delete.
    const outcome = await this.transport.request("PUT", url, payload, this.settings.timeoutMs)
    const base = buildResult(WRITE_PROBE_LABEL, url, "PUT", outcome)

    const cleanup: CleanupOutcome =
      base.classification === "accessible" ? await this.removeWriteArtifact(url) : "not-needed"

    const result: WriteProbeResult = Object.freeze({ ...base, cleanup })
    this.logResult(result)

    assertNotInterrupted(signal)
    return result
  }

  private async removeWriteArtifact(url: string): Promise<CleanupOutcome> {
    const outcome = await this.transport.request("DELETE", url, null, this.settings.cleanupTimeoutMs)

    if (outcome.error === null && outcome.statusCode !== null && outcome.statusCode < 300) {
      this.logger.info({ url, statusCode: outcome.statusCode }, "removed write probe artifact")
      return "deleted"
    }

    this.logger.warn(
      { url, statusCode: outcome.statusCode, error: outcome.error },
      "could not remove write probe artifact",
    )
    return "failed"
  }

  private logResult(result: ProbeResult): void {
    this.logger.info(
      {
        endpoint: result.endpointLabel,
        method: result.method,
        url: result.url,
        statusCode: result.statusCode,
        classification: result.classification,
        detail: result.detail,
      },
      "probe completed",
    )
  }
}

function assertNotInterrupted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new InterruptedError()
  }
}

function buildResult(
  endpointLabel: string,
  url: string,
  method: ProbeMethod,
  outcome: HttpOutcome,
): ProbeResult {
  const classified = classify(method, outcome.statusCode, outcome.body, outcome.error, outcome.truncated)

  return Object.freeze({
    endpointLabel,
    url,
    method,
    statusCode: outcome.statusCode,
    bodySnippet: outcome.body ? outcome.body.slice(0, SNIPPET_LENGTH) : null,
    classification: classified.classification,
    hasData:
      classified.classification === "accessible" && method === "GET" ? classified.hasData : null,
    detail: classified.classification === "error" ? classified.reason : null,
  })
}
