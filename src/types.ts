export type Classification = "restricted" | "accessible" | "error"

export type ProbeMethod = "GET" | "PUT"

export type ReadVerdict = "secure" | "vulnerable" | "unknown"

export type WriteVerdict = ReadVerdict | "skipped"

export type OverallVerdict = "secure" | "vulnerable"

export type CleanupOutcome = "not-needed" | "deleted" | "failed"

export interface DatabaseTarget {
  readonly baseUrl: string
  readonly host: string
  readonly recognizedHost: boolean
}

export type ClassifiedResponse =
  | { classification: "accessible"; hasData: boolean }
  | { classification: "restricted" }
  | { classification: "error"; reason: string }

export interface ProbeResult {
  readonly endpointLabel: string
  readonly url: string
  readonly method: ProbeMethod
  readonly statusCode: number | null
  readonly bodySnippet: string | null
  readonly classification: Classification
  readonly hasData: boolean | null
  readonly detail: string | null
}

export interface WriteProbeResult extends ProbeResult {
  readonly cleanup: CleanupOutcome
}

export interface SecurityReport {
  readonly target: DatabaseTarget
  readonly readResults: readonly ProbeResult[]
  readonly writeResult: WriteProbeResult | null
  readonly readVerdict: ReadVerdict
  readonly writeVerdict: WriteVerdict
  readonly overallVerdict: OverallVerdict
  readonly inconclusive: boolean
  readonly recommendations: readonly string[]
  readonly notes: readonly string[]
}
