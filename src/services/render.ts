import type { ProbeResult, ReadVerdict, SecurityReport, WriteProbeResult, WriteVerdict } from "../types"

const RULE = "=".repeat(60)

const READ_HEADLINES: Record<ReadVerdict, string> = {
  vulnerable: "PUBLICLY READABLE - no authentication required",
  secure: "Read access properly restricted",
  unknown: "Could not be determined",
}

const WRITE_HEADLINES: Record<WriteVerdict, string> = {
  vulnerable: "PUBLICLY WRITABLE - anyone can modify data",
  secure: "Write access properly restricted",
  unknown: "Could not be determined",
  skipped: "Skipped",
}

function overallHeadline(report: SecurityReport): string {
  if (report.overallVerdict === "vulnerable") {
    return "INSECURE - immediate action required"
  }

  return report.inconclusive
    ? "NO PUBLIC ACCESS CONFIRMED - some checks could not be determined"
    : "SECURE - database appears to be properly secured"
}

function describeProbe(result: ProbeResult | WriteProbeResult): string[] {
  const lines = [`  ${result.endpointLabel} (${result.method} ${result.url})`]

  if (result.classification === "error") {
    lines.push(`    Status: error - ${result.detail ?? "unknown failure"}`)
  } else {
    lines.push(`    Status code: ${result.statusCode ?? "none"}`)
    lines.push(`    Classification: ${result.classification}`)
  }

  if (result.hasData !== null) {
    lines.push(`    Has data: ${result.hasData ? "yes" : "no"}`)
  }

  if ("cleanup" in result) {
    lines.push(`    Cleanup: ${result.cleanup}`)
  }

  return lines
}

export function renderTextReport(report: SecurityReport): string {
  const lines: string[] = [
    RULE,
    "FIREBASE REALTIME DATABASE SECURITY REPORT",
    RULE,
    "",
    `Database URL: ${report.target.baseUrl}`,
    "",
    `READ ACCESS: ${READ_HEADLINES[report.readVerdict]}`,
    `WRITE ACCESS: ${WRITE_HEADLINES[report.writeVerdict]}`,
    "",
    `OVERALL: ${overallHeadline(report)}`,
  ]

  if (report.recommendations.length > 0) {
    lines.push("", "RECOMMENDATIONS:")
    report.recommendations.forEach((recommendation, index) => {
      lines.push(`  ${index + 1}. ${recommendation}`)
    })
  }

  if (report.notes.length > 0) {
    lines.push("", "NOTES:")
    for (const note of report.notes) {
      lines.push(`  - ${note}`)
    }
  }

  lines.push("", "DETAILED RESULTS:")
  for (const result of report.readResults) {
    lines.push(...describeProbe(result))
  }

  if (report.writeResult) {
    lines.push(...describeProbe(report.writeResult))
  }

  return `${lines.join("\n")}\n`
}

export function renderJsonReport(report: SecurityReport): string {
  return `${JSON.stringify(report, null, 2)}\n`
}
