import type {
  DatabaseTarget,
  OverallVerdict,
  ProbeResult,
  ReadVerdict,
  SecurityReport,
  WriteProbeResult,
  WriteVerdict,
} from "../types"

export const EXIT_CODES = {
  secure: 0,
  vulnerable: 1,
  unexpectedError: 1,
  configError: 2,
  interrupted: 130,
} as const

export const RECOMMENDATIONS = {
  reviewReadRules:
    'Review the database read rules (".read") and deny reads to unauthenticated clients',
  reviewWriteRules:
    'Review the database write rules (".write") and require authentication for every write',
  rotateExposedData:
    "Treat stored data as exposed: rotate any secrets kept in the database and migrate sensitive records",
  restrictToAuthenticated: "Restrict database access to authenticated users only",
  monitorAccess: "Monitor database usage and access logs for unexpected traffic",
} as const

type RecommendationKey = keyof typeof RECOMMENDATIONS

const READ_ONLY_EXPOSED: RecommendationKey[] = [
  "reviewReadRules",
  "restrictToAuthenticated",
  "monitorAccess",
]
const WRITE_ONLY_EXPOSED: RecommendationKey[] = [
  "reviewWriteRules",
  "restrictToAuthenticated",
  "monitorAccess",
]
const FULLY_EXPOSED: RecommendationKey[] = [
  "reviewReadRules",
  "reviewWriteRules",
  "rotateExposedData",
  "restrictToAuthenticated",
  "monitorAccess",
]

const RECOMMENDATION_TABLE: Record<`${ReadVerdict}:${WriteVerdict}`, RecommendationKey[]> = {
  "secure:secure": [],
  "secure:unknown": [],
  "secure:skipped": [],
  "secure:vulnerable": WRITE_ONLY_EXPOSED,
  "unknown:secure": [],
  "unknown:unknown": [],
  "unknown:skipped": [],
  "unknown:vulnerable": WRITE_ONLY_EXPOSED,
  "vulnerable:secure": READ_ONLY_EXPOSED,
  "vulnerable:unknown": READ_ONLY_EXPOSED,
  "vulnerable:skipped": READ_ONLY_EXPOSED,
  "vulnerable:vulnerable": FULLY_EXPOSED,
}

export function readVerdictFor(results: readonly ProbeResult[]): ReadVerdict {
  if (results.some((result) => result.classification === "accessible")) {
    return "vulnerable"
  }

  if (results.length > 0 && results.every((result) => result.classification === "restricted")) {
    return "secure"
  }

  return "unknown"
}

export function writeVerdictFor(result: ProbeResult | null): WriteVerdict {
  if (result === null) {
    return "skipped"
  }

  if (result.classification === "accessible") {
    return "vulnerable"
  }

  return result.classification === "restricted" ? "secure" : "unknown"
}

function buildNotes(
  target: DatabaseTarget,
  readResults: readonly ProbeResult[],
  writeResult: WriteProbeResult | null,
  readVerdict: ReadVerdict,
  writeVerdict: WriteVerdict,
): string[] {
  const notes: string[] = []

  if (!target.recognizedHost) {
    notes.push(`Host ${target.host} does not look like a Firebase Realtime Database host`)
  }

  if (readVerdict === "vulnerable") {
    const exposesData = readResults.some((result) => result.hasData === true)
    notes.push(
      exposesData
        ? "The database returned data to an unauthenticated client"
        : "Reads are permitted but the database returned no data (empty or null)",
    )
  }

  if (readVerdict === "unknown") {
    notes.push("Read access could not be determined: no probe returned a conclusive answer")
  }

  if (writeVerdict === "unknown") {
    notes.push("Write access could not be determined: the write probe did not return a conclusive answer")
  }

  if (writeVerdict === "skipped") {
    notes.push("Write access was not tested")
  }

  if (writeResult?.cleanup === "failed") {
    notes.push(`Could not remove the write probe artifact; delete ${writeResult.url} manually`)
  }

  return notes
}

/**
 * Folds probe results into read/write verdicts, an overall verdict and
 * recommendations. Pure: identical inputs give an identical report.
 */
export function aggregate(
  target: DatabaseTarget,
  readResults: readonly ProbeResult[],
  writeResult: WriteProbeResult | null,
): SecurityReport {
  const readVerdict = readVerdictFor(readResults)
  const writeVerdict = writeVerdictFor(writeResult)
  const overallVerdict: OverallVerdict =
    readVerdict === "vulnerable" || writeVerdict === "vulnerable" ? "vulnerable" : "secure"

  const recommendations = RECOMMENDATION_TABLE[`${readVerdict}:${writeVerdict}`].map(
    (key) => RECOMMENDATIONS[key],
  )

  return {
    target,
    readResults: [...readResults],
    writeResult,
    readVerdict,
    writeVerdict,
    overallVerdict,
    inconclusive: readVerdict === "unknown" || writeVerdict === "unknown",
    recommendations,
    notes: buildNotes(target, readResults, writeResult, readVerdict, writeVerdict),
  }
}

export function exitCodeFor(report: SecurityReport): number {
  return report.overallVerdict === "vulnerable" ? EXIT_CODES.vulnerable : EXIT_CODES.secure
}
