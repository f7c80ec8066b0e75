import type pino from "pino"
import { normalizeDatabaseUrl } from "../lib/database-url"
import type { SecurityReport, WriteProbeResult } from "../types"
import type { AccessProber } from "./access-prober"
import { aggregate } from "./report"

export type Prober = Pick<AccessProber, "probeReadAccess" | "probeWriteAccess">

export interface CheckOptions {
  skipWriteTest: boolean
  signal?: AbortSignal
}

export class DatabaseChecker {
  constructor(
    private readonly prober: Prober,
    private readonly logger: pino.Logger,
  ) {}

  async check(rawUrl: string, options: CheckOptions): Promise<SecurityReport> {
    const target = normalizeDatabaseUrl(rawUrl)
    if (!target.recognizedHost) {
      this.logger.warn({ host: target.host }, "host does not look like a Firebase Realtime Database")
    }

    this.logger.info({ baseUrl: target.baseUrl }, "testing read access")
    const readResults = await this.prober.probeReadAccess(target, options.signal)

    let writeResult: WriteProbeResult | null = null
    if (options.skipWriteTest) {
      this.logger.info({ baseUrl: target.baseUrl }, "skipping write access test")
    } else {
      this.logger.info({ baseUrl: target.baseUrl }, "testing write access")
      writeResult = await this.prober.probeWriteAccess(target, options.signal)
    }

    const report = aggregate(target, readResults, writeResult)
    this.logger.info(
      {
        baseUrl: target.baseUrl,
        readVerdict: report.readVerdict,
        writeVerdict: report.writeVerdict,
        overallVerdict: report.overallVerdict,
      },
      "check completed",
    )

    return report
  }
}
