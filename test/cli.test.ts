import { describe, expect, test } from "vitest"
import { USAGE, parseCliArgs, runCli } from "../src/cli"
import { ConfigError } from "../src/errors"
import { RECOMMENDATIONS } from "../src/services/report"
import type { SecurityReport } from "../src/types"
import { FakeTransport, byEndpoint, respond, transportFailure, silentLoggers, type Responder } from "./helpers"

const URL_INPUT = "my-project-default-rtdb.firebaseio.com"
const DENIED = '{"error":"Permission denied"}'

async function run(argv: string[], responder: Responder, signal?: AbortSignal) {
  const transport = new FakeTransport(responder)
  let stdout = ""
  let stderr = ""

  const code = await runCli(argv, {
    env: {},
    io: {
      stdout: (text) => {
        stdout += text
      },
      stderr: (text) => {
        stderr += text
      },
    },
    transport,
    loggers: silentLoggers(),
    signal,
    now: () => 1_700_000_000_000,
    sleep: async () => {},
  })

  return { code, stdout, stderr, transport }
}

function parseReport(stdout: string): SecurityReport {
  return JSON.parse(stdout) as SecurityReport
}

describe("argument parsing", () => {
  test("reads the url and flags", () => {
    expect(parseCliArgs([URL_INPUT, "--skip-write-test", "--timeout", "3", "--json"])).toEqual({
      url: URL_INPUT,
      skipWriteTest: true,
      timeoutSeconds: 3,
      json: true,
      help: false,
    })
  })

  test("accepts --timeout=<seconds>", () => {
    expect(parseCliArgs(["--timeout=1.5", URL_INPUT]).timeoutSeconds).toBe(1.5)
  })

  test("help needs no url", () => {
    expect(parseCliArgs(["--help"]).help).toBe(true)
  })

  const invalid: Array<[string[], string]> = [
    [[], "A database URL is required"],
    [[URL_INPUT, "--verbose"], "Unknown option: --verbose"],
    [[URL_INPUT, "other-db.firebaseio.com"], "Unexpected argument: other-db.firebaseio.com"],
    [[URL_INPUT, "--timeout"], "--timeout requires a value"],
    [[URL_INPUT, "--timeout", "-1"], '--timeout must be a positive number of seconds, got "-1"'],
  ]

  test.each(invalid)("rejects %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new ConfigError(message))
  })
})

describe("cli", () => {
  test("denied reads and write give a secure report and exit 0", async () => {
    const { code, stdout, transport } = await run(
      [URL_INPUT],
      byEndpoint({
        root: respond(403, DENIED),
        shallow: respond(403, DENIED),
        arbitrary: respond(403, DENIED),
        write: respond(401, DENIED),
      }),
    )

    expect(code).toBe(0)
    expect(stdout.split("\n")).toContain("OVERALL: SECURE - database appears to be properly secured")
    expect(transport.requests.map((request) => `${request.method} ${request.url}`)).toEqual([
      "GET https://my-project-default-rtdb.firebaseio.com/.json",
      "GET https://my-project-default-rtdb.firebaseio.com/.json?shallow=true",
      "GET https://my-project-default-rtdb.firebaseio.com/test.json",
      "PUT https://my-project-default-rtdb.firebaseio.com/security_test_1700000000.json",
    ])
  })

  test("a readable root gives a vulnerable report and exit 1", async () => {
    const { code, stdout } = await run(
      [URL_INPUT, "--json"],
      byEndpoint({
        root: respond(200, '{"a":1}'),
        shallow: respond(403, DENIED),
        arbitrary: respond(403, DENIED),
        write: respond(401, DENIED),
      }),
    )

    const report = parseReport(stdout)
    expect(code).toBe(1)
    expect(report.overallVerdict).toBe("vulnerable")
    expect(report.readVerdict).toBe("vulnerable")
    expect(report.recommendations.length).toBeGreaterThan(0)
    expect(report.recommendations).toContain(RECOMMENDATIONS.reviewReadRules)
  })

  test("a writable database is cleaned up and exits 1", async () => {
    const { code, stdout, transport } = await run(
      [URL_INPUT, "--json"],
      byEndpoint({
        root: respond(401, DENIED),
        shallow: respond(401, DENIED),
        arbitrary: respond(401, DENIED),
        write: respond(200, '{"test":"security_check","timestamp":1700000000}'),
      }),
    )

    const report = parseReport(stdout)
    expect(code).toBe(1)
    expect(report.writeVerdict).toBe("vulnerable")
    expect(report.writeResult?.cleanup).toBe("deleted")
    expect(transport.requests.at(-1)?.method).toBe("DELETE")
  })

  test("--skip-write-test sends no write and records skipped", async () => {
    const { code, stdout, transport } = await run(
      [URL_INPUT, "--skip-write-test", "--json"],
      () => respond(401, DENIED),
    )

    const report = parseReport(stdout)
    expect(code).toBe(0)
    expect(report.writeVerdict).toBe("skipped")
    expect(transport.requests.every((request) => request.method === "GET")).toBe(true)
  })

  test("--timeout applies to every probe", async () => {
    const { transport } = await run([URL_INPUT, "--timeout", "3"], () => respond(401, DENIED))

    expect(transport.requests.map((request) => request.timeoutMs)).toEqual([3_000, 3_000, 3_000, 3_000])
  })

  test("read timeouts are reported as undetermined", async () => {
    const { code, stdout } = await run(
      [URL_INPUT],
      byEndpoint({
        root: transportFailure("Request timed out after 10000ms"),
        shallow: transportFailure("Request timed out after 10000ms"),
        arbitrary: transportFailure("Request timed out after 10000ms"),
        write: respond(401, DENIED),
      }),
    )

    const lines = stdout.split("\n")
    expect(code).toBe(0)
    expect(lines).toContain("READ ACCESS: Could not be determined")
    expect(lines).toContain("OVERALL: NO PUBLIC ACCESS CONFIRMED - some checks could not be determined")
  })

  test("an invalid URL exits 2 before any request", async () => {
    const { code, stderr, transport } = await run(["https://"], () => respond(200, "{}"))

    expect(code).toBe(2)
    expect(stderr).toBe('Invalid URL: Invalid database URL "https://": not a valid URL\n')
    expect(transport.requests).toHaveLength(0)
  })

  test("usage errors exit 2", async () => {
    const { code, stderr, transport } = await run([URL_INPUT, "--timeout", "soon"], () => respond(200, "{}"))

    expect(code).toBe(2)
    expect(stderr).toBe(`Error: --timeout must be a positive number of seconds, got "soon"\n\n${USAGE}`)
    expect(transport.requests).toHaveLength(0)
  })

  test("--help prints usage and exits 0", async () => {
    const { code, stdout, transport } = await run(["--help"], () => respond(200, "{}"))

    expect(code).toBe(0)
    expect(stdout).toBe(USAGE)
    expect(transport.requests).toHaveLength(0)
  })

  test("an interrupted run exits 130", async () => {
    const controller = new AbortController()
    const { code, stdout, stderr } = await run(
      [URL_INPUT],
      () => {
        controller.abort()
        return transportFailure("Request aborted")
      },
      controller.signal,
    )

    expect(code).toBe(130)
    expect(stdout).toBe("")
    expect(stderr).toBe("\nCheck cancelled by user\n")
  })
})
