import { afterEach, describe, it, expect, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import packageJson from "../../package.json";
import { helpText, installInterruptHandler, runCli, USAGE, type CliIO } from "./run";

function captureIO() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  };
  return { io, out, err };
}

const quiet = { env: { CVSS_EXPLAIN_LOG_LEVEL: "silent" }, colorSupported: false };

describe("runCli", () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of tempDirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("prints usage and fails without arguments", () => {
    const { io, out, err } = captureIO();

    expect(runCli([], io, quiet)).toBe(1);
    expect(err).toEqual([USAGE]);
    expect(out).toEqual([]);
  });

  it("prints usage and fails with more than one argument", () => {
    const { io, out, err } = captureIO();

    expect(runCli(["CVSS2#AV:N", "CVSS:3.1/AV:Q"], io, quiet)).toBe(1);
    expect(err).toEqual(["Usage: cvss-explain <cvss-vector>"]);
    expect(out).toEqual([]);
  });

  it("explains a v3 vector", () => {
    const { io, out, err } = captureIO();

    expect(runCli(["CVSS:3.1/AV:N/AC:L/PR:H/UI:N/S:U/C:L/I:L/A:N"], io, quiet)).toBe(0);
    expect(err).toEqual([]);
    expect(out).toHaveLength(10);
    expect(out[0]).toBe("");
    expect(out[1]).toBe("AV -> Network (N): The attacker can remotely exploit the vulnerability.");
    expect(out[5]).toBe(
      "S -> Unchanged (U): An exploited vulnerability can only affect resources managed by the same security authority. In this case, the vulnerable component and the impacted component are either the same, or both are managed by the same security authority."
    );
    expect(out[8]).toBe("A -> None (N): There is no impact to availability within the impacted component.");
    expect(out[9]).toBe("");
  });

  it("trims the argument", () => {
    const { io, out } = captureIO();

    expect(runCli(["  CVSS2#AV:L/AC:H  "], io, quiet)).toBe(0);
    expect(out).toEqual([
      "",
      "AV -> Local (L): The attacker must have physical or logical access to the affected system.",
      'AC -> High (H): Exploiting the vulnerability requires "specialized" conditions that would be difficult to find.',
      "",
    ]);
  });

  it("reports an unknown metric value without partial output", () => {
    const { io, out, err } = captureIO();

    expect(runCli(["CVSS:3.1/AV:N/AC:L/PR:H/UI:N/S:U/C:Z/I:L/A:N"], io, quiet)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(["Error: Unknown metric value 'Z' for identifier C"]);
  });

  it("reports a malformed vector", () => {
    const { io, out, err } = captureIO();

    expect(runCli(["CVSS:3.1/AV:N/AC"], io, quiet)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(["Error: Invalid vector format: segment 'AC' has no ':' separator"]);
  });

  it("reports invalid configuration", () => {
    const { io, out, err } = captureIO();

    expect(runCli(["CVSS2#AV:N"], io, { env: { CVSS_EXPLAIN_LOG_LEVEL: "loud" } })).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([
      "Error: Invalid configuration for CVSS_EXPLAIN_LOG_LEVEL: must be one of debug, info, warn, error, silent",
    ]);
  });

  it("prints help", () => {
    const { io, out } = captureIO();

    expect(runCli(["--help"], io, quiet)).toBe(0);
    expect(out).toEqual(helpText());
    expect(out).toContain(USAGE);
  });

  it("prints the version", () => {
    const { io, out } = captureIO();

    expect(runCli(["-v"], io, quiet)).toBe(0);
    expect(out).toEqual([`v${packageJson.version}`]);
  });

  it("prints help and version even when the configuration is invalid", () => {
    const env = { CVSS_EXPLAIN_LOG_LEVEL: "loud" };
    const help = captureIO();
    const version = captureIO();

    expect(runCli(["-h"], help.io, { env })).toBe(0);
    expect(help.out).toEqual(helpText());
    expect(help.err).toEqual([]);

    expect(runCli(["--version"], version.io, { env })).toBe(0);
    expect(version.out).toEqual([`v${packageJson.version}`]);
    expect(version.err).toEqual([]);
  });

  it("still explains the vector when the log file cannot be created", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const dir = mkdtempSync(path.join(os.tmpdir(), "cvss-explain-cli-"));
    tempDirs.push(dir);
    const plainFile = path.join(dir, "plain.txt");
    writeFileSync(plainFile, "not a directory");
    const { io, out, err } = captureIO();

    const code = runCli(["CVSS2#AV:N"], io, {
      env: { CVSS_EXPLAIN_LOG_LEVEL: "info", CVSS_EXPLAIN_LOG_FILE: path.join(plainFile, "sub", "cli.log") },
      colorSupported: false,
    });

    expect(code).toBe(0);
    expect(out).toEqual([
      "",
      "AV -> Network (N): The attacker can remotely exploit the vulnerability.",
      "",
    ]);
    expect(err).toEqual([]);
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it("logs to the configured file", () => {
    const dir = mkdtempSync(path.join(os.tmpdir(), "cvss-explain-cli-"));
    tempDirs.push(dir);
    const logFile = path.join(dir, "cli.log");
    const { io } = captureIO();

    const code = runCli(["CVSS2#AV:N/AC:L/Au:N/C:C/I:C/A:C"], io, {
      env: { CVSS_EXPLAIN_LOG_LEVEL: "info", CVSS_EXPLAIN_LOG_FILE: logFile },
      colorSupported: false,
    });

    expect(code).toBe(0);
    const lines = readFileSync(logFile, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - \[INFO\] Explained 6 metrics for CVSS2#AV:N\/AC:L\/Au:N\/C:C\/I:C\/A:C$/
    );
  });
});

describe("installInterruptHandler", () => {
  it("exits with status 1 when the interrupt fires", () => {
    const register = vi.fn<(handler: () => void) => void>();
    const exit = vi.fn<(code: number) => void>();

    installInterruptHandler(register, exit);

    expect(register).toHaveBeenCalledTimes(1);
    expect(exit).not.toHaveBeenCalled();
    register.mock.calls[0]?.[0]();
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
