import pc from "picocolors";
import packageJson from "../../package.json";
import { Config } from "../core/config";
import { Logger } from "../core/logger";
import {
  explainVector,
  InvalidVectorError,
  UnknownMetricValueError,
} from "../lib/cvss";
import { renderExplanation } from "./render";

export const USAGE = "Usage: cvss-explain <cvss-vector>";

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  colorSupported?: boolean;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function helpText(): string[] {
  return [
    "cvss-explain - Explain the metrics of a CVSS vector string",
    "",
    USAGE,
    "",
    "Examples:",
    "  cvss-explain 'CVSS2#AV:N/AC:L/Au:N/C:C/I:C/A:C'",
    "  cvss-explain 'CVSS:3.1/AV:N/AC:L/PR:H/UI:N/S:U/C:L/I:L/A:N'",
    "",
    "Options:",
    "  -h, --help         Show this help message",
    "  -v, --version      Show version number",
    "",
    "Environment:",
    "  CVSS_EXPLAIN_LOG_LEVEL   debug, info, warn (default), error or silent",
    "  CVSS_EXPLAIN_LOG_FILE    Append log lines to this file instead of stderr",
    "  NO_COLOR / FORCE_COLOR   Disable or force colored output",
  ];
}

/**
 * Exit with status 1 on an interrupt. No cleanup runs first.
 */
export function installInterruptHandler(
  register: (handler: () => void) => void = (handler) => {
    process.on("SIGINT", handler);
  },
  exit: (code: number) => void = (code) => process.exit(code)
): void {
  register(() => exit(1));
}

/**
 * Run the command line with the arguments after the script name.
 * Returns the process exit code.
 */
export function runCli(args: string[], io: CliIO = consoleIO, options: CliOptions = {}): number {
  if (args.length !== 1) {
    io.err(USAGE);
    return 1;
  }

  const [input = ""] = args;

  if (input === "help" || input === "--help" || input === "-h") {
    for (const line of helpText()) io.out(line);
    return 0;
  }

  if (input === "version" || input === "--version" || input === "-v") {
    io.out(`v${packageJson.version}`);
    return 0;
  }

  let config: Config.Info;
  try {
    config = Config.load(options.env, options.colorSupported);
  } catch (error) {
    if (Config.ConfigError.isInstance(error)) {
      io.err(`Error: ${error.data.message}`);
      return 1;
    }
    throw error;
  }

  const colors = pc.createColors(config.color);
  const logger = new Logger({ level: config.logLevel, filePath: config.logFile });

  try {
    const explanation = explainVector(input, { logger });
    logger.info(`Explained ${Object.keys(explanation.definitions).length} metrics for ${explanation.vector}`);

    for (const line of renderExplanation(explanation.definitions, colors)) {
      io.out(line);
    }
    return 0;
  } catch (error) {
    if (InvalidVectorError.isInstance(error) || UnknownMetricValueError.isInstance(error)) {
      logger.error(`${error.name}: ${error.data.message}`);
      io.err(colors.red(`Error: ${error.data.message}`));
      return 1;
    }
    throw error;
  }
}
