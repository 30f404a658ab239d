import { appendFileSync, existsSync, mkdirSync } from "fs";
import path from "path";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export type LogThreshold = LogLevel | "SILENT";

export interface LoggerOptions {
  /** Lowest level that is written. Defaults to WARN. */
  level?: LogThreshold;
  /** Append to this file instead of writing to stderr */
  filePath?: string;
  /** Receives each formatted line when no file is configured */
  sink?: (line: string) => void;
  /** Clock used for timestamps */
  now?: () => Date;
}

export class Logger {
  private level: LogThreshold;
  private logFilePath?: string;
  private sink: (line: string) => void;
  private now: () => Date;
  private fileFailed = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.WARN;
    this.sink = options.sink ?? ((line) => process.stderr.write(line));
    this.now = options.now ?? (() => new Date());

    if (options.filePath) {
      this.logFilePath = options.filePath;

      // Ensure logs directory exists
      const logsPath = path.dirname(options.filePath);
      try {
        if (!existsSync(logsPath)) {
          mkdirSync(logsPath, { recursive: true });
        }
      } catch (error) {
        this.reportFileFailure(error);
      }
    }
  }

  /**
   * Whether a message at this level would be written
   */
  public isEnabled(level: LogLevel): boolean {
    if (this.level === "SILENT") return false;
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  /**
   * Write a log message to the log file or sink
   */
  private writeLog(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;

    const timestamp = this.now().toISOString();
    const logEntry = `${timestamp} - [${level}] ${message}\n`;

    if (!this.logFilePath) {
      this.sink(logEntry);
      return;
    }

    if (this.fileFailed) return;

    try {
      appendFileSync(this.logFilePath, logEntry, "utf8");
    } catch (error) {
      this.reportFileFailure(error);
    }
  }

  private reportFileFailure(error: unknown): void {
    if (this.fileFailed) return;
    this.fileFailed = true;
    console.error(`Failed to write to log file: ${error}`);
  }

  /**
   * Log an info message
   */
  public info(message: string): void {
    this.writeLog(LogLevel.INFO, message);
  }

  /**
   * Log an error message
   */
  public error(message: string): void {
    this.writeLog(LogLevel.ERROR, message);
  }

  /**
   * Log a debug message
   */
  public debug(message: string): void {
    this.writeLog(LogLevel.DEBUG, message);
  }

  /**
   * Log a warning message
   */
  public warn(message: string): void {
    this.writeLog(LogLevel.WARN, message);
  }

  /**
   * Get the log file path, if logging to a file
   */
  public getLogFilePath(): string | undefined {
    return this.logFilePath;
  }
}

/** A logger that drops everything */
export const silentLogger = new Logger({ level: "SILENT" });
