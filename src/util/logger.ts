import { createWriteStream, mkdirSync, WriteStream } from "fs";
import { dirname } from "path";
import { errorMessage } from "../errors.js";

export type LogLevel = "info" | "warn" | "error";

export interface LoggerOptions {
  /** Prefix for console lines, usually the repository slug. */
  scope?: string;
  /** File that receives every line of this logger (append mode). */
  logFile?: string;
  clock?: () => Date;
}

const LEVEL_PREFIX: Record<LogLevel, string> = {
  info: "",
  warn: "WARN: ",
  error: "ERROR: ",
};

export function formatLine(level: LogLevel, message: string, at: Date): string {
  return `[${at.toISOString().replace(/\.\d{3}Z$/, "Z")}] ${LEVEL_PREFIX[level]}${message}`;
}

export class Logger {
  private scope?: string;
  private clock: () => Date;
  private stream?: WriteStream;

  constructor(options: LoggerOptions = {}) {
    this.scope = options.scope;
    this.clock = options.clock ?? (() => new Date());
    if (options.logFile) {
      this.open(options.logFile);
    }
  }

  private open(logFile: string): void {
    try {
      mkdirSync(dirname(logFile), { recursive: true });
    } catch (error) {
      this.reportLogFileError(logFile, error);
      return;
    }

    const stream = createWriteStream(logFile, { flags: "a" });
    let reported = false;
    stream.on("error", (error) => {
      if (this.stream === stream) this.stream = undefined;
      if (reported) return;
      reported = true;
      this.reportLogFileError(logFile, error);
    });
    this.stream = stream;
  }

  private reportLogFileError(logFile: string, error: unknown): void {
    this.error(
      `Log file ${logFile} is not writable, logging to the console only: ${errorMessage(error)}`
    );
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  /**
   * Logger for one repository pipeline: console lines get a `[scope]` prefix,
   * the log file gets the bare lines.
   */
  child(scope: string, logFile?: string): Logger {
    return new Logger({ scope, logFile, clock: this.clock });
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = undefined;
    // A write error is reported by the listener set up in open()
    await new Promise<void>((resolve) => {
      stream.once("error", () => resolve());
      stream.end(() => resolve());
    });
  }

  private write(level: LogLevel, message: string): void {
    const line = formatLine(level, message, this.clock());
    const consoleLine = this.scope ? `[${this.scope}] ${line}` : line;

    if (level === "info") {
      console.log(consoleLine);
    } else {
      console.error(consoleLine);
    }

    this.stream?.write(`${line}\n`);
  }
}
