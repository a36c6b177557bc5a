import chalk, { Chalk, type ChalkInstance } from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Threshold index at which nothing is printed */
const SILENT = LOG_LEVELS.length;
const DEFAULT_THRESHOLD = LOG_LEVELS.indexOf("info");

export interface LoggerOptions {
  /** Each -v lowers the threshold by one, each -q raises it */
  verbosity?: number;
  color?: boolean;
  timestamps?: boolean;
  write?: (stream: "stdout" | "stderr", text: string) => void;
  now?: () => Date;
}

function defaultWrite(stream: "stdout" | "stderr", text: string): void {
  process[stream].write(text);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Leveled console logger. debug and info go to stdout, the rest to stderr.
 */
export class Logger {
  readonly threshold: number;
  private colors: ChalkInstance;
  private timestamps: boolean;
  private write: (stream: "stdout" | "stderr", text: string) => void;
  private now: () => Date;

  constructor(options: LoggerOptions = {}) {
    const verbosity = options.verbosity ?? 0;
    this.threshold = Math.min(SILENT, Math.max(0, DEFAULT_THRESHOLD - verbosity));
    this.colors = options.color === false ? new Chalk({ level: 0 }) : chalk;
    this.timestamps = options.timestamps ?? true;
    this.write = options.write ?? defaultWrite;
    this.now = options.now ?? (() => new Date());
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  fatal(message: string): void {
    this.log("fatal", message);
  }

  private label(level: LogLevel): string {
    const c = this.colors;
    switch (level) {
      case "debug":
        return c.blue("[") + c.blueBright("debug") + c.blue("]");
      case "info":
        return c.green("[") + c.greenBright("info") + c.green("]") + " ";
      case "warn":
        return c.yellow("[") + c.yellowBright("warn") + c.yellow("]") + " ";
      case "error":
        return c.red("[") + c.redBright("error") + c.red("]");
      case "fatal":
        return c.red("[") + c.redBright("fatal") + c.red("]");
    }
  }

  private log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;

    const prefix = this.timestamps
      ? `${this.colors.cyan(formatTimestamp(this.now()))} ${this.colors.gray("|")} ${this.label(level)}  `
      : `${this.label(level)}  `;
    // Continuation lines line up under the first line's text
    const indent = " ".repeat(this.timestamps ? 31 : 9);

    const text = message
      .split("\n")
      .map((line, index) => (index === 0 ? prefix : indent) + line)
      .join("\n");

    this.write(level === "debug" || level === "info" ? "stdout" : "stderr", `${text}\n`);
  }
}

/** A logger that prints nothing. */
export function createSilentLogger(): Logger {
  return new Logger({ verbosity: -LOG_LEVELS.length });
}
