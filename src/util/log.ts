export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(tag: string): Logger;
}

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
};

const PAINT: Record<LogLevel, (s: string) => string> = {
  trace: COLOR.gray,
  debug: COLOR.cyan,
  info: COLOR.green,
  warn: COLOR.yellow,
  error: COLOR.red,
};

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

/** Clip long payloads (tool arguments, answers) for one-line output. */
export function preview(text: string, max = 140): string {
  return text.length > max ? text.slice(0, max) + "…" : text;
}

/**
 * Tagged console logger: `[agent] message {json}`.
 * `QUIET=1` silences it regardless of level.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly level: LogLevel = "info",
    private readonly tag = "toolchat",
    private readonly quiet = process.env.QUIET === "1",
  ) {
    this.minLevel = LOG_LEVELS.indexOf(level);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  child(tag: string): Logger {
    return new ConsoleLogger(this.level, `${this.tag}:${tag}`, this.quiet);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (this.quiet || LOG_LEVELS.indexOf(level) < this.minLevel) return;
    const line = `${PAINT[level](`[${this.tag}]`)} ${message}${data ? " " + COLOR.gray(JSON.stringify(data)) : ""}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }
}

const noop = () => {};

export const silentLogger: Logger = {
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
