import type { LoggerPort, LogLevel } from "../../ports/sys/LoggerPort";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function format(scope: string | undefined, message: string, meta?: Record<string, unknown>): string {
  const prefixed = scope ? `[${scope}] ${message}` : message;
  if (!meta || !Object.keys(meta).length) return prefixed;
  try {
    return `${prefixed} ${JSON.stringify(meta)}`;
  } catch {
    return `${prefixed} ${String(meta)}`;
  }
}

function write(level: LogLevel, payload: string) {
  switch (level) {
    case "debug":
      return console.debug(payload);
    case "info":
      return console.info(payload);
    case "warn":
      return console.warn(payload);
    case "error":
      return console.error(payload);
  }
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
}

export class ConsoleLogger implements LoggerPort {
  private readonly threshold: number;

  constructor(private readonly options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? "info"];
  }

  /** Same threshold, messages prefixed with `[scope]`. */
  child(scope: string): ConsoleLogger {
    const nested = this.options.scope ? `${this.options.scope}:${scope}` : scope;
    return new ConsoleLogger({ ...this.options, scope: nested });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < this.threshold) return;
    write(level, format(this.options.scope, message, meta));
  }
}
