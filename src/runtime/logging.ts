import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): void;
}

function render(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/** Mirrors console output to `logFile` until `shutdown` is called. */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.write(`[${new Date().toISOString()}] --- tool host session started ---\n`);

  const original = {
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  let streamFailed = false;
  stream.on("error", (err) => {
    if (streamFailed) return;
    streamFailed = true;
    original.error(`Log file ${resolvedLog} is no longer writable:`, err);
  });

  const mirror =
    (level: keyof typeof original) =>
    (...args: unknown[]) => {
      original[level](...args);
      if (streamFailed) return;
      const message = args.map(render).join(" ");
      stream.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}\n`);
    };

  console.debug = mirror("debug");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  const shutdown = () => {
    console.debug = original.debug;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    stream.write(`[${new Date().toISOString()}] --- tool host session ended ---\n`);
    stream.end();
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
