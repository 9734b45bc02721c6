import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (msg: string, ctx?: Record<string, unknown>) => void;
  info: (msg: string, ctx?: Record<string, unknown>) => void;
  warn: (msg: string, ctx?: Record<string, unknown>) => void;
  error: (msg: string, ctx?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  // Directory for a per-run log file; console only when unset
  logDir?: string;
  sink?: (line: string, level: LogLevel) => void;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const lower = (value ?? "").toLowerCase();
  return LEVELS.find((lvl) => lvl === lower) ?? fallback;
}

function openRunFile(logDir: string): fs.WriteStream {
  const runStamp = new Date().toISOString().replace(/[:.]/g, "-");
  fs.mkdirSync(logDir, { recursive: true });
  return fs.createWriteStream(path.join(logDir, `run-${runStamp}.log`), { flags: "a" });
}

function consoleSink(line: string, level: LogLevel): void {
  // eslint-disable-next-line no-console
  console[level === "debug" ? "log" : level](line);
}

// Errors become plain objects so they survive JSON.stringify
function serializeContext(ctx: Record<string, unknown>): string {
  return JSON.stringify(ctx, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    return value;
  });
}

export function createLogger(level: LogLevel = "info", options: LoggerOptions = {}): Logger {
  const minIdx = LEVELS.indexOf(level);
  const sink = options.sink ?? consoleSink;

  let fileStream = options.logDir ? openRunFile(options.logDir) : null;
  fileStream?.on("error", (err) => {
    fileStream = null;
    sink(`${new Date().toISOString()} [warn] logger:file:disabled ${serializeContext({ err })}`, "warn");
  });

  function log(lvl: LogLevel, msg: string, ctx?: Record<string, unknown>) {
    if (LEVELS.indexOf(lvl) < minIdx) return;
    const payload = ctx ? ` ${serializeContext(ctx)}` : "";
    const line = `${new Date().toISOString()} [${lvl}] ${msg}${payload}`;
    sink(line, lvl);
    fileStream?.write(line + "\n");
  }

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
  };
}

export default createLogger;

export const logger: Logger = createLogger(parseLogLevel(process.env.LOG_LEVEL), {
  logDir: process.env.LOG_DIR || undefined,
});
