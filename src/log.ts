export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let minLevel: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(WEIGHTS, value);
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function write(level: Exclude<LogLevel, "silent">, prefix: string, msg: string, extra?: Record<string, unknown>) {
  if (WEIGHTS[level] < WEIGHTS[minLevel]) return;
  const ts = new Date().toISOString();
  const tail = extra ? ` ${JSON.stringify(extra)}` : "";
  const line = `[${ts}] ${level.toUpperCase()} ${prefix} ${msg}${tail}`;
  if (level === "error" || level === "warn") console.error(line);
  else console.log(line);
}

export function logLine(prefix: string, msg: string, extra?: Record<string, unknown>) {
  write("info", prefix, msg, extra);
}

export function logDebug(prefix: string, msg: string, extra?: Record<string, unknown>) {
  write("debug", prefix, msg, extra);
}

export function logWarn(prefix: string, msg: string, extra?: Record<string, unknown>) {
  write("warn", prefix, msg, extra);
}

export function logError(prefix: string, msg: string, extra?: Record<string, unknown>) {
  write("error", prefix, msg, extra);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Shortens long upstream URLs before they go into a log line. */
export function clip(value: string, max = 80): string {
  return value.length > max ? `${value.slice(0, max)}…` : value;
}
