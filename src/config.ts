import "dotenv/config";
import { isLogLevel, type LogLevel } from "./log";

export type Config = {
  port: number;
  host: string;
  ffmpegBin: string;
  ytdlpBin: string;
  ytdlpCookies: string;
  cacheTtlSeconds: number;
  cacheMaxSize: number;
  extractTimeoutSeconds: number;
  fallbackInstances: string[];
  killGraceMs: number;
  streamIdleTimeoutMs: number;
  resolveConcurrency: number;
  resolveMaxPending: number;
  logLevel: LogLevel;
};

export const DEFAULT_FALLBACK_INSTANCES = [
  "https://co.wuk.sh",
  "https://api.cobalt.best",
  "https://cobalt.tools",
  "https://cobalt.pub",
];

export function readInt(name: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value)) return fallback;
  return value;
}

export function readList(name: string, fallback: string[], env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = env[name];
  if (raw === undefined) return fallback;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => (s.endsWith("/") ? s.slice(0, -1) : s));
}

function readLogLevel(name: string, fallback: LogLevel): LogLevel {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return isLogLevel(raw) ? raw : fallback;
}

export const config: Config = {
  port: readInt("PORT", 7879),
  host: process.env.HOST ?? "0.0.0.0",
  ffmpegBin: process.env.FFMPEG_BIN ?? "ffmpeg",
  ytdlpBin: process.env.YTDLP_BIN ?? "yt-dlp",
  ytdlpCookies: process.env.YTDLP_COOKIES ?? "",
  cacheTtlSeconds: readInt("CACHE_TTL_SECONDS", 1800),
  cacheMaxSize: readInt("CACHE_MAX_SIZE", 100),
  extractTimeoutSeconds: readInt("EXTRACT_TIMEOUT_SECONDS", 15),
  fallbackInstances: readList("FALLBACK_INSTANCES", DEFAULT_FALLBACK_INSTANCES),
  killGraceMs: readInt("KILL_GRACE_MS", 2000),
  streamIdleTimeoutMs: readInt("STREAM_IDLE_TIMEOUT_MS", 30_000),
  resolveConcurrency: readInt("RESOLVE_CONCURRENCY", 4),
  resolveMaxPending: readInt("RESOLVE_MAX_PENDING", 50),
  logLevel: readLogLevel("LOG_LEVEL", "info"),
};

export function validateConfig(): void {
  const positive: Array<[string, number]> = [
    ["PORT", config.port],
    ["CACHE_TTL_SECONDS", config.cacheTtlSeconds],
    ["CACHE_MAX_SIZE", config.cacheMaxSize],
    ["EXTRACT_TIMEOUT_SECONDS", config.extractTimeoutSeconds],
    ["KILL_GRACE_MS", config.killGraceMs],
    ["RESOLVE_CONCURRENCY", config.resolveConcurrency],
    ["RESOLVE_MAX_PENDING", config.resolveMaxPending],
  ];
  for (const [name, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`${name} must be a positive integer.`);
    }
  }
  // 0 disables the idle watchdog.
  if (!Number.isFinite(config.streamIdleTimeoutMs) || config.streamIdleTimeoutMs < 0) {
    throw new Error("STREAM_IDLE_TIMEOUT_MS must be zero or a positive integer.");
  }
  for (const instance of config.fallbackInstances) {
    if (!/^https?:\/\//.test(instance)) {
      throw new Error(`FALLBACK_INSTANCES entry is not an http(s) URL: ${instance}`);
    }
  }
}
