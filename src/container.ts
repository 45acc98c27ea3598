import { TranscodeEngine } from "./audio/transcodeEngine";
import { StreamCache } from "./cache/streamCache";
import type { Config } from "./config";
import { ExtractorChain } from "./extract/extractorChain";
import { FallbackInstances } from "./extract/fallbackInstances";
import { YtDlpExtractor } from "./extract/ytdlp";
import type { RouteDeps } from "./http/routes";
import { ResolutionQueue } from "./queue/resolutionQueue";
import { Resolver } from "./resolve/resolver";
import { YouTubeMusicSearch } from "./resolve/youtubeSearch";
import { StreamService } from "./service/streamService";
import { StatsRegistry } from "./stats/statsRegistry";

/** Wires the production services from configuration. */
export function createContainer(cfg: Config): RouteDeps {
  const ytdlp = new YtDlpExtractor({
    bin: cfg.ytdlpBin,
    socketTimeoutSeconds: cfg.extractTimeoutSeconds,
    cookiesFile: cfg.ytdlpCookies || undefined,
  });
  const fallback = new FallbackInstances({
    instances: cfg.fallbackInstances,
    timeoutMs: cfg.extractTimeoutSeconds * 1000,
  });

  const cache = new StreamCache({ ttlMs: cfg.cacheTtlSeconds * 1000, capacity: cfg.cacheMaxSize });
  const stats = new StatsRegistry();
  const service = new StreamService({
    cache,
    resolver: new Resolver(new YouTubeMusicSearch()),
    extractor: new ExtractorChain(ytdlp, fallback),
    describer: ytdlp,
    queue: new ResolutionQueue(cfg.resolveConcurrency, cfg.resolveMaxPending),
    stats,
  });
  const engine = new TranscodeEngine({
    ffmpegBin: cfg.ffmpegBin,
    killGraceMs: cfg.killGraceMs,
    idleTimeoutMs: cfg.streamIdleTimeoutMs,
  });

  return { service, engine, cache, stats };
}
