import type { StreamCache } from "../cache/streamCache";
import type { AudioUrlSource } from "../extract/extractorChain";
import { UNKNOWN_MEDIA, type MediaInfo } from "../extract/ytdlp";
import { clip, logLine } from "../log";
import type { ResolutionQueue } from "../queue/resolutionQueue";
import { normalizeQuery, type ResolutionRequest } from "../resolve/query";
import type { ResolvedSource } from "../resolve/resolver";
import type { StatsRegistry } from "../stats/statsRegistry";
import { bestEffort } from "../util/bestEffort";

export type ResolvedStream = {
  query: string;
  key: string;
  audioUrl: string;
  sourceLink: string;
  cached: boolean;
};

export interface SourceResolver {
  resolve(query: string): Promise<ResolvedSource>;
}

export interface MediaDescriber {
  describe(link: string): Promise<MediaInfo>;
}

export type StreamServiceDeps = {
  cache: StreamCache;
  resolver: SourceResolver;
  extractor: AudioUrlSource;
  describer: MediaDescriber;
  queue: ResolutionQueue;
  stats: StatsRegistry;
};

export class StreamService {
  /** One shared resolution per normalized query while it is in flight. */
  private readonly inflight = new Map<string, Promise<ResolvedStream>>();

  constructor(private readonly deps: StreamServiceDeps) {}

  get inflightCount(): number {
    return this.inflight.size;
  }

  async resolve(input: string): Promise<ResolvedStream> {
    const request = normalizeQuery(input);
    const { cache, stats } = this.deps;

    cache.sweep();
    cache.enforceCapacity();

    const hit = cache.lookup(request.key);
    if (hit) {
      stats.recordCache(true);
      logLine("[stream]", "cache_hit", { key: request.key });
      return {
        query: request.query,
        key: request.key,
        audioUrl: hit.resolvedUrl,
        sourceLink: hit.sourceLink,
        cached: true,
      };
    }
    stats.recordCache(false);

    const existing = this.inflight.get(request.key);
    if (existing) {
      logLine("[stream]", "inflight_join", { key: request.key });
      const shared = await existing;
      return { ...shared, query: request.query };
    }

    const task = this.deps.queue
      .add(() => this.resolveUncached(request))
      .finally(() => this.inflight.delete(request.key));
    this.inflight.set(request.key, task);
    return task;
  }

  /** Media lookups share the resolution queue's cap; a full queue yields unknown metadata. */
  async describe(resolved: Pick<ResolvedStream, "sourceLink">): Promise<MediaInfo> {
    const { describer, queue } = this.deps;
    return bestEffort(() => queue.add(() => describer.describe(resolved.sourceLink)), {
      fallback: { ...UNKNOWN_MEDIA },
      prefix: "[stream]",
      label: "describe_failed",
    });
  }

  clearCache(): number {
    const count = this.deps.cache.clear();
    logLine("[stream]", "cache_cleared", { count });
    return count;
  }

  private async resolveUncached(request: ResolutionRequest): Promise<ResolvedStream> {
    logLine("[stream]", "resolving", { query: request.query, directLink: request.isDirectLink });
    const link = request.isDirectLink ? request.query : (await this.deps.resolver.resolve(request.query)).link;
    const audioUrl = await this.deps.extractor.extract(link);

    const { cache } = this.deps;
    cache.insert(request.key, audioUrl, link);
    cache.enforceCapacity();
    logLine("[stream]", "cache_stored", { key: request.key, url: clip(audioUrl) });

    return { query: request.query, key: request.key, audioUrl, sourceLink: link, cached: false };
  }
}
