export type ServerStats = {
  startedAt: Date;
  totalRequests: number;
  successfulStreams: number;
  failedStreams: number;
  cacheHits: number;
  cacheMisses: number;
  lastStreamAt: Date | null;
};

function percent(part: number, whole: number): number {
  return (part / Math.max(whole, 1)) * 100;
}

export class StatsRegistry {
  private readonly stats: ServerStats;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.stats = {
      startedAt: now(),
      totalRequests: 0,
      successfulStreams: 0,
      failedStreams: 0,
      cacheHits: 0,
      cacheMisses: 0,
      lastStreamAt: null,
    };
  }

  recordRequest(): void {
    this.stats.totalRequests++;
  }

  recordStream(success: boolean): void {
    if (success) this.stats.successfulStreams++;
    else this.stats.failedStreams++;
    this.stats.lastStreamAt = this.now();
  }

  recordCache(hit: boolean): void {
    if (hit) this.stats.cacheHits++;
    else this.stats.cacheMisses++;
  }

  snapshot(): ServerStats {
    return { ...this.stats };
  }

  uptimeSeconds(): number {
    return Math.floor((this.now().getTime() - this.stats.startedAt.getTime()) / 1000);
  }

  hitRate(): number {
    return percent(this.stats.cacheHits, this.stats.cacheHits + this.stats.cacheMisses);
  }

  successRate(): number {
    return percent(this.stats.successfulStreams, this.stats.successfulStreams + this.stats.failedStreams);
  }
}
