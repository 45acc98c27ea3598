import { StatsRegistry } from "../statsRegistry";

describe("StatsRegistry", () => {
  it("counts requests, streams and cache lookups", () => {
    let now = new Date("2026-01-01T00:00:00Z");
    const stats = new StatsRegistry(() => now);

    stats.recordRequest();
    stats.recordRequest();
    stats.recordCache(false);
    stats.recordCache(true);
    stats.recordCache(true);
    stats.recordCache(true);
    now = new Date("2026-01-01T00:01:30Z");
    stats.recordStream(true);
    stats.recordStream(false);

    expect(stats.snapshot()).toEqual({
      startedAt: new Date("2026-01-01T00:00:00Z"),
      totalRequests: 2,
      successfulStreams: 1,
      failedStreams: 1,
      cacheHits: 3,
      cacheMisses: 1,
      lastStreamAt: new Date("2026-01-01T00:01:30Z"),
    });
    expect(stats.uptimeSeconds()).toBe(90);
    expect(stats.hitRate()).toBe(75);
    expect(stats.successRate()).toBe(50);
  });

  it("reports zero rates before any traffic", () => {
    const stats = new StatsRegistry();
    expect(stats.hitRate()).toBe(0);
    expect(stats.successRate()).toBe(0);
    expect(stats.snapshot().lastStreamAt).toBeNull();
  });
});
