import http, { type ServerResponse } from "node:http";
import { createApp } from "../../app";
import { TranscodeEngine } from "../../audio/transcodeEngine";
import { StreamCache } from "../../cache/streamCache";
import { ResolutionQueue } from "../../queue/resolutionQueue";
import type { ResolvedSource } from "../../resolve/resolver";
import { StreamService } from "../../service/streamService";
import { StatsRegistry } from "../../stats/statsRegistry";
import { FakeProcess, fakeSpawner } from "../../__tests__/helpers/fakeProcess";

const DIRECT_LINK = "https://example.com/watch?v=abc123";

async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((r) => setTimeout(r, 5));
  }
}

/** A fake transcoder that writes `chunkBytes` every `everyMs` until it is killed. */
function endlessProcess(chunkBytes: number, everyMs: number): { proc: FakeProcess; stop: () => void } {
  const proc = new FakeProcess();
  const pump = setInterval(() => {
    if (!proc.exited) proc.stdout.write(Buffer.alloc(chunkBytes, 1));
  }, everyMs);
  return { proc, stop: () => clearInterval(pump) };
}

async function startServer(options: { proc?: FakeProcess; resolve?: (query: string) => Promise<ResolvedSource> } = {}) {
  const spawner = fakeSpawner(() => options.proc ?? new FakeProcess());
  const cache = new StreamCache({ ttlMs: 60_000, capacity: 10 });
  const stats = new StatsRegistry();
  const engine = new TranscodeEngine({
    ffmpegBin: "ffmpeg-test",
    killGraceMs: 50,
    idleTimeoutMs: 0,
    spawnProcess: spawner.spawnProcess,
  });
  const opened = jest.spyOn(engine, "open");
  const service = new StreamService({
    cache,
    resolver: { resolve: jest.fn(options.resolve ?? (async (_query: string): Promise<ResolvedSource> => {
      throw new Error("unexpected search");
    })) },
    extractor: { extract: async () => "https://cdn.example/audio.m4a" },
    describer: { describe: jest.fn() },
    queue: new ResolutionQueue(1, 10),
    stats,
  });
  const server = createApp({ service, engine, cache, stats }).listen(0, "127.0.0.1");
  const responses: ServerResponse[] = [];
  server.on("request", (_req: http.IncomingMessage, res: ServerResponse) => responses.push(res));
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  const { port } = address;

  const close = async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };
  return { server, port, engine, opened, stats, spawns: spawner.calls, responses, close };
}

function streamUrl(port: number, query: string): string {
  return `http://127.0.0.1:${port}/stream?q=${encodeURIComponent(query)}`;
}

describe("client disconnect", () => {
  it("terminates the transcoder when the listener goes away mid-stream", async () => {
    const { proc, stop } = endlessProcess(8192, 2);
    const ctx = await startServer({ proc });

    try {
      await new Promise<void>((resolve, reject) => {
        const req = http.get(streamUrl(ctx.port, DIRECT_LINK), (res) => {
          res.once("data", () => {
            req.destroy();
            resolve();
          });
        });
        req.on("error", (err) => {
          if (!req.destroyed) reject(err);
        });
      });

      await waitFor(() => proc.exited && ctx.engine.activeSessions === 0);
      expect(proc.kill).toHaveBeenCalledWith("SIGTERM");
      expect(proc.kill).not.toHaveBeenCalledWith("SIGKILL");
      expect(ctx.opened.mock.results[0].value.outcome).toBe("client_disconnected");
    } finally {
      stop();
      await ctx.close();
    }
  });

  it("records a disconnect, not a failure, when the client leaves while the response is backed up", async () => {
    const { proc, stop } = endlessProcess(64 * 1024, 1);
    const ctx = await startServer({ proc });

    try {
      await new Promise<void>((resolve, reject) => {
        const req = http.get(streamUrl(ctx.port, DIRECT_LINK), (res) => {
          res.once("data", () => {
            // Stop reading so the server's writes back up, then hang up.
            res.pause();
            setTimeout(() => {
              req.destroy();
              resolve();
            }, 300);
          });
        });
        req.on("error", (err) => {
          if (!req.destroyed) reject(err);
        });
      });

      await waitFor(() => proc.exited && ctx.engine.activeSessions === 0);
      const session = ctx.opened.mock.results[0].value;
      expect(session.outcome).toBe("client_disconnected");
      expect(session.bytesSent).toBeGreaterThan(0);
      expect(proc.kill).toHaveBeenCalledWith("SIGTERM");
    } finally {
      stop();
      await ctx.close();
    }
  });

  it("never starts a transcoder for a client that left during resolution", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((r) => {
      release = r;
    });
    const resolve = async (query: string): Promise<ResolvedSource> => {
      await gate;
      return { link: "https://www.youtube.com/watch?v=found1", title: query, artists: [], kind: "song" };
    };
    const ctx = await startServer({ resolve });

    try {
      const req = http.get(streamUrl(ctx.port, "slow song"));
      // The hang-up below is deliberate.
      req.on("error", () => undefined);
      await waitFor(() => ctx.responses.length === 1);
      req.destroy();
      await waitFor(() => ctx.responses[0].destroyed);

      release();
      await waitFor(() => ctx.stats.snapshot().successfulStreams === 1);

      expect(ctx.opened).not.toHaveBeenCalled();
      expect(ctx.spawns).toHaveLength(0);
      expect(ctx.engine.activeSessions).toBe(0);
    } finally {
      await ctx.close();
    }
  });
});
