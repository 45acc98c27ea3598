import express, { type Request, type Response } from "express";
import { CONSTRAINED_PROFILE, DOWNLOAD_PROFILE, WEB_PROFILE } from "../audio/profiles";
import type { TranscodeEngine } from "../audio/transcodeEngine";
import type { StreamCache } from "../cache/streamCache";
import { errorMessage, logLine, logWarn } from "../log";
import { composeQuery } from "../resolve/query";
import type { ResolvedStream, StreamService } from "../service/streamService";
import type { StatsRegistry } from "../stats/statsRegistry";
import { NO_CACHE_HEADERS, sendTranscodedAudio } from "./audioResponse";
import { errorCode, statusFor } from "./errors";
import { getRequestId } from "./requestContext";

export type RouteDeps = {
  service: StreamService;
  engine: TranscodeEngine;
  cache: StreamCache;
  stats: StatsRegistry;
};

// Values the device firmware reads from /stream_pcm; they describe the
// announced stream, not the encoder settings.
const DEVICE_ANNOUNCED_FORMAT = { bitrate: 128, sample_rate: 44100, channels: 2 } as const;

const BUSY_MESSAGE = "Máy chủ đang bận, vui lòng thử lại sau";
const TRANSCODE_FAILED_MESSAGE = "Lỗi khi chuyển đổi âm thanh";

/** Plain-text body for a failure status: not found, busy, or a broken transcoder. */
function failureText(status: number, notFound: string, busy: string, failed: string): string {
  if (status === 404) return notFound;
  if (status === 503) return busy;
  return failed;
}

function readParam(req: Request, name: string): string {
  const value = req.query?.[name];
  return typeof value === "string" ? value.trim() : "";
}

function unixTime(): number {
  return Math.floor(Date.now() / 1000);
}

/** Filename for downloads: path separators replaced, at most 100 characters. */
export function downloadFilename(title: string, artist: string, query: string): string {
  const base = title === "Unknown" ? query : `${title} - ${artist}`;
  return base.replace(/[/\\]/g, "_").slice(0, 100);
}

export function createRoutes(deps: RouteDeps): express.Router {
  const { service, engine, cache, stats } = deps;
  const router = express.Router();

  /**
   * Resolves `query`, or answers the request through `fail` and returns
   * undefined. Unexpected errors propagate to the error middleware.
   */
  async function resolveOr(
    prefix: string,
    query: string,
    fail: (status: number, err: unknown) => void
  ): Promise<ResolvedStream | undefined> {
    try {
      return await service.resolve(query);
    } catch (err) {
      const status = statusFor(err);
      if (status === undefined) throw err;
      if (status === 404) stats.recordStream(false);
      logWarn(prefix, "resolve_failed", { query, status, code: errorCode(err), message: errorMessage(err) });
      fail(status, err);
      return undefined;
    }
  }

  router.get("/stream", async (req, res, next) => {
    try {
      const prefix = `[${getRequestId(req)}]`;
      stats.recordRequest();
      const query = readParam(req, "q");
      if (!query) {
        return res.status(400).type("text/plain").send("Thiếu tên bài hát. Sử dụng: /stream?q=tên_bài_hát");
      }
      logLine(prefix, "stream_request", { query });

      const textFailure = (status: number) =>
        res
          .status(status)
          .type("text/plain")
          .send(
            failureText(
              status,
              `Không tìm thấy bài hát: ${query}`,
              `${BUSY_MESSAGE}: ${query}`,
              `${TRANSCODE_FAILED_MESSAGE}: ${query}`
            )
          );

      const resolved = await resolveOr(prefix, query, textFailure);
      if (!resolved) return;
      stats.recordStream(true);

      await sendTranscodedAudio({
        res,
        engine,
        sourceUrl: resolved.audioUrl,
        profile: WEB_PROFILE,
        prefix,
        prepare: (r) =>
          r.set({
            "Content-Type": "audio/mpeg",
            ...NO_CACHE_HEADERS,
            "Content-Disposition": `inline; filename="${encodeURIComponent(query)}.mp3"`,
          }),
        onStartFailure: textFailure,
      });
    } catch (err) {
      next(err);
    }
  });

  router.get("/esp32_stream", async (req, res, next) => {
    try {
      const prefix = `[${getRequestId(req)}]`;
      stats.recordRequest();
      const song = readParam(req, "song");
      const singer = readParam(req, "singer");
      if (!song) return res.status(400).type("text/plain").send("Missing song parameter");

      const query = composeQuery(song, singer);
      logLine(prefix, "device_stream_request", { query });

      const textFailure = (status: number) =>
        res
          .status(status)
          .type("text/plain")
          .send(failureText(status, "Song not found", "Server busy", "Transcoding failed"));

      const resolved = await resolveOr(prefix, query, textFailure);
      if (!resolved) return;
      stats.recordStream(true);

      await sendTranscodedAudio({
        res,
        engine,
        sourceUrl: resolved.audioUrl,
        profile: CONSTRAINED_PROFILE,
        prefix,
        prepare: (r) =>
          r.set({
            "Content-Type": "audio/mpeg",
            ...NO_CACHE_HEADERS,
            "X-Content-Type-Options": "nosniff",
          }),
        onStartFailure: textFailure,
      });
    } catch (err) {
      next(err);
    }
  });

  router.get("/stream_pcm", async (req, res, next) => {
    try {
      const prefix = `[${getRequestId(req)}]`;
      stats.recordRequest();
      const song = readParam(req, "song");
      const singer = readParam(req, "singer");
      if (!song) {
        return res.status(400).json({
          error: "Thiếu tham số song",
          artist: "",
          title: "",
          audio_url: "",
          lyric_url: "",
        });
      }

      const query = composeQuery(song, singer);
      logLine(prefix, "device_info_request", { song, singer });

      const resolved = await resolveOr(prefix, query, (status) =>
        res.status(status).json({
          error: status === 404 ? `Không tìm thấy bài hát: ${query}` : BUSY_MESSAGE,
          artist: singer,
          title: song,
          audio_url: "",
          lyric_url: "",
        })
      );
      if (!resolved) return;
      stats.recordStream(true);

      const info = await service.describe(resolved);
      const title = info.title === "Unknown" ? song : info.title;
      const artist = singer && info.artist === "Unknown" ? singer : info.artist;
      const audioUrl =
        `${req.protocol}://${req.get("host") ?? "localhost"}/esp32_stream` +
        `?song=${encodeURIComponent(song)}&singer=${encodeURIComponent(singer)}`;

      logLine(prefix, "device_info_response", { title, artist });
      res.json({
        artist,
        title,
        audio_url: audioUrl,
        lyric_url: "",
        error: "",
        ...DEVICE_ANNOUNCED_FORMAT,
      });
    } catch (err) {
      next(err);
    }
  });

  router.get("/api/music", async (req, res, next) => {
    try {
      const prefix = `[${getRequestId(req)}]`;
      stats.recordRequest();
      const query = readParam(req, "q");
      if (!query) return res.status(400).json({ success: false, error: "Thiếu tên bài hát", code: 400 });
      logLine(prefix, "api_request", { query });

      const resolved = await resolveOr(prefix, query, (status) =>
        res.status(status).json({
          success: false,
          error: status === 404 ? `Không tìm thấy bài hát: ${query}` : BUSY_MESSAGE,
          code: status,
        })
      );
      if (!resolved) return;

      const info = await service.describe(resolved);
      const q = encodeURIComponent(query);
      res.json({
        success: true,
        data: {
          query,
          title: info.title,
          artist: info.artist,
          duration: info.duration,
          thumbnail: info.thumbnail,
          description: info.description,
          audio_url: resolved.audioUrl,
          stream_url: `/stream?q=${q}`,
          download_url: `/download?q=${q}`,
          api_url: `/api/music?q=${q}`,
        },
        timestamp: unixTime(),
      });
    } catch (err) {
      next(err);
    }
  });

  router.get("/download", async (req, res, next) => {
    try {
      const prefix = `[${getRequestId(req)}]`;
      stats.recordRequest();
      const query = readParam(req, "q");
      if (!query) return res.status(400).type("text/plain").send("Thiếu tên bài hát");
      logLine(prefix, "download_request", { query });

      const textFailure = (status: number) =>
        res
          .status(status)
          .type("text/plain")
          .send(failureText(status, "Không tìm thấy bài hát", BUSY_MESSAGE, TRANSCODE_FAILED_MESSAGE));

      const resolved = await resolveOr(prefix, query, textFailure);
      if (!resolved) return;

      const info = await service.describe(resolved);
      const filename = downloadFilename(info.title, info.artist, query);

      await sendTranscodedAudio({
        res,
        engine,
        sourceUrl: resolved.audioUrl,
        profile: DOWNLOAD_PROFILE,
        prefix,
        prepare: (r) => {
          r.attachment(`${filename}.mp3`);
          r.set({ "Content-Type": "audio/mpeg", "Cache-Control": "no-cache, no-store" });
        },
        onStartFailure: textFailure,
      });
    } catch (err) {
      next(err);
    }
  });

  router.get("/clear_cache", (_req, res) => {
    const count = service.clearCache();
    res.json({
      success: true,
      message: `Đã xóa ${count} mục cache`,
      cache_size: cache.size,
      timestamp: unixTime(),
    });
  });

  router.get("/status", (_req, res) => {
    cache.sweep();
    const snapshot = stats.snapshot();
    res.json({
      status: "running",
      uptime_seconds: stats.uptimeSeconds(),
      start_time: snapshot.startedAt.toISOString(),
      current_time: new Date().toISOString(),
      cache_size: cache.size,
      cache_max_size: cache.capacity,
      cache_duration_seconds: Math.round(cache.ttlMs / 1000),
      active_streams: engine.activeSessions,
      stats: snapshot,
      timestamp: unixTime(),
    });
  });

  router.get("/stats", (_req, res) => {
    const uptime = stats.uptimeSeconds();
    const snapshot = stats.snapshot();
    res.json({
      server_stats: snapshot,
      cache_stats: {
        current_size: cache.size,
        max_size: cache.capacity,
        duration_seconds: Math.round(cache.ttlMs / 1000),
        hit_rate: stats.hitRate(),
      },
      performance: {
        uptime_seconds: uptime,
        requests_per_hour: uptime > 0 ? snapshot.totalRequests / (uptime / 3600) : 0,
        success_rate: stats.successRate(),
        active_streams: engine.activeSessions,
      },
    });
  });

  router.get("/debug", (req, res) => {
    res.json({
      client: {
        ip: req.ip ?? "",
        user_agent: req.get("user-agent") ?? null,
        method: req.method,
      },
      server: {
        host: req.get("host") ?? "",
        timestamp: unixTime(),
      },
      cache: {
        size: cache.size,
        max_size: cache.capacity,
      },
    });
  });

  router.get("/health", (_req: Request, res: Response) => res.json({ status: "ok" }));

  return router;
}
