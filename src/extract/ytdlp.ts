import { clip, logLine } from "../log";
import { isRecord, numberField, stringField } from "../util/json";
import { spawnPiped, waitForExit, type SpawnProcess } from "../util/process";
import { pickUserAgent } from "./userAgents";

export type MediaInfo = {
  title: string;
  artist: string;
  duration: number;
  thumbnail: string;
  description: string;
};

export const UNKNOWN_MEDIA: MediaInfo = {
  title: "Unknown",
  artist: "Unknown",
  duration: 0,
  thumbnail: "",
  description: "",
};

export const AUDIO_FORMAT_PREFERENCE = "bestaudio[ext=m4a]/bestaudio/best";

const STDERR_LIMIT = 32_000;

export type YtDlpOptions = {
  bin: string;
  socketTimeoutSeconds: number;
  cookiesFile?: string;
  spawnProcess?: SpawnProcess;
  random?: () => number;
};

export function buildYtDlpArgs(
  link: string,
  opts: { userAgent: string; socketTimeoutSeconds: number; cookiesFile?: string; audioOnly: boolean }
): string[] {
  const args = ["-J", "--no-playlist", "--no-warnings", "--socket-timeout", String(opts.socketTimeoutSeconds)];
  if (opts.audioOnly) {
    args.push(
      "-f",
      AUDIO_FORMAT_PREFERENCE,
      "--user-agent",
      opts.userAgent,
      "--add-header",
      "Accept:*/*",
      "--add-header",
      "Accept-Language:en-US,en;q=0.9",
      "--extractor-args",
      "youtube:player_client=android,web;player_skip=webpage"
    );
  }
  if (opts.cookiesFile) args.push("--cookies", opts.cookiesFile);
  args.push("--", link);
  return args;
}

/**
 * Picks the audio URL from a `yt-dlp -J` document: the top-level URL of the
 * selected format when there is one, else the first audio-only format.
 */
export function pickAudioUrl(info: unknown): string | undefined {
  if (!isRecord(info)) return undefined;
  const direct = stringField(info, "url");
  if (direct) return direct;
  const formats = Array.isArray(info.formats) ? info.formats : [];
  for (const fmt of formats) {
    if (!isRecord(fmt)) continue;
    if (fmt.acodec === "none" || fmt.vcodec !== "none") continue;
    const url = stringField(fmt, "url");
    if (url) return url;
  }
  return undefined;
}

export function parseMediaInfo(info: unknown): MediaInfo {
  if (!isRecord(info)) return { ...UNKNOWN_MEDIA };
  const description = stringField(info, "description");
  return {
    title: stringField(info, "title") ?? UNKNOWN_MEDIA.title,
    artist: stringField(info, "artist") ?? stringField(info, "uploader") ?? UNKNOWN_MEDIA.artist,
    duration: numberField(info, "duration") ?? 0,
    thumbnail: stringField(info, "thumbnail") ?? "",
    description: description ? `${description.slice(0, 200)}...` : "",
  };
}

export class YtDlpExtractor {
  private readonly spawnProcess: SpawnProcess;
  private readonly random: () => number;

  constructor(private readonly options: YtDlpOptions) {
    this.spawnProcess = options.spawnProcess ?? spawnPiped;
    this.random = options.random ?? Math.random;
  }

  async extract(link: string): Promise<string> {
    const info = await this.dump(link, true);
    const url = pickAudioUrl(info);
    if (!url) throw new Error("no audio stream in yt-dlp output");
    const media = parseMediaInfo(info);
    logLine("[ytdlp]", "audio_found", { title: media.title, duration: media.duration, url: clip(url, 100) });
    return url;
  }

  async describe(link: string): Promise<MediaInfo> {
    return parseMediaInfo(await this.dump(link, false));
  }

  private async dump(link: string, audioOnly: boolean): Promise<unknown> {
    const args = buildYtDlpArgs(link, {
      userAgent: pickUserAgent(this.random),
      socketTimeoutSeconds: this.options.socketTimeoutSeconds,
      cookiesFile: this.options.cookiesFile,
      audioOnly,
    });
    // The socket timeout bounds each request; this bounds the whole run.
    const child = this.spawnProcess(this.options.bin, args, {
      timeoutMs: this.options.socketTimeoutSeconds * 3 * 1000,
    });
    const exited = waitForExit(child);

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (d: string) => {
      stdout += d;
    });
    child.stderr.on("data", (d) => {
      stderr += String(d);
      if (stderr.length > STDERR_LIMIT) stderr = `${stderr.slice(0, STDERR_LIMIT)}…`;
    });

    const { code, signal, error } = await exited;
    if (error) throw new Error(`yt-dlp could not start: ${error.message}`);
    if (code !== 0) {
      const msg = `yt-dlp failed code=${code ?? "null"} signal=${signal ?? "null"}`;
      throw new Error(stderr.trim() ? `${msg}: ${clip(stderr.trim(), 200)}` : msg);
    }
    // 'exit' can fire before stdout has been fully read.
    if (!child.stdout.readableEnded) {
      await new Promise<void>((resolve) => {
        child.stdout.once("end", resolve);
        child.stdout.once("close", resolve);
      });
    }
    try {
      return JSON.parse(stdout);
    } catch {
      throw new Error("yt-dlp returned malformed JSON");
    }
  }
}
