export type ProfileName = "web" | "constrained" | "download";

export type OutputProfile = Readonly<{
  name: ProfileName;
  codec: "libmp3lame";
  sampleRate: number;
  channels: number;
  bitrateKbps: number;
  /** LAME VBR quality (`-q:a`), when set. */
  vbrQuality?: number;
  /** Encoder rate-control buffer (`-bufsize`). */
  bufferSize?: string;
  /** Bytes forwarded to the response per read. */
  chunkSize: number;
  reconnect: boolean;
  reconnectDelayMaxSeconds: number;
  extraArgs: readonly string[];
  /** `all` logs every stderr line at debug, `errors` only error-looking lines at warn. */
  diagnostics: "all" | "errors";
  progressEveryBytes: number;
}>;

export const WEB_PROFILE: OutputProfile = {
  name: "web",
  codec: "libmp3lame",
  sampleRate: 44_100,
  channels: 2,
  bitrateKbps: 192,
  bufferSize: "512k",
  chunkSize: 8192,
  reconnect: true,
  reconnectDelayMaxSeconds: 5,
  extraArgs: ["-max_delay", "500000"],
  diagnostics: "all",
  progressEveryBytes: 1024 * 1024,
};

/** Small embedded players: low sample rate, VBR, small reads. */
export const CONSTRAINED_PROFILE: OutputProfile = {
  name: "constrained",
  codec: "libmp3lame",
  sampleRate: 24_000,
  channels: 2,
  bitrateKbps: 80,
  vbrQuality: 7,
  bufferSize: "160k",
  chunkSize: 4096,
  reconnect: true,
  reconnectDelayMaxSeconds: 5,
  extraArgs: ["-fflags", "+discardcorrupt", "-max_muxing_queue_size", "640"],
  diagnostics: "errors",
  progressEveryBytes: 50 * 4096,
};

export const DOWNLOAD_PROFILE: OutputProfile = {
  name: "download",
  codec: "libmp3lame",
  sampleRate: 44_100,
  channels: 2,
  bitrateKbps: 192,
  chunkSize: 8192,
  reconnect: false,
  reconnectDelayMaxSeconds: 0,
  extraArgs: [],
  diagnostics: "all",
  progressEveryBytes: 1024 * 1024,
};
