import type { OutputProfile } from "./profiles";

/** ffmpeg arguments that read `sourceUrl` and write MP3 for `profile` to stdout. */
export function buildTranscodeArgs(sourceUrl: string, profile: OutputProfile): string[] {
  const args = ["-hide_banner", "-nostdin"];
  if (profile.reconnect) {
    args.push(
      "-reconnect",
      "1",
      "-reconnect_streamed",
      "1",
      "-reconnect_delay_max",
      String(profile.reconnectDelayMaxSeconds)
    );
  }
  args.push(
    "-i",
    sourceUrl,
    "-f",
    "mp3",
    "-acodec",
    profile.codec,
    "-ar",
    String(profile.sampleRate),
    "-ac",
    String(profile.channels),
    "-b:a",
    `${profile.bitrateKbps}k`
  );
  if (profile.vbrQuality !== undefined) args.push("-q:a", String(profile.vbrQuality));
  if (profile.bufferSize) args.push("-bufsize", profile.bufferSize);
  args.push(...profile.extraArgs, "-vn", "-");
  return args;
}

/** True for stderr lines worth surfacing on the constrained profile. */
export function isErrorLine(line: string): boolean {
  const lower = line.toLowerCase();
  return lower.includes("error") || lower.includes("invalid");
}
