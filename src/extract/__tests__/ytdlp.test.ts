import { FakeProcess, fakeSpawner } from "../../__tests__/helpers/fakeProcess";
import { AUDIO_FORMAT_PREFERENCE, buildYtDlpArgs, parseMediaInfo, pickAudioUrl, YtDlpExtractor } from "../ytdlp";

describe("buildYtDlpArgs", () => {
  it("asks for an audio format with a browser identity", () => {
    const args = buildYtDlpArgs("https://example.com/watch?v=abc123", {
      userAgent: "UA/1.0",
      socketTimeoutSeconds: 15,
      audioOnly: true,
    });

    expect(args.slice(0, 5)).toEqual(["-J", "--no-playlist", "--no-warnings", "--socket-timeout", "15"]);
    expect(args[args.indexOf("-f") + 1]).toBe(AUDIO_FORMAT_PREFERENCE);
    expect(args[args.indexOf("--user-agent") + 1]).toBe("UA/1.0");
    expect(args).not.toContain("--cookies");
    expect(args.slice(-2)).toEqual(["--", "https://example.com/watch?v=abc123"]);
  });

  it("only dumps metadata when audio is not needed, and passes cookies", () => {
    const args = buildYtDlpArgs("https://example.com/watch?v=abc123", {
      userAgent: "UA/1.0",
      socketTimeoutSeconds: 10,
      cookiesFile: "/tmp/cookies.txt",
      audioOnly: false,
    });

    expect(args).toEqual([
      "-J",
      "--no-playlist",
      "--no-warnings",
      "--socket-timeout",
      "10",
      "--cookies",
      "/tmp/cookies.txt",
      "--",
      "https://example.com/watch?v=abc123",
    ]);
  });
});

describe("pickAudioUrl", () => {
  it("prefers the selected format's url", () => {
    expect(pickAudioUrl({ url: "https://cdn.example/selected", formats: [] })).toBe("https://cdn.example/selected");
  });

  it("falls back to the first audio-only format", () => {
    const info = {
      formats: [
        { format_id: "v", acodec: "none", vcodec: "avc1", url: "https://cdn.example/video" },
        { format_id: "av", acodec: "mp4a", vcodec: "avc1", url: "https://cdn.example/muxed" },
        { format_id: "a", acodec: "opus", vcodec: "none", url: "https://cdn.example/audio" },
      ],
    };
    expect(pickAudioUrl(info)).toBe("https://cdn.example/audio");
  });

  it("returns undefined when nothing usable is present", () => {
    expect(pickAudioUrl({ formats: [{ acodec: "none", vcodec: "none", url: "x" }] })).toBeUndefined();
    expect(pickAudioUrl("not json")).toBeUndefined();
  });
});

describe("parseMediaInfo", () => {
  it("maps the fields and shortens the description", () => {
    const info = parseMediaInfo({
      title: "Song",
      uploader: "Channel",
      duration: 233,
      thumbnail: "https://img.example/t.jpg",
      description: "d".repeat(250),
    });

    expect(info).toEqual({
      title: "Song",
      artist: "Channel",
      duration: 233,
      thumbnail: "https://img.example/t.jpg",
      description: `${"d".repeat(200)}...`,
    });
  });

  it("prefers artist over uploader and fills unknowns", () => {
    expect(parseMediaInfo({ artist: "Singer", uploader: "Channel" }).artist).toBe("Singer");
    expect(parseMediaInfo({})).toEqual({ title: "Unknown", artist: "Unknown", duration: 0, thumbnail: "", description: "" });
  });
});

describe("YtDlpExtractor", () => {
  function extractorFor(make: () => FakeProcess) {
    const spawner = fakeSpawner(make);
    const extractor = new YtDlpExtractor({
      bin: "yt-dlp-test",
      socketTimeoutSeconds: 5,
      spawnProcess: spawner.spawnProcess,
      random: () => 0,
    });
    return { extractor, calls: spawner.calls };
  }

  it("returns the audio url from the JSON dump", async () => {
    const doc = JSON.stringify({ title: "Song", url: "https://cdn.example/audio.m4a" });
    const { extractor, calls } = extractorFor(() => new FakeProcess().finishLater(doc));

    await expect(extractor.extract("https://example.com/watch?v=abc123")).resolves.toBe("https://cdn.example/audio.m4a");
    expect(calls[0].command).toBe("yt-dlp-test");
    expect(calls[0].timeoutMs).toBe(15_000);
  });

  it("describes a link without asking for a format", async () => {
    const doc = JSON.stringify({ title: "Song", artist: "Singer", duration: 200 });
    const { extractor, calls } = extractorFor(() => new FakeProcess().finishLater(doc));

    await expect(extractor.describe("https://example.com/watch?v=abc123")).resolves.toMatchObject({
      title: "Song",
      artist: "Singer",
      duration: 200,
    });
    expect(calls[0].args).not.toContain("-f");
  });

  it("reports a non-zero exit with the stderr text", async () => {
    const { extractor } = extractorFor(() => {
      const p = new FakeProcess();
      setImmediate(() => p.stderr.write("ERROR: Video unavailable\n"));
      setTimeout(() => p.exit(1), 5);
      return p;
    });

    await expect(extractor.extract("https://example.com/watch?v=gone")).rejects.toThrow(
      "yt-dlp failed code=1 signal=null: ERROR: Video unavailable"
    );
  });

  it("rejects output that is not JSON", async () => {
    const { extractor } = extractorFor(() => new FakeProcess().finishLater("<html>"));
    await expect(extractor.extract("https://example.com/watch?v=abc123")).rejects.toThrow("yt-dlp returned malformed JSON");
  });

  it("rejects a dump without any audio url", async () => {
    const { extractor } = extractorFor(() => new FakeProcess().finishLater(JSON.stringify({ title: "x" })));
    await expect(extractor.extract("https://example.com/watch?v=abc123")).rejects.toThrow("no audio stream in yt-dlp output");
  });
});
