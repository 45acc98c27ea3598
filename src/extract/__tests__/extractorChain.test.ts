import { ExtractionFailedError } from "../../errors";
import { ExtractorChain, type AudioUrlSource } from "../extractorChain";

function source(result: string | Error): AudioUrlSource & { extract: jest.Mock } {
  return {
    extract: jest.fn(async () => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

describe("ExtractorChain", () => {
  const link = "https://example.com/watch?v=abc123";

  it("uses the primary result without touching the fallback", async () => {
    const primary = source("https://cdn.example/primary");
    const fallback = source("https://dl.example/fallback");

    await expect(new ExtractorChain(primary, fallback).extract(link)).resolves.toBe("https://cdn.example/primary");
    expect(primary.extract).toHaveBeenCalledWith(link);
    expect(fallback.extract).not.toHaveBeenCalled();
  });

  it("falls back when the primary fails", async () => {
    const primary = source(new Error("Sign in to confirm you're not a bot"));
    const fallback = source("https://dl.example/fallback");

    await expect(new ExtractorChain(primary, fallback).extract(link)).resolves.toBe("https://dl.example/fallback");
    expect(fallback.extract).toHaveBeenCalledWith(link);
  });

  it("reports both stage outcomes when everything fails", async () => {
    const chain = new ExtractorChain(source(new Error("yt-dlp failed code=1")), source(new Error("All 4 fallback instances failed")));

    const err = await chain.extract(link).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExtractionFailedError);
    expect(err).toMatchObject({
      link,
      code: "EXTRACTION_FAILED",
      outcomes: [
        { stage: "ytdlp", ok: false, detail: "yt-dlp failed code=1" },
        { stage: "fallback", ok: false, detail: "All 4 fallback instances failed" },
      ],
    });
  });
});
