import { ExtractionFailedError, type StageOutcome } from "../errors";
import { clip, errorMessage, logError, logLine, logWarn } from "../log";

export interface AudioUrlSource {
  extract(link: string): Promise<string>;
}

/**
 * Primary local extraction first, then the fallback services. Nothing is
 * cached here.
 */
export class ExtractorChain {
  constructor(
    private readonly primary: AudioUrlSource,
    private readonly fallback: AudioUrlSource
  ) {}

  async extract(link: string): Promise<string> {
    const outcomes: StageOutcome[] = [];

    try {
      const url = await this.primary.extract(link);
      logLine("[extract]", "stage_a_ok", { link: clip(link) });
      return url;
    } catch (err) {
      outcomes.push({ stage: "ytdlp", ok: false, detail: errorMessage(err) });
      logWarn("[extract]", "stage_a_failed", { link: clip(link), message: clip(errorMessage(err), 200) });
    }

    try {
      const url = await this.fallback.extract(link);
      logLine("[extract]", "stage_b_ok", { link: clip(link) });
      return url;
    } catch (err) {
      outcomes.push({ stage: "fallback", ok: false, detail: errorMessage(err) });
    }

    logError("[extract]", "extraction_failed", { link, outcomes });
    throw new ExtractionFailedError(link, outcomes);
  }
}
