import { AllInstancesExhaustedError, type InstanceAttempt } from "../errors";
import { clip, errorMessage, logLine, logWarn } from "../log";
import { bestEffort } from "../util/bestEffort";
import { isRecord, stringField } from "../util/json";
import { pickUserAgent } from "./userAgents";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type FallbackOptions = {
  instances: readonly string[];
  timeoutMs: number;
  fetchImpl?: FetchLike;
  random?: () => number;
};

export function conversionPayload(link: string) {
  return {
    url: link,
    aFormat: "mp3",
    isAudioOnly: true,
    filenamePattern: "basic",
    disableMetadata: false,
    youtubeMusic: false,
  };
}

/** Fisher-Yates on a copy. */
export function shuffled<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Reads the audio URL out of a conversion-service response. Three shapes are
 * accepted: `{status: "redirect", url}`, `{url}` and `{audio}`.
 */
export function audioUrlFromBody(body: unknown): { url: string; shape: "redirect" | "url" | "audio" } | undefined {
  if (!isRecord(body)) return undefined;
  const url = stringField(body, "url");
  if (body.status === "redirect" && url) return { url, shape: "redirect" };
  if (url) return { url, shape: "url" };
  const audio = stringField(body, "audio");
  if (audio) return { url: audio, shape: "audio" };
  return undefined;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

export class FallbackInstances {
  private readonly fetchImpl: FetchLike;
  private readonly random: () => number;

  constructor(private readonly options: FallbackOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.random = options.random ?? Math.random;
  }

  /** Tries each instance in shuffled order, one at a time, and stops at the first success. */
  async extract(link: string): Promise<string> {
    const attempts: InstanceAttempt[] = [];
    for (const instance of shuffled(this.options.instances, this.random)) {
      logLine("[fallback]", "instance_try", { instance });
      const attempt = await this.tryInstance(instance, link);
      if (typeof attempt === "string") return attempt;
      logWarn("[fallback]", "instance_failed", { ...attempt });
      attempts.push(attempt);
    }
    logWarn("[fallback]", "all_instances_failed", { tried: attempts.length });
    throw new AllInstancesExhaustedError(attempts);
  }

  private async tryInstance(instance: string, link: string): Promise<string | InstanceAttempt> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const resp = await this.fetchImpl(`${instance}/api/json`, {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
          "User-Agent": pickUserAgent(this.random),
          Origin: instance,
          Referer: `${instance}/`,
        },
        body: JSON.stringify(conversionPayload(link)),
        redirect: "follow",
        signal: controller.signal,
      });
      if (resp.status !== 200) {
        // Release the connection; the error page is not needed.
        await bestEffort(async () => resp.body?.cancel(), { fallback: undefined });
        return { instance, outcome: "bad_status", detail: String(resp.status) };
      }
      let body: unknown;
      try {
        body = await resp.json();
      } catch (err) {
        if (isAbort(err)) return { instance, outcome: "timeout", detail: `${this.options.timeoutMs}ms` };
        return { instance, outcome: "bad_body", detail: errorMessage(err) };
      }
      const found = audioUrlFromBody(body);
      if (!found) {
        return { instance, outcome: "unrecognized_shape", detail: clip(JSON.stringify(body), 200) };
      }
      logLine("[fallback]", "instance_ok", { instance, shape: found.shape, url: clip(found.url) });
      return found.url;
    } catch (err) {
      if (isAbort(err)) return { instance, outcome: "timeout", detail: `${this.options.timeoutMs}ms` };
      return { instance, outcome: "connection_error", detail: errorMessage(err) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
