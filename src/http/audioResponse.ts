import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Response } from "express";
import type { OutputProfile } from "../audio/profiles";
import type { TranscodeEngine } from "../audio/transcodeEngine";
import { errorMessage, logLine, logWarn } from "../log";
import { isAbortError } from "./abort";
import { statusFor } from "./errors";

export type AudioResponseArgs = {
  res: Response;
  engine: TranscodeEngine;
  sourceUrl: string;
  profile: OutputProfile;
  prefix: string;
  /** Sets status-independent headers once the first bytes are ready. */
  prepare: (res: Response) => void;
  /** Answers a failure that happened before any byte was produced. */
  onStartFailure: (status: number, err: unknown) => void;
};

export const NO_CACHE_HEADERS = {
  "Cache-Control": "no-cache, no-store, must-revalidate",
  Pragma: "no-cache",
  Expires: "0",
} as const;

/**
 * Streams a transcode session into `res`. Headers go out with the first
 * chunk, so a transcoder that never starts can still be answered with a
 * status. Closing the connection cancels the session.
 */
export async function sendTranscodedAudio(args: AudioResponseArgs): Promise<void> {
  const { res, prefix } = args;
  // The client may have left while the query was resolving; `close` has fired already.
  if (res.destroyed || res.writableEnded) {
    logLine(prefix, "client_disconnected", { stage: "resolve" });
    return;
  }
  const abort = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) abort.abort();
  });

  const session = args.engine.open({
    sourceUrl: args.sourceUrl,
    profile: args.profile,
    signal: abort.signal,
    label: prefix,
  });
  const iterator = session.chunks();

  let first: IteratorResult<Buffer>;
  try {
    first = await iterator.next();
  } catch (err) {
    if (!res.headersSent && !res.destroyed) args.onStartFailure(statusFor(err) ?? 502, err);
    return;
  }

  if (abort.signal.aborted || res.destroyed) {
    await iterator.return(undefined);
    logLine(prefix, "client_disconnected", { stage: "start" });
    return;
  }

  res.status(200);
  args.prepare(res);
  if (first.done) {
    res.end();
    return;
  }

  const head = first.value;
  async function* body(): AsyncGenerator<Buffer> {
    yield head;
    yield* iterator;
  }

  try {
    await pipeline(Readable.from(body(), { objectMode: false }), res);
    logLine(prefix, "response_done", { bytes: session.bytesSent, outcome: session.outcome });
  } catch (err) {
    if (abort.signal.aborted || isAbortError(err)) {
      logLine(prefix, "client_disconnected", { bytes: session.bytesSent });
    } else {
      logWarn(prefix, "response_failed", { bytes: session.bytesSent, message: errorMessage(err) });
    }
  } finally {
    await session.done;
  }
}
