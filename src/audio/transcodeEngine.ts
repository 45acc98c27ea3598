import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { SubprocessError, SubprocessSpawnError } from "../errors";
import { clip, errorMessage, logDebug, logError, logLine, logWarn } from "../log";
import { bestEffortSync } from "../util/bestEffort";
import { spawnPiped, waitForExit, type ExitInfo, type PipedProcess, type SpawnProcess } from "../util/process";
import { buildTranscodeArgs, isErrorLine } from "./ffmpeg";
import type { OutputProfile } from "./profiles";

export type SessionState = "starting" | "streaming" | "completed" | "client_disconnected" | "subprocess_error" | "terminated";

export type SessionOutcome = Extract<SessionState, "completed" | "client_disconnected" | "subprocess_error">;

export type TranscodeEngineOptions = {
  ffmpegBin: string;
  /** How long to wait after SIGTERM (and again after SIGKILL). */
  killGraceMs: number;
  /** Longest silence on stdout before the stream counts as failed; 0 disables. */
  idleTimeoutMs: number;
  spawnProcess?: SpawnProcess;
};

export type OpenOptions = {
  sourceUrl: string;
  profile: OutputProfile;
  /** Fires when the consumer has gone away. */
  signal?: AbortSignal;
  label?: string;
};

const STDERR_TAIL_LINES = 10;

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(undefined), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

/**
 * Yields `size`-byte chunks from `stream` in order, and the shorter remainder
 * once it ends. When less than a chunk is buffered it waits for the next
 * stream event. Stops without error once `signal` is aborted.
 */
export async function* readChunks(
  stream: Readable,
  size: number,
  signal: AbortSignal,
  idleTimeoutMs = 0
): AsyncGenerator<Buffer> {
  let wake: (() => void) | undefined;
  const notify = () => {
    const resolve = wake;
    wake = undefined;
    resolve?.();
  };
  // One listener for the whole read: re-adding `readable` makes the stream re-emit it at once.
  const events = ["readable", "end", "close", "error"] as const;
  for (const event of events) stream.on(event, notify);
  signal.addEventListener("abort", notify);

  try {
    while (!signal.aborted) {
      const chunk: Buffer | null = stream.read(size);
      if (chunk !== null) {
        yield chunk;
        continue;
      }
      if (stream.errored) {
        throw new SubprocessError(`transcoder output failed: ${errorMessage(stream.errored)}`, {
          cause: stream.errored,
        });
      }
      if (stream.readableEnded || stream.destroyed) return;

      await new Promise<void>((resolve, reject) => {
        const timer =
          idleTimeoutMs > 0
            ? setTimeout(() => {
                wake = undefined;
                reject(new SubprocessError(`no transcoder output for ${idleTimeoutMs}ms`));
              }, idleTimeoutMs)
            : undefined;
        wake = () => {
          if (timer) clearTimeout(timer);
          resolve();
        };
      });
    }
  } finally {
    for (const event of events) stream.off(event, notify);
    signal.removeEventListener("abort", notify);
  }
}

/**
 * One transcoder process feeding one response. The process belongs to the
 * session and is reaped before `done` resolves, on every exit path.
 */
export class StreamSession {
  state: SessionState = "starting";
  outcome: SessionOutcome | undefined;
  bytesSent = 0;
  chunksSent = 0;
  readonly startedAt = Date.now();
  readonly done: Promise<void>;

  private readonly abort = new AbortController();
  private readonly label: string;
  private readonly stderrTail: string[] = [];
  private started = false;
  private child: PipedProcess | undefined;
  private exitInfo: ExitInfo | undefined;
  private nextProgressAt: number;
  private markDone: () => void = () => {};
  private readonly onExternalAbort = () => this.cancel();

  constructor(
    private readonly open: OpenOptions,
    private readonly engine: Required<TranscodeEngineOptions>,
    private readonly onFinished: (session: StreamSession) => void
  ) {
    this.label = open.label ?? `[${open.profile.name}]`;
    this.nextProgressAt = open.profile.progressEveryBytes;
    this.done = new Promise<void>((resolve) => {
      this.markDone = resolve;
    });
    if (open.signal?.aborted) this.abort.abort();
    else open.signal?.addEventListener("abort", this.onExternalAbort, { once: true });
  }

  /** Requests termination. Takes effect at the next chunk boundary. */
  cancel(): void {
    this.abort.abort();
    if (!this.started) {
      this.started = true;
      this.outcome = "client_disconnected";
      this.finish();
      return;
    }
    // A consumer parked between chunks would otherwise keep the process alive.
    const child = this.child;
    if (child && !this.hasExited(child)) bestEffortSync(() => child.kill("SIGTERM"), { fallback: false });
  }

  async *chunks(): AsyncGenerator<Buffer> {
    if (this.started) return;
    this.started = true;
    if (this.abort.signal.aborted) {
      this.outcome = "client_disconnected";
      this.finish();
      return;
    }

    const { profile, sourceUrl } = this.open;
    const bin = this.engine.ffmpegBin;

    let child: PipedProcess;
    try {
      child = this.engine.spawnProcess(bin, buildTranscodeArgs(sourceUrl, profile));
    } catch (err) {
      this.outcome = "subprocess_error";
      this.finish();
      throw new SubprocessSpawnError(bin, { cause: err });
    }
    this.child = child;
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      this.exitInfo = { code, signal };
    });
    const exited = waitForExit(child);
    const closeDiagnostics = this.drainDiagnostics(child.stderr);

    this.state = "streaming";
    logLine(this.label, "stream_start", { profile: profile.name, pid: child.pid, url: clip(sourceUrl) });

    try {
      for await (const chunk of readChunks(child.stdout, profile.chunkSize, this.abort.signal, this.engine.idleTimeoutMs)) {
        this.bytesSent += chunk.length;
        this.chunksSent++;
        this.logProgress();
        yield chunk;
      }

      if (this.abort.signal.aborted) {
        this.outcome = "client_disconnected";
        return;
      }

      const exit = await withTimeout(exited, this.engine.killGraceMs);
      if (exit?.error) {
        this.outcome = "subprocess_error";
        logError(this.label, "transcoder_spawn_failed", { bin, message: exit.error.message });
        if (this.bytesSent === 0) throw new SubprocessSpawnError(bin, { cause: exit.error });
        return;
      }
      if (exit && exit.code !== 0) {
        this.outcome = "subprocess_error";
        logWarn(this.label, "transcoder_exit_abnormal", {
          code: exit.code,
          signal: exit.signal,
          bytes: this.bytesSent,
          stderr: this.stderrTail.join(" | "),
        });
        if (this.bytesSent === 0) throw new SubprocessError(`transcoder exited with code ${exit.code ?? "null"}`);
        return;
      }
      this.outcome = "completed";
    } catch (err) {
      // A response destroyed under backpressure throws into the parked yield.
      if (this.abort.signal.aborted) {
        this.outcome = "client_disconnected";
        return;
      }
      const alreadyReported = this.outcome === "subprocess_error";
      this.outcome = "subprocess_error";
      if (alreadyReported) throw err;
      logWarn(this.label, "stream_failed", {
        message: errorMessage(err),
        bytes: this.bytesSent,
        stderr: this.stderrTail.join(" | "),
      });
      // Once bytes are out, ending the body is the only signal left.
      if (this.bytesSent === 0) throw err;
    } finally {
      // Reaching here while still streaming means the consumer stopped pulling.
      if (!this.outcome) this.outcome = "client_disconnected";
      this.state = this.outcome;
      await this.reap(child, exited);
      closeDiagnostics();
      this.finish();
    }
  }

  private hasExited(child: PipedProcess): boolean {
    return this.exitInfo !== undefined || child.exitCode !== null || child.signalCode !== null;
  }

  private async reap(child: PipedProcess, exited: Promise<ExitInfo>): Promise<void> {
    const { killGraceMs } = this.engine;
    if (!this.hasExited(child)) {
      bestEffortSync(() => child.kill("SIGTERM"), { fallback: false });
      let exit = await withTimeout(exited, killGraceMs);
      if (!exit) {
        logWarn(this.label, "transcoder_kill", { pid: child.pid, graceMs: killGraceMs });
        bestEffortSync(() => child.kill("SIGKILL"), { fallback: false });
        exit = await withTimeout(exited, killGraceMs);
        if (!exit) logError(this.label, "transcoder_unreaped", { pid: child.pid });
      }
    }
    child.stdout.destroy();
    child.stderr.destroy();
  }

  private drainDiagnostics(stderr: Readable): () => void {
    const rl = createInterface({ input: stderr, crlfDelay: Infinity });
    const policy = this.open.profile.diagnostics;
    rl.on("line", (line) =>
      bestEffortSync(
        () => {
          const trimmed = line.trim();
          if (!trimmed) return;
          this.stderrTail.push(clip(trimmed, 300));
          if (this.stderrTail.length > STDERR_TAIL_LINES) this.stderrTail.shift();
          if (policy === "all") logDebug(this.label, "ffmpeg", { line: trimmed });
          else if (isErrorLine(trimmed)) logWarn(this.label, "ffmpeg", { line: trimmed });
        },
        { fallback: undefined }
      )
    );
    // Diagnostics never affect the stream.
    rl.on("error", (err: Error) => logDebug(this.label, "diagnostics_error", { message: err.message }));
    stderr.on("error", (err: Error) => logDebug(this.label, "diagnostics_error", { message: err.message }));
    return () => bestEffortSync(() => rl.close(), { fallback: undefined });
  }

  private logProgress(): void {
    if (this.bytesSent < this.nextProgressAt) return;
    this.nextProgressAt += this.open.profile.progressEveryBytes;
    const elapsedSec = Math.max((Date.now() - this.startedAt) / 1000, 0.001);
    const kb = this.bytesSent / 1024;
    logLine(this.label, "stream_progress", { kb: Math.round(kb), kbPerSec: Math.round(kb / elapsedSec) });
  }

  private finish(): void {
    this.open.signal?.removeEventListener("abort", this.onExternalAbort);
    this.state = "terminated";
    logLine(this.label, "stream_end", {
      outcome: this.outcome,
      bytes: this.bytesSent,
      chunks: this.chunksSent,
      ms: Date.now() - this.startedAt,
    });
    this.onFinished(this);
    this.markDone();
  }
}

export class TranscodeEngine {
  private readonly sessions = new Set<StreamSession>();
  private readonly options: Required<TranscodeEngineOptions>;

  constructor(options: TranscodeEngineOptions) {
    this.options = { ...options, spawnProcess: options.spawnProcess ?? spawnPiped };
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  open(options: OpenOptions): StreamSession {
    const session = new StreamSession(options, this.options, (s) => this.sessions.delete(s));
    this.sessions.add(session);
    return session;
  }

  /** Cancels every live session and waits until their processes are reaped. */
  async shutdown(): Promise<void> {
    const live = [...this.sessions];
    for (const session of live) session.cancel();
    await Promise.all(live.map((s) => s.done));
  }
}
