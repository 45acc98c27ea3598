import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { PipedProcess, SpawnProcess } from "../../util/process";

export type FakeProcessOptions = {
  /** Signals the process does not react to. */
  ignore?: NodeJS.Signals[];
};

/** In-process stand-in for a spawned child with piped stdout and stderr. */
export class FakeProcess extends EventEmitter implements PipedProcess {
  readonly pid = 4242;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  private exitScheduled = false;
  private readonly ignore: Set<NodeJS.Signals>;

  readonly kill = jest.fn((signal: NodeJS.Signals = "SIGTERM"): boolean => {
    if (this.ignore.has(signal)) return true;
    if (!this.exitScheduled) {
      this.exitScheduled = true;
      setImmediate(() => this.exit(null, signal));
    }
    return true;
  });

  constructor(options: FakeProcessOptions = {}) {
    super();
    this.ignore = new Set(options.ignore ?? []);
  }

  get exited(): boolean {
    return this.exitCode !== null || this.signalCode !== null;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exitCode = code;
    this.signalCode = signal;
    for (const stream of [this.stdout, this.stderr]) {
      if (!stream.writableEnded && !stream.destroyed) stream.end();
    }
    this.emit("exit", code, signal);
    this.emit("close", code, signal);
  }

  /** Writes `data` to stdout and exits with `code` on a later tick. */
  finishLater(data: string | Buffer, code = 0): this {
    setImmediate(() => {
      this.stdout.write(data);
      this.exit(code);
    });
    return this;
  }
}

export type SpawnCall = { command: string; args: readonly string[]; timeoutMs?: number; proc: FakeProcess };

export function fakeSpawner(make: () => FakeProcess = () => new FakeProcess()) {
  const calls: SpawnCall[] = [];
  const spawnProcess: SpawnProcess = (command, args, options) => {
    const proc = make();
    calls.push({ command, args, timeoutMs: options?.timeoutMs, proc });
    return proc;
  };
  return { spawnProcess, calls };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}
