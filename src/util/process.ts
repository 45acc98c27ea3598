import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";

/** The slice of a spawned child process the engine relies on. */
export interface PipedProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnProcess = (
  command: string,
  args: readonly string[],
  options?: { timeoutMs?: number }
) => PipedProcess;

export const spawnPiped: SpawnProcess = (command, args, options = {}) =>
  spawn(command, [...args], {
    stdio: ["ignore", "pipe", "pipe"],
    timeout: options.timeoutMs,
    windowsHide: true,
  });

export type ExitInfo = { code: number | null; signal: NodeJS.Signals | null; error?: Error };

/**
 * Resolves once the process has exited, or failed to start. Node may emit
 * `error` without a following `exit` when the binary is missing. The error
 * listener stays attached so a late `error` never goes unhandled.
 */
export function waitForExit(child: PipedProcess): Promise<ExitInfo> {
  return new Promise((resolve) => {
    let settled = false;
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      resolve({ code, signal });
    });
    child.on("error", (error: Error) => {
      if (settled) return;
      settled = true;
      resolve({ code: child.exitCode, signal: child.signalCode, error });
    });
  });
}
