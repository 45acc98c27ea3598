import { errorMessage, logError, logLine, logWarn } from "../log";

export type StopResult = { kind: "stopped" } | { kind: "timeout" } | { kind: "error"; error: unknown };

/** Runs `stopFn`, giving up waiting after `timeoutMs`. Never throws. */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | undefined;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { kind: "stopped" };
    } catch (error) {
      return { kind: "error", error };
    }
  })();
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: "timeout" }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  });

  if (result.kind === "stopped") {
    logLine("[shutdown]", "stopped", { name });
  } else if (result.kind === "timeout") {
    logWarn("[shutdown]", "stop_timeout", { name, timeoutMs });
  } else {
    logError("[shutdown]", "stop_failed", { name, message: errorMessage(result.error) });
  }
  return result;
}
