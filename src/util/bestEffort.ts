import { errorMessage, logDebug } from "../log";

export type BestEffortOptions<T> = {
  fallback: T;
  /** When set, a failure is logged at debug under this prefix. */
  prefix?: string;
  label?: string;
};

function logFailure(err: unknown, options: BestEffortOptions<unknown>): void {
  if (!options.prefix) return;
  logDebug(options.prefix, options.label ?? "best_effort_fallback", { message: errorMessage(err) });
}

/** Runs `fn` and returns `fallback` instead of throwing. */
export async function bestEffort<T>(fn: () => Promise<T>, options: BestEffortOptions<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    logFailure(err, options);
    return options.fallback;
  }
}

export function bestEffortSync<T>(fn: () => T, options: BestEffortOptions<T>): T {
  try {
    return fn();
  } catch (err) {
    logFailure(err, options);
    return options.fallback;
  }
}
