import { EmptyQueryError, QueueFullError, SubprocessError, SubprocessSpawnError, isResolutionFailure } from "../errors";

export type ErrorBody = {
  status: "error";
  error: {
    code: string;
    message: string;
  };
};

export function toErrorBody(code: string, message: string): ErrorBody {
  return { status: "error", error: { code, message } };
}

/**
 * HTTP status for the failures a handler answers itself. Anything else is
 * left to the error middleware.
 */
export function statusFor(err: unknown): 400 | 404 | 502 | 503 | undefined {
  if (err instanceof EmptyQueryError) return 400;
  if (isResolutionFailure(err)) return 404;
  if (err instanceof QueueFullError) return 503;
  if (err instanceof SubprocessSpawnError || err instanceof SubprocessError) return 502;
  return undefined;
}

export function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return "internal_error";
}
