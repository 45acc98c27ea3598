/** True for the errors Node and express raise when the peer goes away mid-response. */
export function isAbortError(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  const code = "code" in err ? err.code : undefined;
  if (code === "ECONNABORTED" || code === "ECONNRESET" || code === "EPIPE") return true;
  if (code === "ERR_STREAM_PREMATURE_CLOSE" || code === "ERR_STREAM_DESTROYED") return true;
  const msg = err instanceof Error ? err.message : "";
  // express uses this exact message in response.js's onaborted handler.
  if (msg === "Request aborted") return true;
  return msg.includes("aborted") || msg.includes("socket hang up");
}
