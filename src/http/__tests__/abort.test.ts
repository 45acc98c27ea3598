import { isAbortError } from "../abort";

describe("isAbortError", () => {
  function withCode(code: string): Error {
    return Object.assign(new Error("boom"), { code });
  }

  it("recognises peer disconnects by code and message", () => {
    expect(isAbortError(withCode("ECONNRESET"))).toBe(true);
    expect(isAbortError(withCode("ERR_STREAM_PREMATURE_CLOSE"))).toBe(true);
    expect(isAbortError(new Error("Request aborted"))).toBe(true);
    expect(isAbortError(new Error("socket hang up"))).toBe(true);
  });

  it("leaves other failures alone", () => {
    expect(isAbortError(withCode("ENOENT"))).toBe(false);
    expect(isAbortError(new Error("boom"))).toBe(false);
    expect(isAbortError("aborted")).toBe(false);
    expect(isAbortError(null)).toBe(false);
  });
});
