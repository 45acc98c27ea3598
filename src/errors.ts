export type StageOutcome = {
  stage: "ytdlp" | "fallback";
  ok: boolean;
  detail: string;
};

export type InstanceAttempt = {
  instance: string;
  outcome: "timeout" | "connection_error" | "bad_status" | "bad_body" | "unrecognized_shape";
  detail: string;
};

export class EmptyQueryError extends Error {
  public readonly code = "EMPTY_QUERY";

  constructor() {
    super("Query is empty");
  }
}

export class NotFoundError extends Error {
  public readonly code = "NOT_FOUND";

  constructor(public readonly query: string, options?: { cause?: unknown }) {
    super(`No search result for: ${query}`, options);
  }
}

export class AllInstancesExhaustedError extends Error {
  public readonly code = "ALL_INSTANCES_EXHAUSTED";

  constructor(public readonly attempts: InstanceAttempt[]) {
    super(
      attempts.length
        ? `All ${attempts.length} fallback instances failed`
        : "No fallback instances configured"
    );
  }
}

export class ExtractionFailedError extends Error {
  public readonly code = "EXTRACTION_FAILED";

  constructor(public readonly link: string, public readonly outcomes: StageOutcome[]) {
    super(`Could not extract an audio URL from ${link}`);
  }
}

export class SubprocessSpawnError extends Error {
  public readonly code = "SUBPROCESS_SPAWN_FAILED";

  constructor(public readonly command: string, options?: { cause?: unknown }) {
    super(`Failed to start ${command}`, options);
  }
}

export class SubprocessError extends Error {
  public readonly code = "SUBPROCESS_ERROR";
}

export class QueueFullError extends Error {
  public readonly code = "QUEUE_FULL";

  constructor(public readonly maxPending: number) {
    super(`Resolution queue is full (${maxPending} pending)`);
  }
}

export type ResolutionFailure = NotFoundError | ExtractionFailedError;

export function isResolutionFailure(err: unknown): err is ResolutionFailure {
  return err instanceof NotFoundError || err instanceof ExtractionFailedError;
}
