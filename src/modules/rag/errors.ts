export class RetrievalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalError";
  }
}

export type MalformedRecordReason = "invalid_payload" | "missing_text";

export class MalformedRecordError extends Error {
  readonly recordId: string;
  readonly reason: MalformedRecordReason;

  constructor(recordId: string, reason: MalformedRecordReason, message: string) {
    super(message);
    this.name = "MalformedRecordError";
    this.recordId = recordId;
    this.reason = reason;
  }
}

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export const isAbortError = (error: unknown, signal?: AbortSignal): boolean => {
  if (signal?.aborted) {
    return true;
  }
  return error instanceof Error && (error.name === "AbortError" || error.name === "APIUserAbortError");
};

export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new DOMException("The operation was aborted.", "AbortError");
  }
};
