export type RecognitionErrorKind =
  | "unreachable"
  | "timeout"
  | "server_error"
  | "empty_result"
  | "malformed_response"
  | "cancelled";

export type TranslationErrorKind =
  | "unreachable"
  | "timeout"
  | "server_error"
  | "malformed_response"
  | "cancelled";

export type SegmentFailureReason = "retries_exhausted" | "stale" | "rejected";

export class RecognitionError extends Error {
  readonly name = "RecognitionError";

  constructor(
    readonly kind: RecognitionErrorKind,
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

export class TranslationError extends Error {
  readonly name = "TranslationError";

  constructor(
    readonly kind: TranslationErrorKind,
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

export type StageError = RecognitionError | TranslationError;

export class SegmentFailedError extends Error {
  readonly name = "SegmentFailedError";

  constructor(
    readonly sequence: number,
    readonly reason: SegmentFailureReason,
    readonly lastError?: StageError
  ) {
    super(
      `segment ${sequence} failed (${reason})${
        lastError ? `: ${lastError.message}` : ""
      }`
    );
  }
}

export class ConfigError extends Error {
  readonly name = "ConfigError";

  constructor(readonly issues: string[]) {
    super(`invalid configuration:\n  ${issues.join("\n  ")}`);
  }
}

/**
 * 4xx answers other than 408/429 mean the request itself is wrong,
 * so sending it again cannot help.
 */
export const isRetryable = (error: StageError): boolean => {
  switch (error.kind) {
    case "empty_result":
    case "cancelled":
      return false;
    case "server_error": {
      const status = error.status ?? 500;
      if (status === 408 || status === 429) return true;
      return status < 400 || status >= 500;
    }
    default:
      return true;
  }
};
