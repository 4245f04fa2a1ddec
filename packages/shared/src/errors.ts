export type BatchErrorCode =
  | "missing_catalog"
  | "empty_catalog"
  | "missing_artifacts_dir"
  | "invalid_chunk"
  | "invalid_option"
  | "schema_violation";

export class BatchError extends Error {
  readonly code: BatchErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: BatchErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "BatchError";
    this.code = code;
    this.details = details;
  }
}

export function isBatchError(error: unknown): error is BatchError {
  return error instanceof BatchError;
}
