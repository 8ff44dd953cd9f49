/**
 * Error codes for every failure the downloader reports.
 * Each code maps to a specific scenario with predefined messaging.
 */
export type ErrorCode =
  // Configuration
  | "CONFIG_MISSING"
  | "CONFIG_INCOMPLETE"
  | "CONFIG_INVALID"
  // Task execution
  | "SIZE_PROBE_FAILED"
  | "TRANSFER_FAILED"
  | "OBSERVER_FAILED"
  // Storage collaborator
  | "STORAGE_NOT_FOUND"
  | "STORAGE_TRANSPORT"
  // Validation
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_MISSING_ARG"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Error carrying a stable code plus optional hints for the terminal.
 */
export class DownloadError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      details?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "DownloadError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a DownloadError.
 */
export function isDownloadError(error: unknown): error is DownloadError {
  return error instanceof DownloadError;
}

/**
 * Narrow a DownloadError to a specific code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode): error is DownloadError {
  return isDownloadError(error) && error.code === code;
}
