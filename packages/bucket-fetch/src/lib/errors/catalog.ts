import { DownloadError } from "./types.js";

/**
 * Error catalog - factory functions for every DownloadError the system raises.
 */

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}

// ============================================================================
// Configuration Errors
// ============================================================================

export function configMissing(path: string): DownloadError {
  return new DownloadError("CONFIG_MISSING", `Storage config file not found: ${path}`, {
    suggestion: "Create a key=value file with SPACES_NAME, ACCESS_KEY, SECRET_KEY, REGION_NAME and ENDPOINT",
  });
}

export function configIncomplete(missingKeys: string[]): DownloadError {
  return new DownloadError(
    "CONFIG_INCOMPLETE",
    `Storage configuration is missing ${missingKeys.join(", ")}`,
    {
      suggestion: "Add the missing keys to the storage config file or pass --storage-config",
    }
  );
}

export function configInvalid(path: string, details: string, cause?: unknown): DownloadError {
  return new DownloadError("CONFIG_INVALID", `Invalid configuration in ${path}`, {
    details,
    cause,
  });
}

// ============================================================================
// Task Execution Errors
// ============================================================================

export function sizeProbeFailed(bucket: string, key: string, cause: unknown): DownloadError {
  return new DownloadError("SIZE_PROBE_FAILED", `Failed to retrieve object size: ${bucket}/${key}`, {
    details: describeCause(cause),
    cause,
  });
}

export function transferFailed(taskId: string, key: string, cause: unknown): DownloadError {
  return new DownloadError("TRANSFER_FAILED", `Download ${taskId} of "${key}" failed`, {
    details: describeCause(cause),
    cause,
  });
}

export function observerFailed(taskId: string, cause: unknown): DownloadError {
  return new DownloadError("OBSERVER_FAILED", `Observer for task ${taskId} failed`, {
    details: describeCause(cause),
    cause,
  });
}

// ============================================================================
// Storage Errors
// ============================================================================

export function objectNotFound(bucket: string, key: string, cause?: unknown): DownloadError {
  return new DownloadError("STORAGE_NOT_FOUND", `Object not found: ${bucket}/${key}`, {
    suggestion: "Check the bucket name and object key",
    cause,
  });
}

export function storageTransport(operation: string, cause: unknown): DownloadError {
  return new DownloadError("STORAGE_TRANSPORT", `Storage request failed during ${operation}`, {
    suggestion: "Check the endpoint and your network connection",
    details: describeCause(cause),
    cause,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(option: string, reason: string): DownloadError {
  return new DownloadError("VALIDATION_INVALID_OPTION", `Invalid value for ${option}`, {
    details: reason,
  });
}

export function missingArgument(argName: string, suggestion: string): DownloadError {
  return new DownloadError("VALIDATION_MISSING_ARG", `Missing ${argName}`, {
    suggestion,
  });
}

export function unknownError(error: unknown): DownloadError {
  return new DownloadError("UNKNOWN_ERROR", describeCause(error) ?? "Unknown error", {
    cause: error,
  });
}
