/**
 * Custom Error Classes for Check Runs
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * The check worker and the API use these to classify failures.
 * Malformed listing lines are never errors: the extractor skips them.
 */
import { ERROR_CODES } from "../../config/constants";

/**
 * Base class for all check errors.
 * Includes an error code for classification in reports and logs.
 */
export class CheckError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean = true) {
    super(message);
    this.name = "CheckError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Listing page unreachable or answered with a non-success status */
export class FetchFailedError extends CheckError {
  public readonly status?: number;

  constructor(message: string = "Source page unreachable", status?: number) {
    // 4xx will not get better by asking again
    const retryable = status === undefined || status >= 500;
    super(message, ERROR_CODES.SOURCE_UNREACHABLE, retryable);
    this.name = "FetchFailedError";
    this.status = status;
  }
}

/** Stored snapshot exists but cannot be read or fails schema validation */
export class SnapshotLoadError extends CheckError {
  constructor(message: string = "Snapshot could not be loaded") {
    super(message, ERROR_CODES.SNAPSHOT_CORRUPT, false);
    this.name = "SnapshotLoadError";
  }
}

/** Snapshot could not be written to the data directory */
export class SnapshotSaveError extends CheckError {
  constructor(message: string = "Snapshot could not be saved") {
    super(message, ERROR_CODES.SNAPSHOT_WRITE_FAILED, true);
    this.name = "SnapshotSaveError";
  }
}

/** Scope is neither "ALL" nor a two-letter state code */
export class InvalidScopeError extends CheckError {
  constructor(scope: string) {
    super(
      `Invalid scope: "${scope}" (expected ALL or a two-letter state code)`,
      ERROR_CODES.INVALID_SCOPE,
      false
    );
    this.name = "InvalidScopeError";
  }
}
