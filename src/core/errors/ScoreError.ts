import { BaseError } from "./BaseError";

/**
 * Score-related error codes
 */
export enum ScoreErrorCode {
  // Key errors
  INVALID_ARGUMENT = "SCORE_INVALID_ARGUMENT",

  // Line protocol errors
  MALFORMED_LINE = "SCORE_MALFORMED_LINE",
  INVALID_CURVE = "SCORE_INVALID_CURVE",
  INVALID_BADGE = "SCORE_INVALID_BADGE",

  // Publishing errors
  PUBLISH_FAILED = "SCORE_PUBLISH_FAILED",

  // Generic
  UNKNOWN = "SCORE_UNKNOWN_ERROR",
}

/**
 * Score Store / Line Parser Error
 */
export class ScoreError extends BaseError {
  constructor(
    message: string,
    code: ScoreErrorCode = ScoreErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  /**
   * SSID or BSSID of a network key is not in canonical form
   */
  static invalidArgument(field: "ssid" | "bssid", value: string): ScoreError {
    return new ScoreError(
      `Invalid ${field} for network key: ${value}`,
      ScoreErrorCode.INVALID_ARGUMENT,
      false,
      { field, value },
    );
  }

  static malformedLine(line: string, reason: string): ScoreError {
    return new ScoreError(
      `Malformed score line (${reason}): ${line}`,
      ScoreErrorCode.MALFORMED_LINE,
      false,
      { line, reason },
    );
  }

  static invalidCurve(reason: string): ScoreError {
    return new ScoreError(
      `Invalid score curve: ${reason}`,
      ScoreErrorCode.INVALID_CURVE,
      false,
      { reason },
    );
  }

  static invalidBadge(value: string): ScoreError {
    return new ScoreError(
      `Unknown badge level: ${value}`,
      ScoreErrorCode.INVALID_BADGE,
      false,
      { value },
    );
  }

  static publishFailed(count: number, error: Error): ScoreError {
    return new ScoreError(
      `Failed to publish ${count} score(s): ${error.message}`,
      ScoreErrorCode.PUBLISH_FAILED,
      true,
      { count, originalError: error.message },
    );
  }
}
