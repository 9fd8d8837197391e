import { BaseError } from "./BaseError";

/**
 * Recommendation-related error codes
 */
export enum RecommendationErrorCode {
  UNKNOWN_COMMAND = "RECOMMENDATION_UNKNOWN_COMMAND",
  UNKNOWN = "RECOMMENDATION_UNKNOWN_ERROR",
}

/**
 * Recommendation Engine Error
 */
export class RecommendationError extends BaseError {
  constructor(
    message: string,
    code: RecommendationErrorCode = RecommendationErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static unknownCommand(command: string): RecommendationError {
    return new RecommendationError(
      `Unknown diagnostic command: ${command}`,
      RecommendationErrorCode.UNKNOWN_COMMAND,
      false,
      { command },
    );
  }
}
