/**
 * Error classes for the network recommendation service.
 *
 * Every error extends BaseError and carries a prefixed code, a timestamp,
 * optional context and a recoverable flag. User messages live in
 * ErrorMessages.ts.
 */

export * from "./BaseError";
export * from "./ScoreError";
export * from "./RecommendationError";
export * from "./RadioError";
export * from "./ConfigError";
export * from "./WebError";
export * from "./ErrorMessages";
