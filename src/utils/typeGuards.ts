/**
 * Runtime checks that narrow unknown values without `as` assertions
 */

import { BaseError } from "@core/errors/BaseError";
import { BadgeLevel } from "@core/types/NetworkTypes";

/**
 * Convert a caught value to an Error instance.
 *
 * @example
 * ```ts
 * try {
 *   await readFile(path);
 * } catch (err) {
 *   logger.error(toError(err).message);
 * }
 * ```
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return new Error(String(error.message));
  }
  return new Error(String(error));
}

/**
 * Node.js system error carrying an errno code (ENOENT, EADDRINUSE, ...)
 */
export function isNodeJSErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    ("code" in error || "errno" in error || "syscall" in error)
  );
}

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

const BADGE_LEVELS: readonly number[] = [
  BadgeLevel.NONE,
  BadgeLevel.SD,
  BadgeLevel.HD,
  BadgeLevel.UHD_4K,
];

export function isBadgeLevel(value: number): value is BadgeLevel {
  return BADGE_LEVELS.includes(value);
}

/**
 * Code and user message of a failed Result, for API responses.
 * Plain errors report their own message under UNKNOWN_ERROR.
 */
export function extractErrorInfo(error: unknown): {
  code: string;
  message: string;
} {
  if (isBaseError(error)) {
    return {
      code: error.code,
      message: error.getUserMessage(),
    };
  }
  if (error instanceof Error) {
    return {
      code: "UNKNOWN_ERROR",
      message: error.message,
    };
  }
  return {
    code: "UNKNOWN_ERROR",
    message: String(error),
  };
}
