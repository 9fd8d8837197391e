/**
 * Centralized user-facing messages for all error codes.
 *
 * Error codes are written as string literals here so this module does not
 * import the error classes (which import it).
 *
 * @example
 * ```typescript
 * import { getUserMessage } from "@errors/ErrorMessages";
 *
 * getUserMessage("SCORE_MALFORMED_LINE");
 * // "Score line could not be parsed. Check the addScore format."
 * ```
 */

export const SCORE_ERROR_MESSAGES: Record<string, string> = {
  SCORE_INVALID_ARGUMENT:
    "Invalid network key. SSIDs must be quoted or hex, BSSIDs colon-separated.",
  SCORE_MALFORMED_LINE:
    "Score line could not be parsed. Check the addScore format.",
  SCORE_INVALID_CURVE: "Score curve is invalid.",
  SCORE_INVALID_BADGE: "Unknown badge level. Use NONE, SD, HD or 4K.",
  SCORE_PUBLISH_FAILED: "Scores could not be published. They remain stored.",
  SCORE_UNKNOWN_ERROR: "Score error occurred. Please try again.",
};

export const RECOMMENDATION_ERROR_MESSAGES: Record<string, string> = {
  RECOMMENDATION_UNKNOWN_COMMAND:
    "Unknown command. Use addScore or no arguments for a dump.",
  RECOMMENDATION_UNKNOWN_ERROR:
    "Recommendation error occurred. Please try again.",
};

export const RADIO_ERROR_MESSAGES: Record<string, string> = {
  RADIO_ENABLE_FAILED: "Wi-Fi could not be turned on.",
  RADIO_CONNECT_FAILED: "Could not connect to the network.",
  RADIO_AIRPLANE_MODE: "Airplane mode is on.",
  RADIO_UNKNOWN_ERROR: "Wi-Fi error occurred. Please try again.",
};

export const WEB_ERROR_MESSAGES: Record<string, string> = {
  WEB_SERVER_START_FAILED:
    "Failed to start web interface. Please check configuration.",
  WEB_SERVER_STOP_FAILED: "Failed to stop web interface gracefully.",
  WEB_SERVER_NOT_RUNNING: "Web interface is not running.",
  WEB_PORT_IN_USE:
    "Web interface port is already in use. Please change the port.",
  WEB_NOT_FOUND: "Resource not found.",
  WEB_UNKNOWN_ERROR: "Web interface error occurred. Please try again.",
};

export const CONFIG_ERROR_MESSAGES: Record<string, string> = {
  CONFIG_FILE_READ_ERROR:
    "Failed to read configuration. Using default settings.",
  CONFIG_INVALID_JSON:
    "Configuration file is corrupted. Using default settings.",
  CONFIG_INVALID_CONFIG: "Invalid configuration. Using default settings.",
  CONFIG_INVALID_VALUE:
    "Configuration contains invalid values. Using defaults.",
  CONFIG_UNKNOWN_ERROR: "Configuration error occurred. Using default settings.",
};

/**
 * Combined mapping of all error codes to their user messages.
 * This is the primary lookup for getUserMessage().
 */
export const ERROR_MESSAGES: Record<string, string> = {
  ...SCORE_ERROR_MESSAGES,
  ...RECOMMENDATION_ERROR_MESSAGES,
  ...RADIO_ERROR_MESSAGES,
  ...WEB_ERROR_MESSAGES,
  ...CONFIG_ERROR_MESSAGES,
};

/**
 * Fallback messages by error category (the code prefix before the first
 * underscore)
 */
export const DEFAULT_ERROR_MESSAGES: Record<string, string> = {
  SCORE: "Score error occurred. Please try again.",
  RECOMMENDATION: "Recommendation error occurred. Please try again.",
  RADIO: "Wi-Fi error occurred. Please try again.",
  WEB: "Web interface error occurred. Please try again.",
  CONFIG: "Configuration error occurred. Using default settings.",
};

/**
 * Get the user-friendly message for an error code, falling back to the
 * category message and then to a generic one.
 */
export function getUserMessage(code: string): string {
  const message = ERROR_MESSAGES[code];
  if (message) {
    return message;
  }

  const category = code.split("_")[0];
  const defaultMessage = DEFAULT_ERROR_MESSAGES[category];
  if (defaultMessage) {
    return defaultMessage;
  }

  return "An error occurred. Please try again.";
}
