import { BaseError } from "./BaseError";

/**
 * Radio controller error codes
 */
export enum RadioErrorCode {
  ENABLE_FAILED = "RADIO_ENABLE_FAILED",
  CONNECT_FAILED = "RADIO_CONNECT_FAILED",
  AIRPLANE_MODE = "RADIO_AIRPLANE_MODE",
  UNKNOWN = "RADIO_UNKNOWN_ERROR",
}

/**
 * Failure reported by the radio controller collaborator
 */
export class RadioError extends BaseError {
  constructor(
    message: string,
    code: RadioErrorCode = RadioErrorCode.UNKNOWN,
    recoverable: boolean = true,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static enableFailed(reason: string): RadioError {
    return new RadioError(
      `Failed to enable Wi-Fi: ${reason}`,
      RadioErrorCode.ENABLE_FAILED,
      true,
      { reason },
    );
  }

  static connectFailed(ssid: string, reason: string): RadioError {
    return new RadioError(
      `Failed to connect to ${ssid}: ${reason}`,
      RadioErrorCode.CONNECT_FAILED,
      true,
      { ssid, reason },
    );
  }

  static airplaneMode(): RadioError {
    return new RadioError(
      "Airplane mode is on",
      RadioErrorCode.AIRPLANE_MODE,
      true,
    );
  }
}
